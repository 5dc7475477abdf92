/**
 * Sandbox Module
 *
 * Node.js memory interpreter confined to one directory.
 * Command, error and event types live in @memfs/core.
 */

export type {
  LocalMemoryConfig,
  ResolvedLocalMemoryConfig,
} from './types.js';

export { LocalMemoryConfigSchema } from './types.js';

export {
  LocalMemoryInterpreter,
  createLocalMemory,
  createTestMemory,
  type LocalMemoryOptions,
} from './local-memory.js';

/**
 * Local Memory Types
 *
 * Configuration schema for the Node.js memory interpreter.
 *
 * @module sandbox/types
 */

import { z } from 'zod';
import { DEFAULT_VIRTUAL_PREFIX } from '@memfs/core';

export const LocalMemoryConfigSchema = z.object({
  /** Real directory that backs the virtual prefix */
  root: z.string().min(1),
  /** Virtual prefix agents address (default /memories) */
  prefix: z.string().startsWith('/').default(DEFAULT_VIRTUAL_PREFIX),
  /** Write whole files through a temp file renamed into place */
  atomicWrites: z.boolean().default(true),
}).strict();

export type LocalMemoryConfig = z.input<typeof LocalMemoryConfigSchema>;

/**
 * Configuration with an absolute root and a normalized prefix.
 */
export interface ResolvedLocalMemoryConfig {
  root: string;
  /** Normalized prefix ("" when the whole namespace is the root) */
  prefix: string;
  atomicWrites: boolean;
}

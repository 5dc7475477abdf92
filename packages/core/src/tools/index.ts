/**
 * Tool Infrastructure
 *
 * AI SDK tool wrapping a memory interpreter.
 */

export {
  MEMORY_TOOL_NAME,
  createMemoryTool,
  formatOutcome,
  type MemoryTool,
} from "./memory-tool.js";

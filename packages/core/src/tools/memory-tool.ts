/**
 * Memory Tool
 *
 * Exposes a memory interpreter to the model as a single AI SDK tool whose
 * input is the tagged command union.
 */

import { tool, type Tool } from "ai";
import { MemoryCommandSchema, type MemoryCommand } from "../command-schema.js";
import type { CommandOutcome, MemoryInterpreter } from "../sandbox-types.js";

export const MEMORY_TOOL_NAME = "memory";

function describeMemoryTool(prefix: string): string {
  return (
    "Persistent memory directory. Commands: view (list a directory or show a file with line numbers), " +
    "create (write a whole file), str_replace (replace text that occurs exactly once), " +
    "insert (insert text before a 0-based line), delete (remove a file or directory), " +
    "rename (move a file or directory; the destination must not exist). " +
    `All paths start with ${prefix === "" ? "/" : prefix}.`
  );
}

/**
 * The memory tool with the name it is registered under.
 */
export type MemoryTool = Tool<MemoryCommand, string> & {
  name: string;
};

/**
 * Text relayed to the model for an outcome.
 */
export function formatOutcome(outcome: CommandOutcome): string {
  return outcome.ok ? outcome.output : `Error: ${outcome.error.toLLMMessage()}`;
}

/**
 * Create the memory tool for an interpreter.
 */
export function createMemoryTool(interpreter: MemoryInterpreter): MemoryTool {
  const memoryTool = tool({
    description: describeMemoryTool(interpreter.prefix),
    inputSchema: MemoryCommandSchema,
    execute: async (input: MemoryCommand) => formatOutcome(interpreter.execute(input)),
  });

  return { ...memoryTool, name: MEMORY_TOOL_NAME };
}

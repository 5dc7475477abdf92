/**
 * Memory Command Schema
 *
 * Zod schemas for the six memory commands. Field names follow the memory
 * tool wire format so agent-issued JSON validates without translation.
 *
 * @module core/command-schema
 */

import { z } from 'zod';

const pathField = z
  .string()
  .describe('Virtual path under /memories (e.g., /memories/notes.md)');

export const ViewCommandSchema = z.object({
  command: z.literal('view'),
  path: pathField,
  view_range: z
    .tuple([z.number().int(), z.number().int()])
    .optional()
    .describe('1-based inclusive [start, end] line range; end -1 reads to the end of the file'),
});

export const CreateCommandSchema = z.object({
  command: z.literal('create'),
  path: pathField,
  file_text: z.string().describe('Full content of the file; replaces any existing content'),
});

export const StrReplaceCommandSchema = z.object({
  command: z.literal('str_replace'),
  path: pathField,
  old_str: z.string().min(1).describe('Exact text to find; must occur exactly once'),
  new_str: z.string().describe('Replacement text'),
});

export const InsertCommandSchema = z.object({
  command: z.literal('insert'),
  path: pathField,
  insert_line: z.number().int().min(0).describe('Line index to insert before; 0 inserts at the top'),
  insert_text: z.string().describe('Text to insert, may span several lines'),
});

export const DeleteCommandSchema = z.object({
  command: z.literal('delete'),
  path: pathField,
});

export const RenameCommandSchema = z.object({
  command: z.literal('rename'),
  old_path: pathField,
  new_path: pathField,
});

/**
 * Any memory command, discriminated on `command`.
 */
export const MemoryCommandSchema = z.discriminatedUnion('command', [
  ViewCommandSchema,
  CreateCommandSchema,
  StrReplaceCommandSchema,
  InsertCommandSchema,
  DeleteCommandSchema,
  RenameCommandSchema,
]);

export type ViewCommand = z.infer<typeof ViewCommandSchema>;
export type CreateCommand = z.infer<typeof CreateCommandSchema>;
export type StrReplaceCommand = z.infer<typeof StrReplaceCommandSchema>;
export type InsertCommand = z.infer<typeof InsertCommandSchema>;
export type DeleteCommand = z.infer<typeof DeleteCommandSchema>;
export type RenameCommand = z.infer<typeof RenameCommandSchema>;
export type MemoryCommand = z.infer<typeof MemoryCommandSchema>;
export type MemoryCommandKind = MemoryCommand['command'];

export interface ParseCommandSuccess {
  success: true;
  command: MemoryCommand;
}

export interface ParseCommandFailure {
  success: false;
  error: string;
  details?: z.ZodError;
}

export type ParseCommandResult = ParseCommandSuccess | ParseCommandFailure;

/**
 * Validate untrusted input (e.g. agent-issued JSON) as a memory command.
 */
export function parseMemoryCommand(input: unknown): ParseCommandResult {
  const result = MemoryCommandSchema.safeParse(input);
  if (!result.success) {
    return {
      success: false,
      error: 'Invalid memory command',
      details: result.error,
    };
  }
  return { success: true, command: result.data };
}

/**
 * Format a parse failure for display.
 */
export function formatCommandParseError(result: ParseCommandResult): string {
  if (result.success) {
    return 'No error';
  }

  let message = result.error;

  if (result.details) {
    const issues = result.details.issues.map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path ? `${path}: ` : ''}${issue.message}`;
    });
    message += '\n' + issues.join('\n');
  }

  return message;
}

/**
 * Virtual paths a command touches, in argument order.
 */
export function commandPaths(command: MemoryCommand): string[] {
  return command.command === 'rename' ? [command.old_path, command.new_path] : [command.path];
}

/**
 * @memfs/core
 *
 * Platform-agnostic command schema, path rules, text editing and errors
 * for the memory interpreter. The Node.js interpreter lives in @memfs/cli.
 *
 * @module @memfs/core
 */

// Commands
export {
  ViewCommandSchema,
  CreateCommandSchema,
  StrReplaceCommandSchema,
  InsertCommandSchema,
  DeleteCommandSchema,
  RenameCommandSchema,
  MemoryCommandSchema,
  parseMemoryCommand,
  formatCommandParseError,
  commandPaths,
} from './command-schema.js';

export type {
  ViewCommand,
  CreateCommand,
  StrReplaceCommand,
  InsertCommand,
  DeleteCommand,
  RenameCommand,
  MemoryCommand,
  MemoryCommandKind,
  ParseCommandSuccess,
  ParseCommandFailure,
  ParseCommandResult,
} from './command-schema.js';

// Interpreter types
export type {
  AuditRecord,
  CommandSuccess,
  CommandFailure,
  CommandOutcome,
  FileChange,
  CommandStartEvent,
  CommandEndEvent,
  CommandErrorEvent,
  InterpreterEvent,
  InterpreterObserver,
  MemoryInterpreter,
  EntryKind,
  DirectoryEntry,
} from './sandbox-types.js';

// Errors
export {
  MemoryError,
  InvalidPathError,
  NotFoundError,
  AlreadyExistsError,
  IsADirectoryError,
  NotADirectoryError,
  NoMatchError,
  AmbiguousMatchError,
  LineOutOfRangeError,
  MemoryIOError,
  isMemoryError,
} from './sandbox-errors.js';

export type { MemoryErrorCode, MemoryErrorSeverity } from './sandbox-errors.js';

// Virtual paths
export {
  DEFAULT_VIRTUAL_PREFIX,
  normalizePrefix,
  joinVirtualPath,
  resolveVirtualPath,
  isSameOrDescendant,
} from './virtual-path.js';

export type { ResolvedVirtualPath } from './virtual-path.js';

// Text editing
export {
  detectLineEnding,
  splitLines,
  formatNumberedLines,
  renderFileView,
  lineNumberAt,
  replaceExactlyOnce,
  renderSnippet,
  spannedLines,
  insertAtLine,
} from './text-edit.js';

export type { LineEnding, ReplaceResult } from './text-edit.js';

export { formatDirectoryListing } from './listing.js';

// LLM tool
export {
  MEMORY_TOOL_NAME,
  createMemoryTool,
  formatOutcome,
  type MemoryTool,
} from './tools/index.js';

/**
 * Sandbox Errors
 *
 * Typed failures for memory commands with agent-friendly messages.
 * Every message names the caller's virtual path, never the real sandbox root.
 *
 * @module core/sandbox-errors
 */

/**
 * Machine-distinguishable failure kinds.
 */
export type MemoryErrorCode =
  | 'INVALID_PATH'
  | 'NOT_FOUND'
  | 'ALREADY_EXISTS'
  | 'IS_A_DIRECTORY'
  | 'NOT_A_DIRECTORY'
  | 'NO_MATCH'
  | 'AMBIGUOUS_MATCH'
  | 'LINE_OUT_OF_RANGE'
  | 'IO_ERROR';

/**
 * How loudly a failure should be reported. Only NO_MATCH is a warning.
 */
export type MemoryErrorSeverity = 'warning' | 'error';

/**
 * Base class for all memory sandbox errors.
 *
 * Provides:
 * - Structured error code for programmatic handling
 * - Human-readable message
 * - Optional virtual path for context
 * - LLM-friendly message formatting
 */
export class MemoryError extends Error {
  constructor(
    public readonly code: MemoryErrorCode,
    message: string,
    public readonly path?: string,
    public readonly severity: MemoryErrorSeverity = 'error'
  ) {
    super(message);
    this.name = 'MemoryError';
  }

  /**
   * Get an LLM-friendly error message.
   * Override in subclasses for better guidance.
   */
  toLLMMessage(): string {
    return this.message;
  }
}

/**
 * Thrown when a path lacks the virtual prefix, escapes the sandbox,
 * or cannot be resolved.
 */
export class InvalidPathError extends MemoryError {
  constructor(message: string, path?: string) {
    super('INVALID_PATH', message, path);
    this.name = 'InvalidPathError';
  }

  toLLMMessage(): string {
    return `Invalid path${this.path !== undefined ? ` "${this.path}"` : ''}: ${this.message}`;
  }
}

/**
 * Thrown when a file or directory is required but absent.
 */
export class NotFoundError extends MemoryError {
  constructor(path: string) {
    super('NOT_FOUND', `File or directory not found: ${path}`, path);
    this.name = 'NotFoundError';
  }

  toLLMMessage(): string {
    return `The path ${this.path} does not exist. Use view on the parent directory to see what is there.`;
  }
}

/**
 * Thrown when a destination is already taken.
 */
export class AlreadyExistsError extends MemoryError {
  constructor(path: string) {
    super('ALREADY_EXISTS', `Destination already exists: ${path}`, path);
    this.name = 'AlreadyExistsError';
  }

  toLLMMessage(): string {
    return `The destination ${this.path} already exists. Delete it first or choose another path.`;
  }
}

/**
 * Thrown when a file operation targets a directory.
 */
export class IsADirectoryError extends MemoryError {
  constructor(path: string) {
    super('IS_A_DIRECTORY', `Path is a directory: ${path}`, path);
    this.name = 'IsADirectoryError';
  }

  toLLMMessage(): string {
    return `The path ${this.path} is a directory, but this command needs a file.`;
  }
}

/**
 * Thrown when a path component that must be a directory is a file.
 */
export class NotADirectoryError extends MemoryError {
  constructor(path: string) {
    super('NOT_A_DIRECTORY', `A component of the path is not a directory: ${path}`, path);
    this.name = 'NotADirectoryError';
  }

  toLLMMessage(): string {
    return `Cannot use ${this.path}: one of its parent components is a file, not a directory.`;
  }
}

/**
 * Thrown when str_replace finds no occurrence of the target text.
 */
export class NoMatchError extends MemoryError {
  constructor(path: string, public readonly searched: string) {
    super('NO_MATCH', `No occurrence of the text to replace in ${path}`, path, 'warning');
    this.name = 'NoMatchError';
  }

  toLLMMessage(): string {
    return `No replacement was performed: old_str \`${this.searched}\` did not appear verbatim in ${this.path}.`;
  }
}

/**
 * Thrown when str_replace finds more than one occurrence.
 */
export class AmbiguousMatchError extends MemoryError {
  constructor(
    path: string,
    public readonly occurrences: number,
    public readonly lines: number[] = []
  ) {
    super(
      'AMBIGUOUS_MATCH',
      occurrences > 0
        ? `Text to replace occurs ${occurrences} times in ${path}`
        : `Text to replace must not be empty (${path})`,
      path
    );
    this.name = 'AmbiguousMatchError';
  }

  toLLMMessage(): string {
    if (this.occurrences === 0) {
      return `No replacement was performed in ${this.path}: old_str must not be empty.`;
    }
    const where = this.lines.length > 0 ? ` (lines ${this.lines.join(', ')})` : '';
    return (
      `No replacement was performed: old_str occurs ${this.occurrences} times in ${this.path}${where}. ` +
      'Include more surrounding text so it matches exactly once.'
    );
  }
}

/**
 * Thrown when a view range or insert index falls outside the file.
 */
export class LineOutOfRangeError extends MemoryError {
  constructor(message: string, path: string) {
    super('LINE_OUT_OF_RANGE', message, path);
    this.name = 'LineOutOfRangeError';
  }

  toLLMMessage(): string {
    return `Line out of range for ${this.path}: ${this.message}`;
  }
}

/**
 * Wraps an underlying filesystem failure.
 * Carries the errno code of the underlying failure, never its host path.
 */
export class MemoryIOError extends MemoryError {
  constructor(
    public readonly operation: string,
    path: string,
    public readonly errno?: string
  ) {
    super('IO_ERROR', `I/O failure during ${operation} on ${path}${errno ? ` (${errno})` : ''}`, path);
    this.name = 'MemoryIOError';
  }
}

/**
 * Type guard for MemoryError and its subclasses.
 */
export function isMemoryError(error: unknown): error is MemoryError {
  return error instanceof MemoryError;
}

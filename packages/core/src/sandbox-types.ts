/**
 * Sandbox Types
 *
 * Platform-agnostic contracts for memory interpreters: outcomes, audit
 * records and the events an interpreter reports to its observer.
 *
 * @module core/sandbox-types
 */

import type { MemoryCommand, MemoryCommandKind } from './command-schema.js';
import type { MemoryError, MemoryErrorCode, MemoryErrorSeverity } from './sandbox-errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Outcomes
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Structured record of one executed command.
 */
export interface AuditRecord {
  command: MemoryCommandKind;
  /** Virtual paths as supplied by the caller */
  paths: string[];
  outcome: 'success' | 'failure';
  errorCode?: MemoryErrorCode;
  timestamp: Date;
  durationMs: number;
}

export interface CommandSuccess {
  ok: true;
  command: MemoryCommand;
  output: string;
  audit: AuditRecord;
}

export interface CommandFailure {
  ok: false;
  command: MemoryCommand;
  error: MemoryError;
  audit: AuditRecord;
}

export type CommandOutcome = CommandSuccess | CommandFailure;

// ─────────────────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────────────────

interface BaseEvent {
  timestamp: Date;
  command: MemoryCommand;
}

/**
 * Content of a file before and after a mutating command.
 */
export interface FileChange {
  /** Canonical virtual path */
  path: string;
  /** Previous content; undefined when the file did not exist */
  before?: string;
  after: string;
}

export interface CommandStartEvent extends BaseEvent {
  type: 'command_start';
}

export interface CommandEndEvent extends BaseEvent {
  type: 'command_end';
  output: string;
  durationMs: number;
  change?: FileChange;
}

export interface CommandErrorEvent extends BaseEvent {
  type: 'command_error';
  code: MemoryErrorCode;
  severity: MemoryErrorSeverity;
  message: string;
  durationMs: number;
}

export type InterpreterEvent = CommandStartEvent | CommandEndEvent | CommandErrorEvent;

/**
 * Observer threaded into an interpreter in place of global logging.
 */
export type InterpreterObserver = (event: InterpreterEvent) => void;

// ─────────────────────────────────────────────────────────────────────────────
// Interpreter
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A stateless command interpreter confined to one sandbox root.
 *
 * Implementations:
 * - Node.js: LocalMemoryInterpreter (@memfs/cli)
 */
export interface MemoryInterpreter {
  /** Virtual prefix the interpreter answers to (e.g. /memories) */
  readonly prefix: string;

  /**
   * Execute one command. Never throws: failures come back as
   * `{ ok: false, error }`.
   */
  execute(command: MemoryCommand): CommandOutcome;
}

/**
 * Kind of a directory entry in a listing.
 */
export type EntryKind = 'file' | 'directory';

export interface DirectoryEntry {
  name: string;
  kind: EntryKind;
}

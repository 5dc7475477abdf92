/**
 * Local Memory Interpreter
 *
 * Executes memory commands against a real directory tree with Node's
 * synchronous fs API. Every path is resolved and checked against the
 * sandbox root on each call; nothing is cached between commands.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as nodePath from 'path';
import { randomBytes } from 'crypto';
import { TextDecoder } from 'util';
import {
  AlreadyExistsError,
  InvalidPathError,
  IsADirectoryError,
  MemoryIOError,
  NotADirectoryError,
  NotFoundError,
  commandPaths,
  formatDirectoryListing,
  insertAtLine,
  isMemoryError,
  isSameOrDescendant,
  normalizePrefix,
  renderFileView,
  renderSnippet,
  replaceExactlyOnce,
  resolveVirtualPath,
  spannedLines,
  type AuditRecord,
  type CommandOutcome,
  type DirectoryEntry,
  type FileChange,
  type InterpreterEvent,
  type InterpreterObserver,
  type MemoryCommand,
  type MemoryError,
  type MemoryInterpreter,
} from '@memfs/core';
import { LocalMemoryConfigSchema, type LocalMemoryConfig, type ResolvedLocalMemoryConfig } from './types.js';

/**
 * Options that do not belong in configuration files.
 */
export interface LocalMemoryOptions {
  /** Receives one start event and one end/error event per command */
  onEvent?: InterpreterObserver;
}

/**
 * A virtual path bound to its real location.
 */
interface ResolvedTarget {
  virtualPath: string;
  segments: string[];
  realPath: string;
}

/** Strict decoder; invalid bytes fail instead of becoming U+FFFD. */
const UTF8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** Bound on link-to-link hops when following a dangling link by hand. */
const MAX_LINK_HOPS = 40;

interface OperationResult {
  output: string;
  change?: FileChange;
}

/**
 * Extract the errno code from an fs failure.
 */
function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isWithin(parent: string, child: string): boolean {
  return child === parent || child.startsWith(parent + nodePath.sep);
}

/**
 * Whether a link resolves to a directory. Links that cannot be resolved
 * are listed as files.
 */
function linksToDirectory(linkPath: string): boolean {
  try {
    return fs.statSync(linkPath).isDirectory();
  } catch (error) {
    if (errnoCode(error) === undefined) throw error;
    return false;
  }
}

/**
 * Memory interpreter backed by the local filesystem.
 */
export class LocalMemoryInterpreter implements MemoryInterpreter {
  readonly prefix: string;
  readonly root: string;
  private readonly atomicWrites: boolean;
  private readonly onEvent?: InterpreterObserver;

  constructor(config: ResolvedLocalMemoryConfig, options: LocalMemoryOptions = {}) {
    this.root = nodePath.resolve(config.root);
    this.prefix = config.prefix;
    this.atomicWrites = config.atomicWrites;
    this.onEvent = options.onEvent;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Command Boundary
  // ─────────────────────────────────────────────────────────────────────────

  execute(command: MemoryCommand): CommandOutcome {
    const timestamp = new Date();
    const started = Date.now();
    this.emit({ type: 'command_start', timestamp, command });

    let result: OperationResult;
    try {
      this.ensureRoot();
      result = this.dispatch(command);
    } catch (error) {
      const failure = this.wrapError(error, command.command, commandPaths(command)[0]);
      const durationMs = Date.now() - started;
      this.emit({
        type: 'command_error',
        timestamp: new Date(),
        command,
        code: failure.code,
        severity: failure.severity,
        message: failure.toLLMMessage(),
        durationMs,
      });
      return {
        ok: false,
        command,
        error: failure,
        audit: this.audit(command, timestamp, durationMs, failure),
      };
    }

    const durationMs = Date.now() - started;
    this.emit({
      type: 'command_end',
      timestamp: new Date(),
      command,
      output: result.output,
      durationMs,
      change: result.change,
    });
    return {
      ok: true,
      command,
      output: result.output,
      audit: this.audit(command, timestamp, durationMs),
    };
  }

  private dispatch(command: MemoryCommand): OperationResult {
    switch (command.command) {
      case 'view':
        return { output: this.view(command.path, command.view_range) };
      case 'create':
        return this.create(command.path, command.file_text);
      case 'str_replace':
        return this.strReplace(command.path, command.old_str, command.new_str);
      case 'insert':
        return this.insert(command.path, command.insert_line, command.insert_text);
      case 'delete':
        return { output: this.delete(command.path) };
      case 'rename':
        return { output: this.rename(command.old_path, command.new_path) };
      default: {
        const unhandled: never = command;
        throw new Error(`Unhandled memory command: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Operations
  // ─────────────────────────────────────────────────────────────────────────

  private view(path: string, range?: [number, number]): string {
    const target = this.resolve(path);
    const stats = this.statEntry(target);
    if (!stats) {
      throw new NotFoundError(target.virtualPath);
    }

    if (stats.isDirectory()) {
      const entries: DirectoryEntry[] = this.io('view', target.virtualPath, () =>
        fs.readdirSync(target.realPath, { withFileTypes: true }).map((dirent): DirectoryEntry => {
          const isDirectory = dirent.isSymbolicLink()
            ? linksToDirectory(nodePath.join(target.realPath, dirent.name))
            : dirent.isDirectory();
          return { name: dirent.name, kind: isDirectory ? 'directory' : 'file' };
        })
      );
      return formatDirectoryListing(target.virtualPath, entries);
    }

    return renderFileView(this.readText(target), target.virtualPath, range);
  }

  private create(path: string, text: string): OperationResult {
    const target = this.resolve(path);
    const existing = this.statEntry(target);
    if (existing?.isDirectory()) {
      throw new IsADirectoryError(target.virtualPath);
    }

    const before = existing && this.onEvent ? this.readDisplayText(target) : undefined;
    this.ensureParentDirectory(target);
    this.writeText(target, text, existing?.mode);

    return {
      output: `File created successfully at ${target.virtualPath}`,
      change: { path: target.virtualPath, before, after: text },
    };
  }

  private strReplace(path: string, oldStr: string, newStr: string): OperationResult {
    const target = this.resolve(path);
    const { content, mode } = this.readExistingFile(target);
    const replaced = replaceExactlyOnce(content, oldStr, newStr, target.virtualPath);
    this.writeText(target, replaced.content, mode);

    const snippet = renderSnippet(
      replaced.content,
      replaced.line,
      replaced.line + spannedLines(newStr) - 1
    );
    const header = `The file ${target.virtualPath} has been edited.`;
    return {
      output: snippet === '' ? header : `${header}\n${snippet}`,
      change: { path: target.virtualPath, before: content, after: replaced.content },
    };
  }

  private insert(path: string, line: number, text: string): OperationResult {
    const target = this.resolve(path);
    const { content, mode } = this.readExistingFile(target);
    const updated = insertAtLine(content, line, text, target.virtualPath);
    this.writeText(target, updated, mode);

    return {
      output: `The file ${target.virtualPath} has been edited. Text inserted at line ${line}.`,
      change: { path: target.virtualPath, before: content, after: updated },
    };
  }

  private delete(path: string): string {
    // unlink never follows a final link, so only the components above it are checked
    const target = this.resolve(path, { followFinalLink: false });
    if (target.segments.length === 0) {
      throw new InvalidPathError('The memory root itself cannot be deleted', path);
    }

    const stats = this.lstatEntry(target);
    if (!stats) {
      throw new NotFoundError(target.virtualPath);
    }

    if (stats.isDirectory()) {
      this.io('delete', target.virtualPath, () => fs.rmSync(target.realPath, { recursive: true }));
      return `Deleted directory: ${target.virtualPath}`;
    }

    this.io('delete', target.virtualPath, () => fs.unlinkSync(target.realPath));
    return `Deleted file: ${target.virtualPath}`;
  }

  private rename(oldPath: string, newPath: string): string {
    // Both sides are resolved independently; neither borrows the other's checks.
    const source = this.resolve(oldPath);
    const destination = this.resolve(newPath);

    if (source.segments.length === 0) {
      throw new InvalidPathError('The memory root itself cannot be renamed', oldPath);
    }
    if (!this.lstatEntry(source)) {
      throw new NotFoundError(source.virtualPath);
    }
    if (this.lstatEntry(destination)) {
      throw new AlreadyExistsError(destination.virtualPath);
    }
    if (isSameOrDescendant(source.segments, destination.segments)) {
      throw new InvalidPathError(`Cannot move ${source.virtualPath} into itself`, newPath);
    }

    this.ensureParentDirectory(destination);
    this.io('rename', source.virtualPath, () => fs.renameSync(source.realPath, destination.realPath));
    return `Renamed ${source.virtualPath} to ${destination.virtualPath}`;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Path Resolution
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Resolve a virtual path to its real location below the root.
   *
   * @throws InvalidPathError for prefix mismatches, escapes, or symbolic
   * links that lead outside the root
   */
  resolve(path: string, options: { followFinalLink?: boolean } = {}): ResolvedTarget {
    const { virtualPath, segments } = resolveVirtualPath(path, this.prefix);
    const realPath = segments.length === 0 ? this.root : nodePath.join(this.root, ...segments);

    if (!isWithin(this.root, realPath)) {
      throw new InvalidPathError('Path resolves outside the memory directory', path);
    }
    this.checkLinks(options.followFinalLink === false ? segments.slice(0, -1) : segments, path);

    return { virtualPath, segments, realPath };
  }

  /**
   * Walk existing components one at a time; any symbolic link on the way
   * must land inside the real root.
   */
  private checkLinks(segments: readonly string[], input: string): void {
    if (segments.length === 0) return;

    const realRoot = this.io('resolve', input, () => fs.realpathSync(this.root));
    let current = this.root;

    for (const segment of segments) {
      current = nodePath.join(current, segment);

      let stats: fs.Stats | undefined;
      try {
        stats = fs.lstatSync(current, { throwIfNoEntry: false });
      } catch (error) {
        if (errnoCode(error) === 'ENOTDIR') return;
        throw this.wrapError(error, 'resolve', input);
      }
      if (!stats) return;

      if (stats.isSymbolicLink()) {
        const linkTarget = this.followLink(current, input);
        if (!isWithin(realRoot, linkTarget)) {
          throw new InvalidPathError('Path follows a symbolic link outside the memory directory', input);
        }
      }
    }
  }

  /**
   * Real location a link points at. A dangling link resolves to the spot
   * its final target would occupy, so it can still be checked and replaced.
   */
  private followLink(linkPath: string, input: string): string {
    const cannotFollow = (code: string | undefined): InvalidPathError =>
      new InvalidPathError(
        `Path passes through a symbolic link that cannot be followed (${code ?? 'unknown'})`,
        input
      );

    try {
      return fs.realpathSync(linkPath);
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') throw cannotFollow(errnoCode(error));
    }

    let current = linkPath;
    for (let hop = 0; hop < MAX_LINK_HOPS; hop++) {
      let next: string;
      try {
        const target = nodePath.resolve(nodePath.dirname(current), fs.readlinkSync(current));
        next = nodePath.join(fs.realpathSync(nodePath.dirname(target)), nodePath.basename(target));
      } catch (error) {
        throw cannotFollow(errnoCode(error));
      }
      if (!fs.lstatSync(next, { throwIfNoEntry: false })?.isSymbolicLink()) {
        return next;
      }
      current = next;
    }
    throw cannotFollow('ELOOP');
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────────────

  private ensureRoot(): void {
    this.io('initialize', this.prefix === '' ? '/' : this.prefix, () =>
      fs.mkdirSync(this.root, { recursive: true })
    );
  }

  private statEntry(target: ResolvedTarget): fs.Stats | undefined {
    return this.io('stat', target.virtualPath, () =>
      fs.statSync(target.realPath, { throwIfNoEntry: false })
    );
  }

  private lstatEntry(target: ResolvedTarget): fs.Stats | undefined {
    return this.io('stat', target.virtualPath, () =>
      fs.lstatSync(target.realPath, { throwIfNoEntry: false })
    );
  }

  /**
   * Read a file as text. Bytes that are not valid UTF-8 fail the command.
   */
  private readText(target: ResolvedTarget): string {
    const bytes = this.io('read', target.virtualPath, () => fs.readFileSync(target.realPath));
    try {
      return UTF8.decode(bytes);
    } catch {
      throw new MemoryIOError('decode', target.virtualPath, 'EILSEQ');
    }
  }

  /** Lossy read for change reports only. */
  private readDisplayText(target: ResolvedTarget): string {
    return this.io('read', target.virtualPath, () => fs.readFileSync(target.realPath, 'utf-8'));
  }

  private readExistingFile(target: ResolvedTarget): { content: string; mode: number } {
    const stats = this.statEntry(target);
    if (!stats) {
      throw new NotFoundError(target.virtualPath);
    }
    if (stats.isDirectory()) {
      throw new IsADirectoryError(target.virtualPath);
    }
    return { content: this.readText(target), mode: stats.mode };
  }

  private ensureParentDirectory(target: ResolvedTarget): void {
    const parent = nodePath.dirname(target.realPath);
    try {
      fs.mkdirSync(parent, { recursive: true });
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'EEXIST' || code === 'ENOTDIR') {
        throw new NotADirectoryError(target.virtualPath);
      }
      throw this.wrapError(error, 'mkdir', target.virtualPath);
    }
  }

  /**
   * Write a whole file. With atomic writes the content goes to a sibling
   * temp file first and is renamed over the target.
   */
  private writeText(target: ResolvedTarget, content: string, mode?: number): void {
    if (!this.atomicWrites) {
      this.io('write', target.virtualPath, () => fs.writeFileSync(target.realPath, content, 'utf-8'));
      return;
    }

    const tempPath = nodePath.join(
      nodePath.dirname(target.realPath),
      `.${nodePath.basename(target.realPath)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`
    );
    try {
      fs.writeFileSync(tempPath, content, 'utf-8');
      if (mode !== undefined) {
        fs.chmodSync(tempPath, mode & 0o7777);
      }
      fs.renameSync(tempPath, target.realPath);
    } catch (error) {
      fs.rmSync(tempPath, { force: true });
      throw this.wrapError(error, 'write', target.virtualPath);
    }
  }

  /**
   * Run an fs call, translating its failure into a MemoryError.
   */
  private io<T>(operation: string, virtualPath: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw this.wrapError(error, operation, virtualPath);
    }
  }

  private wrapError(error: unknown, operation: string, virtualPath: string): MemoryError {
    if (isMemoryError(error)) {
      return error;
    }
    switch (errnoCode(error)) {
      case 'ENOENT':
        return new NotFoundError(virtualPath);
      case 'ENOTDIR':
        return new NotADirectoryError(virtualPath);
      case 'EISDIR':
        return new IsADirectoryError(virtualPath);
      default:
        return new MemoryIOError(operation, virtualPath, errnoCode(error));
    }
  }

  private audit(
    command: MemoryCommand,
    timestamp: Date,
    durationMs: number,
    failure?: MemoryError
  ): AuditRecord {
    return {
      command: command.command,
      paths: commandPaths(command),
      outcome: failure ? 'failure' : 'success',
      errorCode: failure?.code,
      timestamp,
      durationMs,
    };
  }

  /**
   * Notify the observer. Its failures are logged and never change the outcome.
   */
  private emit(event: InterpreterEvent): void {
    if (!this.onEvent) return;
    try {
      this.onEvent(event);
    } catch (error) {
      console.error(`Error in memory event observer for "${event.type}":`, error);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create an interpreter for a memory directory.
 * The directory is created on the first command if it does not exist.
 *
 * @example
 * const memory = createLocalMemory({ root: "./memories" });
 * memory.execute({ command: "view", path: "/memories" });
 */
export function createLocalMemory(
  config: LocalMemoryConfig,
  options: LocalMemoryOptions = {}
): LocalMemoryInterpreter {
  const parsed = LocalMemoryConfigSchema.parse(config);
  return new LocalMemoryInterpreter(
    {
      root: nodePath.resolve(parsed.root),
      prefix: normalizePrefix(parsed.prefix),
      atomicWrites: parsed.atomicWrites,
    },
    options
  );
}

/**
 * Create an interpreter over a fresh temporary directory.
 * Convenience function for tests.
 */
export function createTestMemory(options: LocalMemoryOptions = {}): LocalMemoryInterpreter {
  const root = fs.mkdtempSync(nodePath.join(os.tmpdir(), 'memfs-test-'));
  return createLocalMemory({ root }, options);
}

/**
 * Text Editing
 *
 * Pure line-addressed operations behind view, str_replace and insert.
 * Files are treated as opaque text: lines split on "\n" or "\r\n", and a
 * trailing terminator does not start an extra line.
 *
 * @module core/text-edit
 */

import {
  AmbiguousMatchError,
  LineOutOfRangeError,
  NoMatchError,
} from './sandbox-errors.js';

export type LineEnding = '\n' | '\r\n';

/** Lines of context shown around an edit. */
const SNIPPET_CONTEXT_LINES = 4;

/**
 * Line ending used by the file, judged by its first terminator.
 */
export function detectLineEnding(content: string): LineEnding {
  const index = content.indexOf('\n');
  return index > 0 && content[index - 1] === '\r' ? '\r\n' : '\n';
}

/**
 * Split content into lines without terminators.
 * Empty content has no lines.
 */
export function splitLines(content: string): string[] {
  if (content === '') return [];
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Render lines as "<n>\t<line>" rows joined by "\n".
 */
export function formatNumberedLines(lines: readonly string[], firstLineNumber = 1): string {
  return lines.map((line, index) => `${firstLineNumber + index}\t${line}`).join('\n');
}

/**
 * Render file content with 1-based line numbers.
 *
 * @param range - Inclusive [start, end]; end is clamped to the file, -1 means last line
 * @throws LineOutOfRangeError when start lies outside the file or end precedes start
 */
export function renderFileView(
  content: string,
  path: string,
  range?: readonly [number, number]
): string {
  const lines = splitLines(content);
  if (!range) {
    return formatNumberedLines(lines);
  }

  const [start, end] = range;
  if (start < 1) {
    throw new LineOutOfRangeError(`Start line ${start} must be 1 or greater`, path);
  }
  if (start > lines.length) {
    throw new LineOutOfRangeError(
      `Start line ${start} is beyond the end of the file (${lines.length} lines)`,
      path
    );
  }
  if (end !== -1 && end < start) {
    throw new LineOutOfRangeError(`End line ${end} is before start line ${start}`, path);
  }

  const last = end === -1 ? lines.length : Math.min(end, lines.length);
  return formatNumberedLines(lines.slice(start - 1, last), start);
}

/**
 * 1-based line number of a character offset.
 */
export function lineNumberAt(content: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset; i++) {
    if (content.charCodeAt(i) === 10) line++;
  }
  return line;
}

/**
 * Result of a single-occurrence replacement.
 */
export interface ReplaceResult {
  content: string;
  /** Line on which the replaced text started */
  line: number;
}

/**
 * Replace the single occurrence of `oldStr`.
 * Overlapping occurrences count separately ("aa" occurs twice in "aaa").
 *
 * @throws NoMatchError when `oldStr` is absent
 * @throws AmbiguousMatchError when it is empty or occurs more than once
 */
export function replaceExactlyOnce(
  content: string,
  oldStr: string,
  newStr: string,
  path: string
): ReplaceResult {
  if (oldStr === '') {
    throw new AmbiguousMatchError(path, 0);
  }

  const first = content.indexOf(oldStr);
  if (first === -1) {
    throw new NoMatchError(path, oldStr);
  }

  const offsets = [first];
  let next = content.indexOf(oldStr, first + 1);
  while (next !== -1) {
    offsets.push(next);
    next = content.indexOf(oldStr, next + 1);
  }

  if (offsets.length > 1) {
    const lines = [...new Set(offsets.map((offset) => lineNumberAt(content, offset)))];
    throw new AmbiguousMatchError(path, offsets.length, lines);
  }

  return {
    content: content.slice(0, first) + newStr + content.slice(first + oldStr.length),
    line: lineNumberAt(content, first),
  };
}

/**
 * Numbered excerpt around lines [fromLine, toLine] of the content.
 */
export function renderSnippet(content: string, fromLine: number, toLine: number): string {
  const lines = splitLines(content);
  if (lines.length === 0) return '';
  const start = Math.max(1, fromLine - SNIPPET_CONTEXT_LINES);
  const end = Math.min(lines.length, Math.max(toLine, fromLine) + SNIPPET_CONTEXT_LINES);
  return formatNumberedLines(lines.slice(start - 1, end), start);
}

/**
 * Number of lines a replacement or insertion spans (at least one).
 */
export function spannedLines(text: string): number {
  return Math.max(1, splitLines(text).length);
}

/**
 * Insert text before the given 0-based line index.
 *
 * An index equal to the line count appends. The result keeps the file's
 * line ending and its trailing terminator, if any. Inserting into empty
 * content yields exactly the inserted text.
 *
 * @throws LineOutOfRangeError when the index lies outside 0..lineCount
 */
export function insertAtLine(
  content: string,
  index: number,
  text: string,
  path: string
): string {
  const lines = splitLines(content);
  if (!Number.isInteger(index) || index < 0 || index > lines.length) {
    throw new LineOutOfRangeError(
      `Insert line ${index} is outside the valid range 0..${lines.length}`,
      path
    );
  }

  if (content === '') {
    return text;
  }

  const eol = detectLineEnding(content);
  const inserted = text === '' ? [''] : splitLines(text);
  const joined = [...lines.slice(0, index), ...inserted, ...lines.slice(index)].join(eol);

  return content.endsWith('\n') ? joined + eol : joined;
}

/**
 * Virtual Path Resolution
 *
 * Turns caller-facing paths under the virtual prefix into canonical
 * segments below the sandbox root. Platform-agnostic: the Node.js side
 * joins the segments onto its real root.
 *
 * @module core/virtual-path
 */

import { InvalidPathError } from './sandbox-errors.js';

/** Prefix agents use to address the memory directory. */
export const DEFAULT_VIRTUAL_PREFIX = '/memories';

/**
 * A virtual path after canonicalization.
 */
export interface ResolvedVirtualPath {
  /** Canonical virtual path (e.g. /memories/notes/todo.md) */
  virtualPath: string;
  /** Segments below the sandbox root; empty for the root itself */
  segments: string[];
}

// Percent-encoded "/", "\", "." and NUL. Nothing downstream decodes them,
// but a segment carrying one is never a legitimate file name here.
const ENCODED_SPECIAL = /%(2f|5c|2e|00)/i;

/**
 * Normalize a configured prefix to "/a/b" form ("" for the bare root).
 */
export function normalizePrefix(prefix: string): string {
  if (!prefix.startsWith('/')) {
    throw new InvalidPathError(`Virtual prefix must be absolute (start with /): ${prefix}`, prefix);
  }
  const segments = prefix.split('/').filter((segment) => segment !== '');
  for (const segment of segments) {
    if (segment === '.' || segment === '..') {
      throw new InvalidPathError(`Virtual prefix must not contain "." or ".." segments: ${prefix}`, prefix);
    }
  }
  return segments.length === 0 ? '' : '/' + segments.join('/');
}

/**
 * Build the canonical virtual path for a list of segments.
 */
export function joinVirtualPath(prefix: string, segments: readonly string[]): string {
  if (segments.length === 0) {
    return prefix === '' ? '/' : prefix;
  }
  return `${prefix}/${segments.join('/')}`;
}

/**
 * Resolve a caller-supplied path against the virtual prefix.
 *
 * Works segment by segment: empty segments from doubled or trailing
 * separators collapse, "." is dropped and ".." pops one level. Climbing
 * above the root, or a segment carrying a backslash, NUL or an encoded
 * separator, is rejected.
 *
 * @throws InvalidPathError carrying the original input
 */
export function resolveVirtualPath(
  input: string,
  prefix: string = DEFAULT_VIRTUAL_PREFIX
): ResolvedVirtualPath {
  const normalizedPrefix = normalizePrefix(prefix);
  const displayPrefix = normalizedPrefix === '' ? '/' : normalizedPrefix;

  if (input === '' || (input !== normalizedPrefix && !input.startsWith(normalizedPrefix + '/'))) {
    throw new InvalidPathError(`Path must start with ${displayPrefix}`, input);
  }

  const remainder = input.slice(normalizedPrefix.length);
  const resolved: string[] = [];

  for (const segment of remainder.split('/')) {
    if (segment === '' || segment === '.') continue;
    if (segment.includes('\\') || segment.includes('\0') || ENCODED_SPECIAL.test(segment)) {
      throw new InvalidPathError(`Path segment "${segment}" contains a forbidden character`, input);
    }
    if (segment === '..') {
      if (resolved.length === 0) {
        throw new InvalidPathError('Path escape attempt detected', input);
      }
      resolved.pop();
    } else {
      resolved.push(segment);
    }
  }

  return {
    virtualPath: joinVirtualPath(normalizedPrefix, resolved),
    segments: resolved,
  };
}

/**
 * True when `inner` equals `outer` or lies below it.
 */
export function isSameOrDescendant(outer: readonly string[], inner: readonly string[]): boolean {
  if (inner.length < outer.length) return false;
  return outer.every((segment, index) => inner[index] === segment);
}

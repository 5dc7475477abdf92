/**
 * Tests for Virtual Path Resolution
 */

import { describe, it, expect } from 'vitest';
import {
  isSameOrDescendant,
  joinVirtualPath,
  normalizePrefix,
  resolveVirtualPath,
} from './virtual-path.js';
import { InvalidPathError } from './sandbox-errors.js';

describe('resolveVirtualPath', () => {
  it('resolves the prefix itself to the root', () => {
    expect(resolveVirtualPath('/memories')).toEqual({ virtualPath: '/memories', segments: [] });
    expect(resolveVirtualPath('/memories/')).toEqual({ virtualPath: '/memories', segments: [] });
  });

  it('splits nested paths into segments', () => {
    expect(resolveVirtualPath('/memories/notes/todo.md')).toEqual({
      virtualPath: '/memories/notes/todo.md',
      segments: ['notes', 'todo.md'],
    });
  });

  it('collapses doubled separators and dot segments', () => {
    expect(resolveVirtualPath('/memories//notes/./todo.md').virtualPath).toBe('/memories/notes/todo.md');
  });

  it('lets .. climb within the sandbox', () => {
    expect(resolveVirtualPath('/memories/notes/../todo.md').segments).toEqual(['todo.md']);
    expect(resolveVirtualPath('/memories/notes/..').segments).toEqual([]);
  });

  it('rejects climbing above the root', () => {
    expect(() => resolveVirtualPath('/memories/..')).toThrow('Path escape attempt detected');
    expect(() => resolveVirtualPath('/memories/../etc/passwd')).toThrow('Path escape attempt detected');
    expect(() => resolveVirtualPath('/memories/a/../../b')).toThrow('Path escape attempt detected');
  });

  it('rejects paths outside the prefix', () => {
    expect(() => resolveVirtualPath('/etc/passwd')).toThrow('Path must start with /memories');
    expect(() => resolveVirtualPath('memories/a.md')).toThrow('Path must start with /memories');
    expect(() => resolveVirtualPath('/memoriesX/a.md')).toThrow('Path must start with /memories');
    expect(() => resolveVirtualPath('')).toThrow('Path must start with /memories');
  });

  it('rejects backslashes, NUL and encoded separators', () => {
    expect(() => resolveVirtualPath('/memories/..\\etc')).toThrow('contains a forbidden character');
    expect(() => resolveVirtualPath('/memories/a\0b')).toThrow('contains a forbidden character');
    expect(() => resolveVirtualPath('/memories/..%2fetc')).toThrow('contains a forbidden character');
    expect(() => resolveVirtualPath('/memories/%2E%2E')).toThrow('contains a forbidden character');
  });

  it('carries the original input on the error', () => {
    try {
      resolveVirtualPath('/memories/../x');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidPathError);
      if (error instanceof InvalidPathError) {
        expect(error.path).toBe('/memories/../x');
      }
    }
  });

  it('never yields segments that leave the root', () => {
    const attempts = [
      '/memories/a/b/../../c',
      '/memories/./../memories/x',
      '/memories/a//..//b',
      '/memories/a/./b/../../..',
    ];
    for (const attempt of attempts) {
      try {
        const { segments } = resolveVirtualPath(attempt);
        expect(segments).not.toContain('..');
        expect(segments).not.toContain('.');
        expect(segments).not.toContain('');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidPathError);
      }
    }
  });

  it('honors a custom prefix', () => {
    expect(resolveVirtualPath('/agent/mem/a.md', '/agent/mem').segments).toEqual(['a.md']);
    expect(() => resolveVirtualPath('/memories/a.md', '/agent/mem')).toThrow('Path must start with /agent/mem');
  });

  it('treats "/" as a bare-root prefix', () => {
    expect(resolveVirtualPath('/a/b.md', '/')).toEqual({ virtualPath: '/a/b.md', segments: ['a', 'b.md'] });
    expect(resolveVirtualPath('/', '/')).toEqual({ virtualPath: '/', segments: [] });
  });
});

describe('normalizePrefix', () => {
  it('normalizes separators', () => {
    expect(normalizePrefix('/memories/')).toBe('/memories');
    expect(normalizePrefix('//a//b')).toBe('/a/b');
    expect(normalizePrefix('/')).toBe('');
  });

  it('rejects relative prefixes and dot segments', () => {
    expect(() => normalizePrefix('memories')).toThrow('must be absolute');
    expect(() => normalizePrefix('/a/../b')).toThrow('must not contain');
  });
});

describe('joinVirtualPath', () => {
  it('joins segments under the prefix', () => {
    expect(joinVirtualPath('/memories', ['a', 'b.md'])).toBe('/memories/a/b.md');
    expect(joinVirtualPath('/memories', [])).toBe('/memories');
    expect(joinVirtualPath('', [])).toBe('/');
    expect(joinVirtualPath('', ['a'])).toBe('/a');
  });
});

describe('isSameOrDescendant', () => {
  it('compares whole segments', () => {
    expect(isSameOrDescendant(['a'], ['a'])).toBe(true);
    expect(isSameOrDescendant(['a'], ['a', 'b'])).toBe(true);
    expect(isSameOrDescendant(['a'], ['ab'])).toBe(false);
    expect(isSameOrDescendant(['a', 'b'], ['a'])).toBe(false);
    expect(isSameOrDescendant([], ['x'])).toBe(true);
  });
});

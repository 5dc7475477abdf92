/**
 * Directory Listings
 *
 * @module core/listing
 */

import type { DirectoryEntry } from './sandbox-types.js';

/**
 * Render the immediate entries of a directory, sorted by name.
 * Rows read "DIR: <path>" or "FILE: <path>".
 */
export function formatDirectoryListing(
  virtualDir: string,
  entries: readonly DirectoryEntry[]
): string {
  if (entries.length === 0) {
    return `Directory is empty: ${virtualDir}`;
  }

  const base = virtualDir === '/' ? '' : virtualDir;
  return [...entries]
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map((entry) => `${entry.kind === 'directory' ? 'DIR' : 'FILE'}: ${base}/${entry.name}`)
    .join('\n');
}

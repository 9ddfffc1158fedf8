/**
 * Library link parsing
 *
 * Entries have the form `<file>:<library>:<address>`. Fields past the
 * third are ignored. A later entry for the same file and library replaces
 * the earlier address.
 */

import { ResolutionError } from './errors.js';
import type { LibraryLink, LibraryLinkTable } from './schema.js';

export function parseLibraryLink(entry: string): LibraryLink {
  const [file, library, address] = entry.split(':');
  if (!file || !library || !address) {
    throw new ResolutionError('MalformedLibraryLink', `could not parse library link: ${entry}`, {
      input: entry,
    });
  }
  return { file, library, address };
}

/**
 * Build the nested file -> library -> address table. Every entry is parsed
 * before anything is inserted, so a malformed entry yields no table at all.
 */
export function buildLibraryLinkTable(entries: string[]): LibraryLinkTable {
  const links = entries.map(parseLibraryLink);

  // Maps keep names such as `__proto__` as plain keys
  const files = new Map<string, Map<string, string>>();
  for (const { file, library, address } of links) {
    const libraries = files.get(file) ?? new Map<string, string>();
    libraries.set(library, address);
    files.set(file, libraries);
  }

  return Object.fromEntries(
    [...files].map(([file, libraries]) => [file, Object.fromEntries(libraries)])
  );
}

/**
 * Flatten a table back into sorted `file:library:address` entries
 */
export function formatLibraryLinks(table: LibraryLinkTable): string[] {
  return Object.keys(table)
    .sort()
    .flatMap((file) =>
      Object.keys(table[file])
        .sort()
        .map((library) => `${file}:${library}:${table[file][library]}`)
    );
}

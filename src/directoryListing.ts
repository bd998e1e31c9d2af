import fs from 'node:fs';
import path from 'node:path';
import type { EntryFilter } from './pathFilter';

export interface DirectoryEntry {
  name: string;
  path: string;
  isDirectory: boolean;
}

export type ListingErrorHandler = (dirPath: string, error: unknown) => void;

// Directories first, then case-insensitive name. Equal lowercase names fall
// back to the raw name so the order never depends on readdir.
export function compareEntries(a: DirectoryEntry, b: DirectoryEntry): number {
  if (a.isDirectory && !b.isDirectory) return -1;
  if (!a.isDirectory && b.isDirectory) return 1;

  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  if (left !== right) return left < right ? -1 : 1;
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

function resolveIsDirectory(dirent: fs.Dirent, entryPath: string): boolean {
  if (!dirent.isSymbolicLink()) return dirent.isDirectory();

  try {
    return fs.statSync(entryPath).isDirectory();
  } catch {
    // dangling link
    return false;
  }
}

/**
 * Lists one directory, dropping skipped entries and sorting the rest.
 * An unreadable directory yields no entries; the failure goes to `onError`.
 */
export function listDirectory(
  dirPath: string,
  filter: EntryFilter,
  onError?: ListingErrorHandler
): DirectoryEntry[] {
  let dirents: fs.Dirent[];
  try {
    dirents = fs.readdirSync(dirPath, { withFileTypes: true });
  } catch (error) {
    onError?.(dirPath, error);
    return [];
  }

  const entries = dirents
    .map((dirent) => {
      const entryPath = path.join(dirPath, dirent.name);
      return {
        name: dirent.name,
        path: entryPath,
        isDirectory: resolveIsDirectory(dirent, entryPath),
      };
    })
    .filter((entry) => !filter.shouldSkip(entry.path));

  return entries.sort(compareEntries);
}

/** Every non-skipped file below `dirPath`, depth first in listing order. */
export function* walkFiles(
  dirPath: string,
  filter: EntryFilter,
  onError?: ListingErrorHandler
): Generator<DirectoryEntry> {
  for (const entry of listDirectory(dirPath, filter, onError)) {
    if (entry.isDirectory) {
      yield* walkFiles(entry.path, filter, onError);
    } else {
      yield entry;
    }
  }
}

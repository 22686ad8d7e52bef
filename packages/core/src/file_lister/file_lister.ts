/**
 * FileLister Interface
 *
 * Abstracts the recursive walk so FileFinder and the CLI work the same
 * against the real filesystem and an in-memory tree.
 *
 * @module file_lister
 */

import type { FileEntry, FileNameFilter } from './file_lister.types';

export type {
  FileEntry,
  FileNameFilter,
  FsFileListerOptions,
  MemoryFileEntry,
  MemoryFileListerOptions,
} from './file_lister.types';
export type { FileListerErrorCode } from './file_lister.errors';
export { FileListerError, toFileListerError } from './file_lister.errors';

/**
 * Byte-wise name order, so walk order does not depend on the locale.
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Walks a directory tree and collects non-directory entries.
 *
 * @example
 * ```typescript
 * // Filesystem backend (CLI)
 * const lister = new FsFileLister({ cwd: process.cwd() });
 *
 * // Memory backend (testing)
 * const lister = new MemoryFileLister({ files: [{ path: 'src/main.go', size: 12 }] });
 *
 * const entries = await lister.walk(name => name.endsWith('.go'));
 * ```
 */
export interface FileLister {
  /**
   * Visits the root and every subdirectory depth-first, children in name
   * order. Directories are never collected. Unreadable subdirectories are
   * logged and skipped.
   *
   * @param filter - Applied to entry names; omitted means collect everything
   * @returns Entries in walk order
   * @throws FileListerError if the root itself cannot be walked
   */
  walk(filter?: FileNameFilter): Promise<FileEntry[]>;
}

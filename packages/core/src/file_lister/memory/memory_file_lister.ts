/**
 * MemoryFileLister - In-memory FileLister
 *
 * Builds a directory tree from a flat list of file paths and walks it the
 * same way FsFileLister walks a real directory. Used for unit testing.
 *
 * @module file_lister/memory/memory_file_lister
 */

import { logger as defaultLogger } from '../../logger';
import type { Logger } from '../../logger';
import type {
  FileEntry,
  FileLister,
  FileNameFilter,
  MemoryFileEntry,
  MemoryFileListerOptions,
} from '../file_lister';
import { FileListerError, compareNames } from '../file_lister';

type MemoryDirectory = {
  directories: Map<string, MemoryDirectory>;
  files: Map<string, FileEntry>;
}

function createDirectory(): MemoryDirectory {
  return { directories: new Map(), files: new Map() };
}

/**
 * In-memory FileLister.
 *
 * @example
 * ```typescript
 * const lister = new MemoryFileLister({
 *   files: [
 *     { path: 'a.go', modTime: 3000, size: 500 },
 *     { path: 'src/b.go', modTime: 2000, size: 10 },
 *   ],
 *   unreadable: ['vendor'],
 * });
 * ```
 */
export class MemoryFileLister implements FileLister {
  private readonly root: MemoryDirectory = createDirectory();
  private readonly unreadable: Set<string>;
  private readonly logger: Logger;

  constructor(options: MemoryFileListerOptions = {}) {
    this.unreadable = new Set((options.unreadable ?? []).map(normalizePath));
    this.logger = options.logger ?? defaultLogger;
    for (const file of options.files ?? []) {
      this.addFile(file);
    }
  }

  /**
   * Adds or replaces a file, creating its parent directories.
   *
   * @throws FileListerError (INVALID_PATH) when the path has no file name, or
   * when a file and a directory would share a path
   */
  addFile(file: MemoryFileEntry): void {
    const segments = normalizePath(file.path).split('/').filter(Boolean);
    const name = segments.pop();
    if (!name) {
      throw new FileListerError(`Invalid path: ${file.path}`, 'INVALID_PATH', file.path);
    }

    let directory = this.root;
    for (const [index, segment] of segments.entries()) {
      if (directory.files.has(segment)) {
        const filePath = segments.slice(0, index + 1).join('/');
        throw new FileListerError(`Path is a file: ${filePath}`, 'INVALID_PATH', filePath);
      }
      let next = directory.directories.get(segment);
      if (!next) {
        next = createDirectory();
        directory.directories.set(segment, next);
      }
      directory = next;
    }

    const filePath = [...segments, name].join('/');
    if (directory.directories.has(name)) {
      throw new FileListerError(`Path is a directory: ${filePath}`, 'INVALID_PATH', filePath);
    }

    directory.files.set(name, {
      path: filePath,
      modTime: file.modTime ?? 0,
      size: file.size ?? 0,
    });
  }

  async walk(filter?: FileNameFilter): Promise<FileEntry[]> {
    if (this.unreadable.has('')) {
      throw new FileListerError('Permission denied: .', 'PERMISSION_DENIED', '.');
    }

    const entries: FileEntry[] = [];
    this.visit(this.root, '', entries, filter);
    return entries;
  }

  private visit(directory: MemoryDirectory, relativeDir: string, entries: FileEntry[], filter?: FileNameFilter): void {
    const names = [...directory.directories.keys(), ...directory.files.keys()].sort(compareNames);

    for (const name of names) {
      const childPath = relativeDir ? `${relativeDir}/${name}` : name;
      const subdirectory = directory.directories.get(name);

      if (subdirectory) {
        if (this.unreadable.has(childPath)) {
          this.logger.warn(`Error accessing ${childPath}: permission denied`);
          continue;
        }
        this.visit(subdirectory, childPath, entries, filter);
        continue;
      }

      const file = directory.files.get(name);
      if (file && (!filter || filter(name))) {
        entries.push({ ...file });
      }
    }
  }
}

function normalizePath(filePath: string): string {
  return filePath.replace(/\\/g, '/').replace(/^\.?\/+/, '').replace(/\/+$/, '').replace(/^\.$/, '');
}

/**
 * FsFileLister - Filesystem-based FileLister implementation
 *
 * Uses fast-glob to read one directory level at a time and fs/promises to
 * check the walk root. Used by the CLI.
 *
 * @module file_lister/fs/fs_file_lister
 */

import fg from 'fast-glob';
import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { logger as defaultLogger } from '../../logger';
import type { Logger } from '../../logger';
import type { FileEntry, FileLister, FileNameFilter, FsFileListerOptions } from '../file_lister';
import { FileListerError, compareNames, toFileListerError } from '../file_lister';

/**
 * Filesystem-based FileLister.
 *
 * Symbolic links are collected with their own metadata and never followed.
 *
 * @example
 * ```typescript
 * const lister = new FsFileLister({ cwd: process.cwd() });
 * const entries = await lister.walk(name => name.endsWith('.go'));
 * ```
 */
export class FsFileLister implements FileLister {
  private readonly cwd: string;
  private readonly logger: Logger;

  constructor(options: FsFileListerOptions) {
    this.cwd = options.cwd;
    this.logger = options.logger ?? defaultLogger;
  }

  async walk(filter?: FileNameFilter): Promise<FileEntry[]> {
    await this.assertWalkableRoot();

    const entries: FileEntry[] = [];
    await this.visit('', entries, filter);
    return entries;
  }

  private async assertWalkableRoot(): Promise<void> {
    let stats: Stats;
    try {
      stats = await fs.stat(this.cwd);
    } catch (error) {
      throw toFileListerError(error, this.cwd);
    }
    if (!stats.isDirectory()) {
      throw new FileListerError(`Not a directory: ${this.cwd}`, 'INVALID_PATH', this.cwd);
    }
  }

  private async visit(relativeDir: string, entries: FileEntry[], filter?: FileNameFilter): Promise<void> {
    const children = await this.readDirectory(relativeDir);
    if (!children) {
      return;
    }

    children.sort((a, b) => compareNames(a.name, b.name));

    for (const child of children) {
      const childPath = relativeDir ? path.join(relativeDir, child.name) : child.name;

      if (child.dirent.isDirectory()) {
        await this.visit(childPath, entries, filter);
        continue;
      }
      if (filter && !filter(child.name)) {
        continue;
      }
      if (!child.stats) {
        this.logger.warn(`Error accessing ${childPath}: metadata unavailable`);
        continue;
      }

      entries.push({
        path: childPath,
        modTime: child.stats.mtimeMs,
        size: child.stats.size,
      });
    }
  }

  /**
   * Reads a single directory level. A failure on the root is fatal; any
   * other directory is reported and skipped (returns null).
   */
  private async readDirectory(relativeDir: string): Promise<fg.Entry[] | null> {
    try {
      return await fg('*', {
        cwd: path.join(this.cwd, relativeDir),
        onlyFiles: false,
        dot: true,
        stats: true,
        followSymbolicLinks: false,
      });
    } catch (error) {
      if (relativeDir === '') {
        throw toFileListerError(error, this.cwd);
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Error accessing ${relativeDir}: ${message}`);
      return null;
    }
  }
}

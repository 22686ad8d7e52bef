import type { FileEntry, FileLister } from '../file_lister';
import type { Logger } from '../logger';
import type { SortMode } from '../file_sorter';

/**
 * FileFinder Dependencies - Facade + Dependency Injection Pattern
 */
export type FileFinderDependencies = {
  fileLister: FileLister;
  logger?: Logger;
}

export type FindFilesOptions = {
  /** Extension tokens as typed by the user; empty or omitted matches everything */
  extensions?: string[];
  /** Default: 'newest' */
  sortMode?: SortMode;
}

export type FindFilesResult = {
  /** Matching entries in sorted order */
  entries: FileEntry[];
  /** Whether an extension filter was active */
  filtered: boolean;
}

/**
 * FileFinder Interface - walk, filter and sort in one call
 */
export interface IFileFinder {
  find(options?: FindFilesOptions): Promise<FindFilesResult>;
}

import type { Logger } from '../logger';

/**
 * A non-directory entry collected by a walk.
 */
export type FileEntry = {
  /** Path relative to the walk root */
  path: string;
  /** Last modification time as timestamp (ms since epoch) */
  modTime: number;
  /** Size in bytes */
  size: number;
}

/**
 * Decides whether an entry is collected, given its name (not its path).
 */
export type FileNameFilter = (fileName: string) => boolean;

/**
 * Options for FsFileLister.
 */
export type FsFileListerOptions = {
  /** Root directory of the walk */
  cwd: string;
  /** Receives per-entry access warnings. Default: core logger */
  logger?: Logger;
}

/**
 * Seed entry for MemoryFileLister. Paths use '/' separators.
 */
export type MemoryFileEntry = {
  path: string;
  /** Default: 0 */
  modTime?: number;
  /** Default: 0 */
  size?: number;
}

/**
 * Options for MemoryFileLister.
 */
export type MemoryFileListerOptions = {
  files?: MemoryFileEntry[];
  /** Directory paths that fail to be read during the walk */
  unreadable?: string[];
  logger?: Logger;
}

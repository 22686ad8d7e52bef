export type {
  FileEntry,
  FileLister,
  FileListerErrorCode,
  FileNameFilter,
  FsFileListerOptions,
  MemoryFileEntry,
  MemoryFileListerOptions,
} from './file_lister';
export { FileListerError, compareNames, toFileListerError } from './file_lister';

// Implementations
export { FsFileLister } from './fs';
export { MemoryFileLister } from './memory';

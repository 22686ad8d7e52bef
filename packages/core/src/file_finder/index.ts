// Types
export type {
  FileFinderDependencies,
  FindFilesOptions,
  FindFilesResult,
  IFileFinder,
} from './file_finder.types';

// Implementation
export { FileFinder } from './file_finder';

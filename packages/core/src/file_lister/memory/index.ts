export { MemoryFileLister } from './memory_file_lister';
export type { MemoryFileEntry, MemoryFileListerOptions } from '../file_lister';

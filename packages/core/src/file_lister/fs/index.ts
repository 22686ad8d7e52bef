export { FsFileLister } from './fs_file_lister';
export type { FsFileListerOptions } from '../file_lister';

import { createExtensionFilter, normalizeExtensions } from '../extension_filter';
import type { FileLister } from '../file_lister';
import { DEFAULT_SORT_MODE, sortEntries } from '../file_sorter';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type {
  FileFinderDependencies,
  FindFilesOptions,
  FindFilesResult,
  IFileFinder,
} from './file_finder.types';

/**
 * FileFinder - normalized filter, then walk, then sort.
 */
export class FileFinder implements IFileFinder {
  private readonly fileLister: FileLister;
  private readonly logger: Logger;

  constructor(dependencies: FileFinderDependencies) {
    this.fileLister = dependencies.fileLister;
    this.logger = dependencies.logger ?? createLogger('[FileFinder] ');
  }

  async find(options: FindFilesOptions = {}): Promise<FindFilesResult> {
    const filters = normalizeExtensions(options.extensions ?? []);
    const sortMode = options.sortMode ?? DEFAULT_SORT_MODE;
    const filtered = filters.length > 0;

    this.logger.debug(
      `Walking with ${filtered ? `filters ${filters.join(', ')}` : 'no filter'}, sorted by ${sortMode}`
    );

    // Errors from the walk root propagate; nothing is sorted or returned
    const entries = await this.fileLister.walk(filtered ? createExtensionFilter(filters) : undefined);

    this.logger.debug(`Collected ${entries.length} entries`);

    return {
      entries: sortEntries(entries, sortMode),
      filtered,
    };
  }
}

import type { SortMode } from './file_sorter.types';

export const SORT_OPTION_CONFLICT_MESSAGE = 'Only one sort option can be specified at a time';

/**
 * Thrown when more than one of the oldest/largest/smallest flags is set.
 */
export class SortOptionConflictError extends Error {
  constructor(public readonly modes: SortMode[]) {
    super(SORT_OPTION_CONFLICT_MESSAGE);
    this.name = 'SortOptionConflictError';
  }
}

export type { SortFlags, SortMode } from './file_sorter.types';
export { SORT_OPTION_CONFLICT_MESSAGE, SortOptionConflictError } from './file_sorter.errors';
export { DEFAULT_SORT_MODE, SORT_COMPARATORS, resolveSortMode, sortEntries } from './file_sorter';

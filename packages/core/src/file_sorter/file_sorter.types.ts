/**
 * Ordering applied to collected entries. `newest` is the default.
 */
export type SortMode = 'newest' | 'oldest' | 'largest' | 'smallest';

/**
 * Sort flags as given on the command line. At most one may be set.
 */
export type SortFlags = {
  oldest?: boolean;
  largest?: boolean;
  smallest?: boolean;
}

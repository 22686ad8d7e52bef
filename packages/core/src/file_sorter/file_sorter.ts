/**
 * File Sorter
 *
 * One comparator per sort mode; resolveSortMode turns command-line flags
 * into a mode.
 *
 * @module file_sorter
 */

import type { FileEntry } from '../file_lister';
import { compareNames } from '../file_lister';
import { SortOptionConflictError } from './file_sorter.errors';
import type { SortFlags, SortMode } from './file_sorter.types';

export const DEFAULT_SORT_MODE: SortMode = 'newest';

type Comparator = (a: FileEntry, b: FileEntry) => number;

export const SORT_COMPARATORS: Readonly<Record<SortMode, Comparator>> = {
  newest: (a, b) => b.modTime - a.modTime,
  oldest: (a, b) => a.modTime - b.modTime,
  largest: (a, b) => b.size - a.size,
  smallest: (a, b) => a.size - b.size,
};

/**
 * Returns the single mode selected by the flags, or the default when none is set.
 * @throws SortOptionConflictError when more than one flag is set
 */
export function resolveSortMode(flags: SortFlags): SortMode {
  const selected: SortMode[] = [];
  if (flags.oldest) selected.push('oldest');
  if (flags.largest) selected.push('largest');
  if (flags.smallest) selected.push('smallest');

  if (selected.length > 1) {
    throw new SortOptionConflictError(selected);
  }
  return selected[0] ?? DEFAULT_SORT_MODE;
}

/**
 * Sorts a copy of the entries. Equal keys fall back to path order.
 */
export function sortEntries(entries: readonly FileEntry[], mode: SortMode = DEFAULT_SORT_MODE): FileEntry[] {
  const compare = SORT_COMPARATORS[mode];
  return [...entries].sort((a, b) => compare(a, b) || compareNames(a.path, b.path));
}

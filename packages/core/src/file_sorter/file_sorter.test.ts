import { resolveSortMode, sortEntries } from './file_sorter';
import { SortOptionConflictError } from './file_sorter.errors';
import type { FileEntry } from '../file_lister';

describe('File Sorter', () => {
  const entries: FileEntry[] = [
    { path: 'b.go', modTime: 2000, size: 500 },
    { path: 'c.txt', modTime: 1000, size: 2000 },
    { path: 'a.go', modTime: 3000, size: 10 },
  ];

  const paths = (sorted: FileEntry[]) => sorted.map(e => e.path);

  describe('sortEntries', () => {
    it('should sort newest first by default', () => {
      expect(paths(sortEntries(entries))).toEqual(['a.go', 'b.go', 'c.txt']);
    });

    it('should sort oldest first', () => {
      expect(paths(sortEntries(entries, 'oldest'))).toEqual(['c.txt', 'b.go', 'a.go']);
    });

    it('should sort largest first', () => {
      expect(paths(sortEntries(entries, 'largest'))).toEqual(['c.txt', 'b.go', 'a.go']);
    });

    it('should sort smallest first', () => {
      expect(paths(sortEntries(entries, 'smallest'))).toEqual(['a.go', 'b.go', 'c.txt']);
    });

    it('should break ties by path', () => {
      const tied: FileEntry[] = [
        { path: 'z.go', modTime: 100, size: 1 },
        { path: 'm.go', modTime: 100, size: 1 },
        { path: 'a.go', modTime: 100, size: 1 },
      ];
      expect(paths(sortEntries(tied, 'newest'))).toEqual(['a.go', 'm.go', 'z.go']);
      expect(paths(sortEntries(tied, 'largest'))).toEqual(['a.go', 'm.go', 'z.go']);
    });

    it('should not mutate its input', () => {
      const input = [...entries];
      sortEntries(input, 'smallest');
      expect(input).toEqual(entries);
    });

    it('should handle an empty list', () => {
      expect(sortEntries([], 'oldest')).toEqual([]);
    });
  });

  describe('resolveSortMode', () => {
    it('should default to newest', () => {
      expect(resolveSortMode({})).toBe('newest');
      expect(resolveSortMode({ oldest: false, largest: false, smallest: false })).toBe('newest');
    });

    it('should map each flag to its mode', () => {
      expect(resolveSortMode({ oldest: true })).toBe('oldest');
      expect(resolveSortMode({ largest: true })).toBe('largest');
      expect(resolveSortMode({ smallest: true })).toBe('smallest');
    });

    it('should reject two flags at once', () => {
      expect(() => resolveSortMode({ oldest: true, largest: true })).toThrow(SortOptionConflictError);
      expect(() => resolveSortMode({ largest: true, smallest: true })).toThrow(
        'Only one sort option can be specified at a time'
      );
    });

    it('should report every conflicting mode', () => {
      try {
        resolveSortMode({ oldest: true, largest: true, smallest: true });
        throw new Error('expected a conflict');
      } catch (error) {
        expect(error).toBeInstanceOf(SortOptionConflictError);
        expect(error).toMatchObject({ modes: ['oldest', 'largest', 'smallest'] });
      }
    });
  });
});

/**
 * Extension Filter
 *
 * Canonicalizes user-supplied extension tokens and matches file names
 * against them case-insensitively.
 *
 * @module extension_filter
 */

export const EXTENSION_SEPARATOR = '.';

/**
 * Predicate over a file name (not a path).
 */
export type ExtensionFilter = (fileName: string) => boolean;

/**
 * Adds the leading separator where missing and lower-cases each token.
 * Duplicates collapse to their first occurrence.
 *
 * @example
 * normalizeExtensions(['go', '.TXT', '.go']) // ['.go', '.txt']
 * normalizeExtensions([]) // [] (match everything)
 */
export function normalizeExtensions(tokens: readonly string[]): string[] {
  const normalized: string[] = [];
  for (const token of tokens) {
    const withSeparator = token.startsWith(EXTENSION_SEPARATOR)
      ? token
      : `${EXTENSION_SEPARATOR}${token}`;
    const lowered = withSeparator.toLowerCase();
    if (!normalized.includes(lowered)) {
      normalized.push(lowered);
    }
  }
  return normalized;
}

/**
 * True when the lower-cased name ends with any of the normalized filters,
 * or when there are no filters at all.
 */
export function matchesExtension(fileName: string, filters: readonly string[]): boolean {
  if (filters.length === 0) {
    return true;
  }
  const lowered = fileName.toLowerCase();
  return filters.some(filter => lowered.endsWith(filter));
}

export function createExtensionFilter(tokens: readonly string[]): ExtensionFilter {
  const filters = normalizeExtensions(tokens);
  return (fileName: string) => matchesExtension(fileName, filters);
}

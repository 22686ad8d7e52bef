/**
 * Output Formatter
 *
 * Renders sorted entries as plain text or as a JSON array of paths.
 *
 * @module output_formatter
 */

import type { FileEntry } from '../file_lister';

export type OutputFormat = 'text' | 'json';

export const NO_FILES_MESSAGE = 'No files found.';
export const NO_MATCHING_FILES_MESSAGE = 'No files found with the specified extensions.';

export type RenderOptions = {
  format: OutputFormat;
  /** Whether an extension filter was active; selects the empty-result message */
  filtered: boolean;
}

/**
 * Plain text: one path per line, newline-terminated.
 */
export function formatPlain(entries: readonly FileEntry[]): string {
  return entries.map(entry => `${entry.path}\n`).join('');
}

/**
 * JSON: a flat array of path strings, e.g. `["a.go","b.go"]`.
 */
export function formatJson(entries: readonly FileEntry[]): string {
  return JSON.stringify(entries.map(entry => entry.path));
}

export function emptyResultMessage(filtered: boolean): string {
  return filtered ? NO_MATCHING_FILES_MESSAGE : NO_FILES_MESSAGE;
}

/**
 * Renders a listing, or the "no files found" message in either format when
 * there is nothing to list. The returned text has no trailing newline.
 */
export function renderListing(entries: readonly FileEntry[], options: RenderOptions): string {
  if (entries.length === 0) {
    return emptyResultMessage(options.filtered);
  }
  return options.format === 'json'
    ? formatJson(entries)
    : formatPlain(entries).replace(/\n$/, '');
}

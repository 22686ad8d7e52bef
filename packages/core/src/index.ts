export * as ExtensionFilter from "./extension_filter";
export * as FileFinder from "./file_finder";
export * as FileLister from "./file_lister";
export * as FileSorter from "./file_sorter";
export * as Logger from "./logger";
export * as OutputFormatter from "./output_formatter";

// Shared types
export type { FileEntry } from "./file_lister";
export type { SortFlags, SortMode } from "./file_sorter";
export type { OutputFormat } from "./output_formatter";

import { Command } from 'commander';
import { FileSorter, OutputFormatter } from '@newestfiles/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * List Command Options
 * Maps CLI flags to FileFinder options
 */
export interface ListCommandOptions extends BaseCommandOptions {
  /** Extension filters as typed; a leading '.' is optional */
  extensions?: string[];
  /** Sort oldest to newest */
  oldest?: boolean;
  /** Sort by largest files first */
  largest?: boolean;
  /** Sort by smallest files first */
  smallest?: boolean;
}

/**
 * List Command - Thin wrapper around FileFinder
 *
 * This command is responsible for:
 * - Validating that at most one sort flag is set (before any walk)
 * - Walking the current directory through the injected FileFinder
 * - Printing the listing as text or JSON
 * - Setting exit codes
 */
export class ListCommand extends BaseCommand<ListCommandOptions> {
  protected description = 'List files under the current directory, newest first';

  /**
   * Register the list action on the root program
   */
  register(program: Command): void {
    program
      .description(this.description)
      .argument('[extensions...]', 'File extensions to include (e.g. .go txt); all files when omitted')
      .option('-j, --json', 'Output in JSON format', false)
      .option('-o, --oldest', 'Sort oldest to newest', false)
      .option('-l, --largest', 'Sort by largest files first', false)
      .option('-s, --smallest', 'Sort by smallest files first', false)
      .option('--verbose', 'Show technical details on failure', false)
      .option('--quiet', 'Suppress warnings about unreadable entries', false)
      .action(async (extensions: string[], options: ListCommandOptions) => {
        await this.execute({ ...options, extensions });
      });
  }

  async execute(options: ListCommandOptions): Promise<void> {
    let sortMode: FileSorter.SortMode;
    try {
      sortMode = FileSorter.resolveSortMode(options);
    } catch (error) {
      if (error instanceof FileSorter.SortOptionConflictError) {
        this.handleError(error.message, options, error);
        return;
      }
      throw error;
    }

    this.applyLogLevel(options);

    try {
      const fileFinder = await this.dependencyService.getFileFinder();
      const result = await fileFinder.find({
        extensions: options.extensions ?? [],
        sortMode,
      });

      console.log(OutputFormatter.renderListing(result.entries, {
        format: options.json ? 'json' : 'text',
        filtered: result.filtered,
      }));
    } catch (error) {
      this.handleError(
        `Failed to list files: ${error instanceof Error ? error.message : String(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }
}

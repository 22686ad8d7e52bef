/**
 * Base Command Class for the newestfiles CLI
 *
 * Provides common functionality and enforces standards across all commands.
 * Follows the Command Pattern and provides dependency injection support.
 */

import { Command } from 'commander';
import type { Logger } from '@newestfiles/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICompleteCommand } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICompleteCommand<TOptions> {

  protected readonly dependencyService = DependencyInjectionService.getInstance();
  protected readonly logger: Logger.Logger = this.dependencyService.getLogger();

  /**
   * Register the command with Commander.js
   * Must be implemented by each command
   */
  abstract register(program: Command): void;

  abstract execute(options: TOptions): Promise<void>;

  /**
   * --quiet keeps only errors. stdout carries command output, so nothing
   * here raises the level to debug or info.
   */
  protected applyLogLevel(options: TOptions): void {
    if (options.quiet) {
      this.logger.setLevel('error');
    }
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode
      }, null, 2));
    } else {
      // Only add ❌ if message doesn't already have it
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }
}

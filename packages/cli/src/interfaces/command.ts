/**
 * Standard Command Interface for the newestfiles CLI
 *
 * Commands implement this interface so they can be registered on a
 * Commander.js program and executed directly from tests.
 */

import { Command } from 'commander';

/**
 * Base options that all commands should support
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   * @param program - The Commander.js program instance
   */
  register(program: Command): void;
}

/**
 * Executable command interface
 */
export interface IExecutableCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> {
  execute(options: TOptions): Promise<void>;
}

export interface ICompleteCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  extends ICommand, IExecutableCommand<TOptions> { }

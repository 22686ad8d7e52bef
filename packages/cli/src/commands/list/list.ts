import { Command } from 'commander';
import { ListCommand } from './list-command';

/**
 * Register the list command
 */
export function registerListCommand(program: Command): void {
  const listCommand = new ListCommand();
  listCommand.register(program);
}

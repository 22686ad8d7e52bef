import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { registerListCommand } from './commands/list/list';

/**
 * Reads the CLI version from the package.json next to src/ (or dist/)
 */
export function readPackageVersion(): string {
  const packageJsonPath = path.join(__dirname, '..', 'package.json');
  const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

/**
 * Builds the newestfiles program. The list action lives on the root
 * command, so `newestfiles -j go` needs no sub-command name.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('newestfiles')
    .version(readPackageVersion());

  registerListCommand(program);

  return program;
}

/**
 * @flowport/cli
 *
 * CLI entry point for Flowport commands.
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { diffCommand, rewriteCommand } from './commands';
import { exitCodeFor } from './exit-codes';
import { logFullError } from './logger';

const program = new Command();

program
  .name('flowport')
  .description('Reconcile contact center snapshots and plan resource copies')
  .version('0.1.0')
  .exitOverride();

program.addCommand(diffCommand.exitOverride(), { isDefault: true });
program.addCommand(rewriteCommand.exitOverride());

program.parseAsync(process.argv).catch((error: unknown) => {
  const code = exitCodeFor(error);
  // commander has already printed its own usage errors
  if (!(error instanceof CommanderError)) {
    console.error(chalk.red(`\n  Error: ${error instanceof Error ? error.message : String(error)}\n`));
    logFullError('flowport', error, { argv: process.argv.slice(2) });
  }
  process.exitCode = code;
});

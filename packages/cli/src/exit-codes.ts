/**
 * Process exit codes
 * 0 success, 1 runtime error, 2 usage error
 */

import { CommanderError } from 'commander';

export const EXIT_SUCCESS = 0;
export const EXIT_RUNTIME_ERROR = 1;
export const EXIT_USAGE_ERROR = 2;

/**
 * With exitOverride set, commander throws for --help and --version too;
 * those carry exit code 0
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? EXIT_SUCCESS : EXIT_USAGE_ERROR;
  }
  return EXIT_RUNTIME_ERROR;
}

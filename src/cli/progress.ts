/**
 * Step reporter for CLI commands
 *
 * Writes to stderr so `--format json` output on stdout stays clean.
 * Silent unless verbose, except for failures.
 */

import chalk from 'chalk';

export interface Spinner {
  start(message: string): void;
  succeed(message: string): void;
  fail(message: string): void;
}

export function createSpinner(verbose = false): Spinner {
  return {
    start(message) {
      if (verbose) process.stderr.write(chalk.gray(`… ${message}\n`));
    },
    succeed(message) {
      if (verbose) process.stderr.write(chalk.green(`✔ ${message}\n`));
    },
    fail(message) {
      process.stderr.write(chalk.red(`✖ ${message}\n`));
    },
  };
}

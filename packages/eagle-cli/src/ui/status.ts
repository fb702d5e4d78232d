/**
 * Status - stderr diagnostics
 *
 * stdout carries data only; every human-facing notice goes through here.
 * Quiet mode keeps errors and drops the rest.
 */

import chalk from 'chalk';
import type { OutputSink } from '../output/types.js';

export interface StatusReporter {
  success(message: string): void;
  error(message: string): void;
  warning(message: string): void;
  info(message: string): void;
  /** Dim secondary line, e.g. a recovery hint. */
  hint(message: string): void;
}

export interface StatusOptions {
  quiet?: boolean;
  /** Destination; process.stderr when omitted. */
  err?: OutputSink;
}

/**
 * Create a reporter bound to one invocation's quiet flag.
 */
export function createStatus(options: StatusOptions = {}): StatusReporter {
  const sink = (): OutputSink => options.err ?? process.stderr;
  const line = (text: string): void => {
    sink().write(text + '\n');
  };
  const unlessQuiet = (text: string): void => {
    if (!options.quiet) line(text);
  };

  return {
    success: (message) => unlessQuiet(`${chalk.green('✔')} ${message}`),
    error: (message) => line(`${chalk.red('✖')} ${message}`),
    warning: (message) => unlessQuiet(`${chalk.yellow('⚠')} ${message}`),
    info: (message) => unlessQuiet(`${chalk.blue('ℹ')} ${message}`),
    hint: (message) => unlessQuiet(chalk.gray(`  ${message}`)),
  };
}

#!/usr/bin/env node
/**
 * eaglet entry point.
 *
 * Exit codes: 0 success, 1 error, 2 usage, 3 connection, 4 partial batch.
 */

import { CommanderError } from 'commander';
import { EXIT_CODES } from './errors.js';
import { createProgram } from './index.js';
import { watchOutputErrors } from './output/stream.js';

const CLEAN_EXITS = new Set(['commander.helpDisplayed', 'commander.version', 'commander.help']);

async function main(): Promise<void> {
  watchOutputErrors(process.stdout, {
    err: process.stderr,
    setExitCode: (code) => {
      process.exitCode = code;
    },
    exit: () => process.exit(),
  });

  try {
    await createProgram().parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      process.exitCode = CLEAN_EXITS.has(err.code) && err.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE;
      return;
    }
    throw err;
  }
}

main().catch((err: unknown) => {
  process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = EXIT_CODES.ERROR;
});

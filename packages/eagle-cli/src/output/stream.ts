/**
 * Asynchronous write failures on the output stream.
 *
 * process.stdout reports EPIPE and other write failures through an 'error'
 * event rather than a throw from write(), so render() never sees them.
 */

import { EXIT_CODES, WriteError, type ExitCode } from '../errors.js';
import type { OutputSink } from './types.js';

export interface ErrorEmitter {
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export interface OutputErrorHandlers {
  err: OutputSink;
  setExitCode(code: ExitCode): void;
  /** Stop the process once the stream is unusable. */
  exit(): void;
}

function isBrokenPipe(error: Error): boolean {
  return 'code' in error && error.code === 'EPIPE';
}

/**
 * Turn output stream errors into a WriteError report. A closed reader
 * (EPIPE) ends the process quietly with the exit code it already has.
 */
export function watchOutputErrors(stream: ErrorEmitter, handlers: OutputErrorHandlers): void {
  stream.on('error', (error) => {
    if (!isBrokenPipe(error)) {
      const failure = new WriteError(error.message);
      handlers.err.write(`Error: ${failure.message}\n`);
      handlers.setExitCode(EXIT_CODES.ERROR);
    }
    handlers.exit();
  });
}

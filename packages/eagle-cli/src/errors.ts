/**
 * Error taxonomy and exit codes.
 *
 * Every failure the CLI reports is either a CliError (which knows its exit
 * code) or a client error from @eaglet/api, mapped through ERROR_MAPPINGS.
 */

import { isEagleError, type EagleErrorCode } from '@eaglet/api';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
  USAGE: 2,
  CONNECTION: 3,
  PARTIAL: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export class CliError extends Error {
  public readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode = EXIT_CODES.ERROR) {
    super(message);
    this.name = 'CliError';
    this.exitCode = exitCode;
  }
}

/** Bad flags, bad arguments, bad stdin input. */
export class UsageError extends CliError {
  constructor(message: string) {
    super(message, EXIT_CODES.USAGE);
    this.name = 'UsageError';
  }
}

/** Base for the three filter failure phases. All are usage errors. */
export class FilterError extends CliError {
  constructor(message: string) {
    super(message, EXIT_CODES.USAGE);
    this.name = 'FilterError';
  }
}

export class FilterParseError extends FilterError {
  public readonly position: number;

  constructor(detail: string, position: number) {
    super(`jq parse error: ${detail} at position ${position}`);
    this.name = 'FilterParseError';
    this.position = position;
  }
}

export class FilterCompileError extends FilterError {
  constructor(detail: string) {
    super(`jq compile error: ${detail}`);
    this.name = 'FilterCompileError';
  }
}

export class FilterRuntimeError extends FilterError {
  constructor(detail: string) {
    super(`jq runtime error: ${detail}`);
    this.name = 'FilterRuntimeError';
  }
}

/** A value could not be turned into JSON text. */
export class SerializationError extends CliError {
  constructor(detail: string) {
    super(`failed to serialize output: ${detail}`);
    this.name = 'SerializationError';
  }
}

/** The output stream rejected a write. */
export class WriteError extends CliError {
  constructor(detail: string) {
    super(`failed to write output: ${detail}`);
    this.name = 'WriteError';
  }
}

/** Some, but not all, operations of a batch failed. */
export class PartialFailureError extends CliError {
  public readonly failed: number;
  public readonly total: number;

  constructor(failed: number, total: number) {
    super(`${failed} of ${total} operation(s) failed`, EXIT_CODES.PARTIAL);
    this.name = 'PartialFailureError';
    this.failed = failed;
    this.total = total;
  }
}

interface ErrorMapping {
  exitCode: ExitCode;
  recoveryHints: string[];
}

const ERROR_MAPPINGS: Record<EagleErrorCode, ErrorMapping> = {
  CONNECTION_ERROR: {
    exitCode: EXIT_CODES.CONNECTION,
    recoveryHints: ['Make sure the Eagle app is running', 'Check EAGLE_HOST / EAGLE_PORT or --host / --port'],
  },
  API_ERROR: {
    exitCode: EXIT_CODES.ERROR,
    recoveryHints: [],
  },
  CONFIG_ERROR: {
    exitCode: EXIT_CODES.USAGE,
    recoveryHints: ['EAGLE_PORT must be an integer between 1 and 65535'],
  },
};

export interface DescribedError {
  message: string;
  exitCode: ExitCode;
  recoveryHints: string[];
}

/**
 * Reduce any thrown value to what the CLI prints and the code it exits with.
 */
export function describeError(err: unknown): DescribedError {
  if (err instanceof CliError) {
    return { message: err.message, exitCode: err.exitCode, recoveryHints: [] };
  }
  if (isEagleError(err)) {
    const mapping = ERROR_MAPPINGS[err.code];
    return { message: err.message, exitCode: mapping.exitCode, recoveryHints: mapping.recoveryHints };
  }
  if (err instanceof Error) {
    return { message: err.message, exitCode: EXIT_CODES.ERROR, recoveryHints: [] };
  }
  return { message: String(err), exitCode: EXIT_CODES.ERROR, recoveryHints: [] };
}

/**
 * Client error types. Each carries a stable `code` the CLI maps to exit codes.
 */

export type EagleErrorCode = 'API_ERROR' | 'CONNECTION_ERROR' | 'CONFIG_ERROR';

/** The service answered, but not with a usable success envelope. */
export class EagleApiError extends Error {
  public readonly code: EagleErrorCode = 'API_ERROR';
  public readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'EagleApiError';
    this.status = status;
  }
}

/** The service could not be reached or did not answer in time. */
export class EagleConnectionError extends Error {
  public readonly code: EagleErrorCode = 'CONNECTION_ERROR';
  public readonly url: string;

  constructor(message: string, url: string) {
    super(message);
    this.name = 'EagleConnectionError';
    this.url = url;
  }
}

/** Host, port or timeout settings failed validation. */
export class EagleConfigError extends Error {
  public readonly code: EagleErrorCode = 'CONFIG_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'EagleConfigError';
  }
}

export type EagleError = EagleApiError | EagleConnectionError | EagleConfigError;

export function isEagleError(err: unknown): err is EagleError {
  return (
    err instanceof EagleApiError ||
    err instanceof EagleConnectionError ||
    err instanceof EagleConfigError
  );
}

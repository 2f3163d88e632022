import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a single exchange runs past the client's per-attempt timeout.
 * Unlike {@link AbortError} this is a deadline, and the exchange may be retried.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static name = 'TimeoutError';

  /** Timeout that elapsed, in milliseconds */
  readonly timeout: number;

  constructor(message: string, timeout: number, opts?: ErrorOptions) {
    super(message, opts);
    this.name = TimeoutError.name;
    this.timeout = timeout;
  }
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}

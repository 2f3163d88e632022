import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error returned when every permitted attempt failed with a transient condition.
 * The cause is the failure of the final attempt.
 */
export class RetryExhaustedError extends Error {
  /** RetryExhaustedError error-name */
  static name = 'RetryExhaustedError';

  /** Attempts made, including the initial one */
  #attempts: number;

  /** Creates a new RetryExhaustedError with the number of attempts made */
  constructor(message: string, attempts: number, opts?: ErrorOptions) {
    super(message, opts);
    this.name = RetryExhaustedError.name;
    this.#attempts = attempts;
  }

  /** Attempts made, including the initial one */
  get attempts(): number {
    return this.#attempts;
  }

  /** Failure of the final attempt, when one was recorded */
  get lastError(): Error | null {
    return this.cause instanceof Error ? this.cause : null;
  }
}

/**
 * Type guard for {@link RetryExhaustedError}.
 */
export function isRetryExhaustedError(error: unknown): error is RetryExhaustedError {
  return isErrorType(RetryExhaustedError, error);
}

/**
 * Extract a {@link RetryExhaustedError} from an unknown error value, following nested causes.
 */
export function getRetryExhaustedError(error: unknown): null | RetryExhaustedError {
  return unwrapErrorType(RetryExhaustedError, error);
}

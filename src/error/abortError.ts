import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the caller's `AbortSignal` fires before an operation finished,
 * either while an exchange was in flight or while waiting to retry.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  static name = 'AbortError';

  /** Exchanges submitted before the operation was cancelled */
  #attempts: number;

  /** Creates a new AbortError, recording how many attempts had been made */
  constructor(message: string, attempts = 0, opts?: ErrorOptions) {
    super(message, opts);
    this.name = AbortError.name;
    this.#attempts = attempts;
  }

  /** Exchanges submitted before the operation was cancelled */
  get attempts(): number {
    return this.#attempts;
  }
}

/**
 * Type guard for {@link AbortError}.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}

/**
 * Extract an {@link AbortError} from an unknown error value, following nested causes.
 */
export function getAbortError(error: unknown): null | AbortError {
  return unwrapErrorType(AbortError, error);
}

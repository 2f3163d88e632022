import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error returned when a transport failure is not recognised as transient, so no further
 * attempts were made. The cause is the transport failure.
 */
export class RetrySuppressedError extends Error {
  /** RetrySuppressedError error-name */
  static name = 'RetrySuppressedError';

  #attempts: number;

  constructor(message: string, attempts: number, opts?: ErrorOptions) {
    super(message, opts);
    this.name = RetrySuppressedError.name;
    this.#attempts = attempts;
  }

  /** Attempts made before retrying stopped */
  get attempts(): number {
    return this.#attempts;
  }
}

/**
 * Type guard for {@link RetrySuppressedError}.
 */
export function isRetrySuppressedError(error: unknown): error is RetrySuppressedError {
  return isErrorType(RetrySuppressedError, error);
}

/**
 * Extract a {@link RetrySuppressedError} from an unknown error value, following nested causes.
 */
export function getRetrySuppressedError(error: unknown): null | RetrySuppressedError {
  return unwrapErrorType(RetrySuppressedError, error);
}

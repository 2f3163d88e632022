import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error returned when a resource URL cannot be assembled from the base URL and path segments.
 */
export class ConstructURLError extends Error {
  /** ConstructURLError error-name */
  static name = 'ConstructURLError';

  /** The URL as far as it was assembled */
  #url: string;

  constructor(message: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.name = ConstructURLError.name;
    this.#url = url;
  }

  /** The URL as far as it was assembled */
  get url(): string {
    return this.#url;
  }
}

/**
 * Extract a {@link ConstructURLError} from an unknown error value, following nested causes.
 */
export function getConstructURLError(error: unknown): null | ConstructURLError {
  return unwrapErrorType(ConstructURLError, error);
}

/**
 * Type guard for {@link ConstructURLError}.
 */
export function isConstructURLError(error: unknown): error is ConstructURLError {
  return isErrorType(ConstructURLError, error);
}

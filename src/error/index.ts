/**
 * Error entrypoint: exports the client's error classes and helpers for identifying and
 * unwrapping them. Use this when you only need error utilities without the client.
 * @module
 */

/** Error returned when the caller's signal cancels an operation. */
/** Type guard that checks if an error is an {@link AbortError}. */
/** Extract an {@link AbortError} from an unknown error value, following nested causes. */
export { AbortError, getAbortError, isAbortError } from './abortError.js';

/** Error representing a failure to assemble a resource URL. */
/** Extract a {@link ConstructURLError} from an unknown error value, following nested causes. */
/** Type guard for {@link ConstructURLError}. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';

/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';

/** Error representing retry attempts exhausted. */
/** Extract a {@link RetryExhaustedError} from an unknown error value, following nested causes. */
/** Type guard for {@link RetryExhaustedError}. */
export { getRetryExhaustedError, isRetryExhaustedError, RetryExhaustedError } from './retryExhaustedError.js';

/** Error representing a non-transient transport failure that stopped retrying. */
/** Extract a {@link RetrySuppressedError} from an unknown error value, following nested causes. */
/** Type guard for {@link RetrySuppressedError}. */
export { getRetrySuppressedError, isRetrySuppressedError, RetrySuppressedError } from './retrySuppressedError.js';

/** Structured error for non-2xx service responses, plus the normalizer and matcher. */
export {
  ANY_SERVICE_ERROR,
  getServiceError,
  isServiceError,
  matchesServiceError,
  parseServiceError,
  ServiceError,
  type ServiceErrorDetails,
} from './serviceError.js';

/** Error raised when a single exchange exceeds the per-attempt timeout. */
/** Type guard that checks if an error is a {@link TimeoutError}. */
export { isTimeoutError, TimeoutError } from './timeoutError.js';

/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './unwrapErrorType.js';

/** Error returned when a payload cannot be decoded into the requested shape. */
/** Extract a {@link ValidationError} from an unknown error value, following nested causes. */
/** Type guard that checks if an error is a {@link ValidationError}. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';

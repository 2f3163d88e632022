/**
 * Core entrypoint: exports the artifact client, its defaults and request types.
 * Import from here if you only need the client/types without error helpers.
 * @module
 */

/**
 * Constructor options accepted by {@link ArtifactClient}.
 */
export type { ArtifactClientProps } from './client.js';

/**
 * Typed client for the artifact service: builds resource URLs, submits them with retry
 * and backoff, and decodes responses. All methods return error-first tuples.
 */
export { ArtifactClient } from './client.js';

/** Base URL, timeout and retry defaults, and the session header name. */
export { DEFAULTS, MAX_DELAY_MS, SESSION_HEADER } from './defaults.js';

export type { ClientOperation, Decoded, QueryFilters, ResponseSchema } from './types.js';

/** Retry engine the client runs every exchange through. */
export {
  backoffDelay,
  type ExecuteWithRetryOptions,
  executeWithRetry,
  isRetryableError,
  isRetryableStatus,
} from '../utils/retry.js';

export type {
  HeaderOptions,
  HttpMethod,
  OperationOptions,
  PreparedRequest,
  RetryConfig,
  TransportProviderDefinition,
} from '../types/request.js';

export type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';

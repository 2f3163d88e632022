/**
 * Root entrypoint: re-exports the client, configuration, transport, resources and error
 * utilities. Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Constructor options accepted by {@link ArtifactClient}.
 */
export type { ArtifactClientProps } from './core/client.js';

/**
 * Typed client for query/get/create/update/delete against the artifact service.
 */
export { ArtifactClient } from './core/client.js';

export { DEFAULTS, MAX_DELAY_MS, SESSION_HEADER } from './core/defaults.js';

export type { ClientOperation, Decoded, QueryFilters, ResponseSchema } from './core/types.js';

/** Environment configuration. */
export { createClientFromEnv, type Env, type EnvConfig, loadConfigFromEnv } from './config/index.js';

/** Default fetch-backed transport. */
export { FetchTransport, type FetchTransportOptions, mergeHeaderOptions } from './transport/index.js';

/** Typed wrappers per artifact collection. */
export {
  ArtifactResource,
  type BuildDefinition,
  buildDefinitions,
  type Changeset,
  changesets,
  type Defect,
  defects,
  type HierarchicalRequirement,
  hierarchicalRequirements,
  type ResourceDefinition,
  type Task,
  tasks,
} from './resources/index.js';

export type {
  HeaderOptions,
  HttpMethod,
  OperationOptions,
  PreparedRequest,
  RetryConfig,
  TransportProviderDefinition,
} from './types/request.js';

export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';

/**
 * Error returned when the caller's signal cancels an operation.
 */
export { AbortError } from './error/abortError.js';

/**
 * Error representing a failure to assemble a resource URL.
 */
export { ConstructURLError } from './error/constructUrlError.js';

/**
 * Error representing retry attempts exhausted.
 */
export { RetryExhaustedError } from './error/retryExhaustedError.js';

/**
 * Error representing a non-transient transport failure that stopped retrying.
 */
export { RetrySuppressedError } from './error/retrySuppressedError.js';

/**
 * Structured error for non-2xx service responses.
 */
export { ANY_SERVICE_ERROR, matchesServiceError, parseServiceError, ServiceError } from './error/serviceError.js';

/**
 * Error raised when one exchange exceeds the per-attempt timeout.
 */
export { TimeoutError } from './error/timeoutError.js';

/**
 * Error returned when decoding or validation of payloads fails.
 */
export { ValidationError } from './error/validationError.js';

/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './error/unwrapErrorType.js';

/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './error/isErrorType.js';

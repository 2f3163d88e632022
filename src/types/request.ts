import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the client and per operation; `undefined` removes a header. */
export type HeaderOptions = Headers | ReadonlyArray<readonly [string, string]> | Record<string, string | undefined>;

/** HTTP methods the artifact service is addressed with. Updates are POSTs. */
export type HttpMethod = 'GET' | 'POST' | 'DELETE';

/**
 * Retry behaviour for transient failures.
 *
 * Total attempts are `maxRetries + 1`. The wait before retry `n` (0-based) is
 * `retryDelayMs * 2^n` plus up to half of that again as jitter.
 */
export interface RetryConfig {
  /** Retries after the initial attempt; 0 means a single attempt. */
  maxRetries: number;
  /** Base delay before the first retry, in milliseconds. */
  retryDelayMs: number;
}

/**
 * A fully assembled, retry-safe exchange description.
 *
 * The serialized body is kept for the whole retry loop; every attempt gets a fresh
 * `Request` built from it, since a request body stream can only be read once.
 */
export interface PreparedRequest {
  method: HttpMethod;
  url: string;
  headers: Headers;
  body: string | null;
}

/**
 * The one capability the client needs from a network stack: submit one request and hand
 * back the response, or the failure that prevented one.
 *
 * Any status code counts as a response; classifying it is the client's job. The caller
 * owns the returned body and releases it by reading or cancelling it.
 */
export interface TransportProviderDefinition {
  /** Submits one request. The request's `signal` must be honoured. */
  send: (request: Request) => SafeWrapAsync<Error, Response>;
}

/** Per-operation options. */
export interface OperationOptions {
  /** Cancels the operation, including any pending retry wait. */
  signal?: AbortSignal;
  /** Headers merged over the client defaults for this operation only. */
  headers?: HeaderOptions;
  /**
   * Per-attempt timeout in milliseconds, `false` to disable.
   * Defaults to the client timeout.
   */
  timeout?: number | false;
}

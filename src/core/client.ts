import { retryConfigSchema, timeoutSchema } from '../config/schema.js';
import { parseServiceError } from '../error/serviceError.js';
import { FetchTransport } from '../transport/client.js';
import { mergeHeaderOptions } from '../transport/utils.js';
import type {
  HeaderOptions,
  HttpMethod,
  OperationOptions,
  PreparedRequest,
  RetryConfig,
  TransportProviderDefinition,
} from '../types/request.js';
import { constructUrl, type SearchParams } from '../utils/constructUrl.js';
import { decodeBody, readResponseBody } from '../utils/readResponse.js';
import { executeWithRetry } from '../utils/retry.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import { DEFAULTS, SESSION_HEADER } from './defaults.js';
import type { ClientOperation, Decoded, QueryFilters, ResponseSchema } from './types.js';

/** Configuration for constructing an {@link ArtifactClient}. */
export interface ArtifactClientProps {
  /** API key sent in the `ZSESSIONID` header of every request. */
  apiKey: string;
  /**
   * Service root resource paths are appended to.
   * @default DEFAULTS.baseUrl
   */
  baseUrl?: string;
  /** Transport requests are submitted through. Defaults to {@link FetchTransport}. */
  transport?: TransportProviderDefinition;
  /** Retry configuration; `null` or unset uses {@link DEFAULTS}. */
  retry?: RetryConfig | null;
  /**
   * Per-attempt timeout in milliseconds, `false` to disable. At most 2_147_483_647.
   * @default DEFAULTS.timeout
   */
  timeout?: number | false;
  /** Extra headers sent with every request. */
  headers?: HeaderOptions;
}

/** Description of one logical operation, before it becomes an exchange. */
interface OperationPlan {
  operation: ClientOperation;
  method: HttpMethod;
  segments: string[];
  search?: SearchParams;
  data?: unknown;
}

/**
 * Typed client for an artifact-tracking REST service that:
 * - builds resource URLs for query/get/create/update/delete,
 * - submits them through a pluggable transport with retry and backoff,
 * - turns non-2xx responses into {@link ServiceError}s,
 * - decodes 2xx bodies with the caller's Standard Schema.
 *
 * All operations return error-first tuples via {@link SafeWrapAsync}.
 *
 * The retry configuration is the only mutable state. Replacing it while operations are in
 * flight is not synchronized; operations read it once when they start.
 */
export class ArtifactClient {
  /** API key for the session header. */
  #apiKey: string;
  /** Service root; a trailing slash is dropped when URLs are built. */
  #baseUrl: string;
  /** Transport every exchange goes through. */
  #transport: TransportProviderDefinition;
  /** Retry configuration, `null` meaning defaults. */
  #retry: RetryConfig | null;
  /** Default per-attempt timeout. */
  #timeout: number | false;
  /** Headers applied to every request, before per-operation headers. */
  #defaultHeaders: Headers;

  constructor({
    apiKey,
    baseUrl = DEFAULTS.baseUrl,
    transport = new FetchTransport(),
    retry = null,
    timeout = DEFAULTS.timeout,
    headers,
  }: ArtifactClientProps) {
    this.#apiKey = apiKey;
    this.#baseUrl = baseUrl;
    this.#transport = transport;
    this.#retry = retry;
    this.#timeout = timeout;
    this.#defaultHeaders = mergeHeaderOptions({ Accept: 'application/json' }, headers);
  }

  /** Transport handle the client submits requests through. */
  get transport(): TransportProviderDefinition {
    return this.#transport;
  }

  /** Explicit retry configuration, or `null` when the defaults apply. */
  get retryConfig(): RetryConfig | null {
    return this.#retry;
  }

  /**
   * Replaces the retry configuration wholesale; `null` restores the defaults.
   * Fields are not merged with the previous configuration.
   */
  setRetryConfig(config: RetryConfig | null) {
    this.#retry = config ? { ...config } : null;
  }

  /**
   * Searches a resource collection: `GET {base}/{type}?fetch=true&query=( key = value )…`.
   *
   * @param resourceType - Collection path segment, e.g. `defect`.
   * @param filters - Equality filters, one `query` parameter each.
   * @param schema - Shape the response body is decoded into.
   */
  query<Schema extends ResponseSchema>(
    resourceType: string,
    filters: QueryFilters,
    schema: Schema,
    opts?: OperationOptions,
  ): SafeWrapAsync<Error, Decoded<Schema>> {
    const query = Object.entries(filters).map(([key, value]) => `( ${key} = ${String(value)} )`);

    return this.#execute(
      { operation: 'query', method: 'GET', segments: [resourceType], search: { fetch: 'true', query } },
      schema,
      opts,
    );
  }

  /**
   * Reads one object: `GET {base}/{type}/{id}?fetch=true`.
   */
  get<Schema extends ResponseSchema>(
    resourceType: string,
    id: string,
    schema: Schema,
    opts?: OperationOptions,
  ): SafeWrapAsync<Error, Decoded<Schema>> {
    return this.#execute(
      { operation: 'get', method: 'GET', segments: [resourceType, id], search: { fetch: 'true' } },
      schema,
      opts,
    );
  }

  /**
   * Creates an object: `POST {base}/{type}/create` with `data` as JSON body.
   */
  create<Schema extends ResponseSchema>(
    resourceType: string,
    data: unknown,
    schema: Schema,
    opts?: OperationOptions,
  ): SafeWrapAsync<Error, Decoded<Schema>> {
    return this.#execute(
      { operation: 'create', method: 'POST', segments: [resourceType, 'create'], data },
      schema,
      opts,
    );
  }

  /**
   * Updates an object: `POST {base}/{type}/{id}` with `data` as JSON body.
   * The service models updates as POST, not PUT or PATCH.
   */
  update<Schema extends ResponseSchema>(
    resourceType: string,
    id: string,
    data: unknown,
    schema: Schema,
    opts?: OperationOptions,
  ): SafeWrapAsync<Error, Decoded<Schema>> {
    return this.#execute({ operation: 'update', method: 'POST', segments: [resourceType, id], data }, schema, opts);
  }

  /**
   * Deletes an object: `DELETE {base}/{type}/{id}?fetch=true`.
   */
  delete<Schema extends ResponseSchema>(
    resourceType: string,
    id: string,
    schema: Schema,
    opts?: OperationOptions,
  ): SafeWrapAsync<Error, Decoded<Schema>> {
    return this.#execute(
      { operation: 'delete', method: 'DELETE', segments: [resourceType, id], search: { fetch: 'true' } },
      schema,
      opts,
    );
  }

  /**
   * Runs one logical operation end to end.
   *
   * - Resolves the retry configuration and builds the prepared exchange.
   * - Hands it to the retry engine; a failure there has no response to classify and is
   *   returned wrapped as an execution error.
   * - A final non-2xx response becomes a {@link ServiceError}, returned as-is.
   * - A final 2xx response is decoded with `schema`.
   *
   * @returns A tuple `[error, result]` where `result` is the decoded body.
   */
  async #execute<Schema extends ResponseSchema>(
    { operation, method, segments, search, data }: OperationPlan,
    schema: Schema,
    { signal, headers, timeout = this.#timeout }: OperationOptions = {},
  ): SafeWrapAsync<Error, Decoded<Schema>> {
    const [errRetry, retry] = await validator(this.#retry ?? DEFAULTS, retryConfigSchema);
    if (errRetry) {
      return [new Error(`error resolving retry configuration in ${operation}`, { cause: errRetry }), null];
    }

    const [errTimeout, attemptTimeout] = await validator(timeout, timeoutSchema);
    if (errTimeout) {
      return [new Error(`error resolving timeout in ${operation}`, { cause: errTimeout }), null];
    }

    const [errUrl, url] = constructUrl(this.#baseUrl, segments, search);
    if (errUrl) {
      return [new Error(`error constructing URL in ${operation}`, { cause: errUrl }), null];
    }

    let body: string | null = null;
    if (data !== undefined) {
      const [errBody, serialized] = safeWrap(() => JSON.stringify(data));
      if (errBody) {
        return [new Error(`error serializing request body in ${operation}`, { cause: errBody }), null];
      }
      body = serialized;
    }

    const request: PreparedRequest = {
      method,
      url,
      body,
      headers: mergeHeaderOptions(
        this.#defaultHeaders,
        body !== null ? { 'Content-Type': 'application/json' } : undefined,
        headers,
        { [SESSION_HEADER]: this.#apiKey },
      ),
    };

    const [errExecute, response] = await executeWithRetry({
      transport: this.#transport,
      request,
      retry,
      signal,
      timeout: attemptTimeout,
    });
    if (errExecute) {
      return [new Error(`error executing request in ${operation}`, { cause: errExecute }), null];
    }

    const [errRead, text] = await readResponseBody(response);
    if (errRead) {
      return [new Error(`error reading response in ${operation}`, { cause: errRead }), null];
    }

    if (response.status < 200 || response.status >= 300) {
      return [parseServiceError(response.status, text), null];
    }

    const [errDecode, decoded] = await decodeBody(text, schema);
    if (errDecode) {
      return [new Error(`error decoding response in ${operation}`, { cause: errDecode }), null];
    }

    return [null, decoded];
  }
}

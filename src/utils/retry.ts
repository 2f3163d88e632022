import { MAX_DELAY_MS } from '../core/defaults.js';
import { AbortError } from '../error/abortError.js';
import { RetryExhaustedError } from '../error/retryExhaustedError.js';
import { RetrySuppressedError } from '../error/retrySuppressedError.js';
import { TimeoutError } from '../error/timeoutError.js';
import type { PreparedRequest, RetryConfig, TransportProviderDefinition } from '../types/request.js';
import { readResponseBody, releaseResponseBody } from './readResponse.js';
import { createTimeoutSignal, mergeSignals } from './signals.js';
import { sleep } from './sleep.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/** Message fragments of transport failures that are worth another attempt. */
const TRANSIENT_MESSAGES = ['connection refused', 'connection reset', 'timeout', 'temporary failure'];

/** Node socket and undici error codes of transport failures that are worth another attempt. */
const TRANSIENT_CODES = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
];

/** Options for {@link executeWithRetry}. */
export interface ExecuteWithRetryOptions {
  /** Transport the exchange is submitted through. */
  transport: TransportProviderDefinition;
  /** Exchange to submit; a fresh `Request` is built from it for every attempt. */
  request: PreparedRequest;
  /** Effective retry configuration. */
  retry: RetryConfig;
  /** Caller's cancellation signal, honoured by the exchange and every backoff wait. */
  signal?: AbortSignal | null;
  /** Per-attempt timeout in milliseconds; `false` or `0` disables it. */
  timeout?: number | false;
  /** Source of randomness for jitter, in `[0, 1)`. */
  random?: () => number;
}

/**
 * Whether a status code indicates a transient server condition (5xx).
 * 4xx is never retried: it describes the request, not the server's state.
 */
export function isRetryableStatus(status: number): boolean {
  return status >= 500 && status < 600;
}

/**
 * Whether a transport failure is transient.
 *
 * Looks through the whole cause chain for a per-attempt {@link TimeoutError}, a message
 * naming a transient condition, or a transient socket error code.
 */
export function isRetryableError(err: unknown): boolean {
  let current: unknown = err;

  while (typeof current === 'object' && current !== null) {
    if (current instanceof TimeoutError) {
      return true;
    }

    const message = Reflect.get(current, 'message');
    if (typeof message === 'string') {
      const lowered = message.toLowerCase();
      if (TRANSIENT_MESSAGES.some((fragment) => lowered.includes(fragment))) {
        return true;
      }
    }

    const code = Reflect.get(current, 'code');
    if (typeof code === 'string' && TRANSIENT_CODES.includes(code)) {
      return true;
    }

    current = Reflect.get(current, 'cause');
  }

  return false;
}

/**
 * Backoff before retry number `attempt + 1`: `retryDelayMs * 2^attempt`, plus jitter
 * drawn uniformly from `[0, delay / 2)`, capped at {@link MAX_DELAY_MS}.
 */
export function backoffDelay(attempt: number, retryDelayMs: number, random: () => number = Math.random): number {
  const delay = Math.min(retryDelayMs * 2 ** attempt, MAX_DELAY_MS);
  if (!(delay > 0)) {
    return 0;
  }

  return Math.min(delay + Math.floor(random() * (delay / 2)), MAX_DELAY_MS);
}

/**
 * Reads a response to the end and returns a detached copy, so nothing of the exchange
 * outlives its attempt.
 */
async function bufferResponse(response: Response): SafeWrapAsync<Error, Response> {
  const [errRead, text] = await readResponseBody(response);
  if (errRead) {
    return [errRead, null];
  }

  return safeWrap<Error, Response>(
    () =>
      new Response(text === '' ? null : text, {
        status: response.status,
        statusText: response.statusText,
        headers: response.headers,
      }),
  );
}

/**
 * Submits a prepared exchange, retrying transient failures with exponential backoff.
 *
 * - Transport failures are retried when {@link isRetryableError} says so. Otherwise the
 *   result is a {@link RetrySuppressedError}; on the last attempt a {@link RetryExhaustedError}.
 * - Responses are retried only for 5xx. Any other response, and a 5xx on the last attempt,
 *   is returned as-is for the caller to classify.
 * - Once the caller's signal fires no further attempt is made; the result is an
 *   {@link AbortError} wrapping the latest attempt's failure.
 * - The returned response is already read into memory, under the per-attempt timeout.
 *   Timers and listeners of an attempt are released when it ends.
 *
 * @returns A promise resolving to `[error, response]`.
 */
export async function executeWithRetry({
  transport,
  request,
  retry: { maxRetries, retryDelayMs },
  signal,
  timeout,
  random = Math.random,
}: ExecuteWithRetryOptions): SafeWrapAsync<Error, Response> {
  let lastErr: Error | null = null;

  for (let attempt = 0; attempt <= maxRetries; attempt += 1) {
    const attempts = attempt + 1;

    if (signal?.aborted) {
      const cause = lastErr ?? signal.reason;
      return [new AbortError(`error request cancelled after ${attempt} attempts`, attempt, { cause }), null];
    }

    const scope = new AbortController();
    try {
      const attemptSignal = mergeSignals([signal, createTimeoutSignal(timeout, scope.signal)], scope.signal);
      const [errWrapped, wrapped] = await safeWrapAsync(() =>
        transport.send(
          new Request(request.url, {
            method: request.method,
            headers: request.headers,
            body: request.body,
            ...(attemptSignal && { signal: attemptSignal }),
          }),
        ),
      );

      // A transport that throws instead of returning a tuple is treated the same way
      const [errSend, response]: SafeWrap<Error, Response> = errWrapped ? [errWrapped, null] : wrapped;
      if (errSend) {
        if (signal?.aborted) {
          const cancelled = new AbortError(`error request cancelled after ${attempts} attempts`, attempts, {
            cause: errSend,
          });
          return [cancelled, null];
        }

        if (!isRetryableError(errSend)) {
          return [new RetrySuppressedError('error further retries suppressed', attempts, { cause: errSend }), null];
        }

        if (attempt === maxRetries) {
          return [new RetryExhaustedError('error retries exhausted', attempts, { cause: errSend }), null];
        }

        lastErr = errSend;
      } else {
        if (!isRetryableStatus(response.status) || attempt === maxRetries) {
          const [errBuffer, buffered] = await bufferResponse(response);
          if (errBuffer) {
            if (signal?.aborted) {
              const cancelled = new AbortError(`error request cancelled after ${attempts} attempts`, attempts, {
                cause: errBuffer,
              });
              return [cancelled, null];
            }

            return [errBuffer, null];
          }

          return [null, buffered];
        }

        const [errRelease] = await releaseResponseBody(response);
        if (errRelease) {
          return [new Error('error releasing response before retry', { cause: errRelease }), null];
        }

        lastErr = new Error(`server returned status ${response.status}`);
      }
    } finally {
      scope.abort();
    }

    const [errSleep] = await safeWrapAsync(() => sleep(backoffDelay(attempt, retryDelayMs, random), signal));
    if (errSleep) {
      const cancelled = new AbortError(`error request cancelled after ${attempts} attempts`, attempts, {
        cause: lastErr,
      });
      return [cancelled, null];
    }
  }

  return [new RetryExhaustedError('error retries exhausted', maxRetries + 1, { cause: lastErr }), null];
}

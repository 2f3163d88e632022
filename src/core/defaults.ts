/**
 * Process-wide defaults, consulted only where a client or environment leaves a value unset.
 */
export const DEFAULTS = Object.freeze({
  /** Service root all resource paths are appended to. */
  baseUrl: 'https://rally1.rallydev.com/slm/webservice/v2.0',
  /** Per-attempt timeout in milliseconds. */
  timeout: 30_000,
  /** Retries after the initial attempt. */
  maxRetries: 3,
  /** Base backoff delay in milliseconds. */
  retryDelayMs: 1_000,
});

/** Longest delay a timer can wait, in milliseconds; Node fires anything longer after 1ms. */
export const MAX_DELAY_MS = 2_147_483_647;

/** Header carrying the API key on every request. */
export const SESSION_HEADER = 'ZSESSIONID';

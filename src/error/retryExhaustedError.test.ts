import { describe, expect, it } from 'vitest';
import { getRetryExhaustedError, isRetryExhaustedError, RetryExhaustedError } from './retryExhaustedError.js';

describe('RetryExhaustedError', () => {
  it('exposes attempts and the final failure', () => {
    const last = new Error('server returned status 503');
    const err = new RetryExhaustedError('error retries exhausted', 4, { cause: last });

    expect(err.attempts).toBe(4);
    expect(err.lastError).toBe(last);
    expect(err.name).toBe('RetryExhaustedError');
  });

  it('reports no final failure when the cause is not an error', () => {
    expect(new RetryExhaustedError('error retries exhausted', 1, { cause: null }).lastError).toBeNull();
    expect(new RetryExhaustedError('error retries exhausted', 1).lastError).toBeNull();
  });
});

describe('isRetryExhaustedError', () => {
  it('detects the error through causes', () => {
    const err = new Error('error executing request in query', {
      cause: new RetryExhaustedError('error retries exhausted', 2),
    });

    expect(isRetryExhaustedError(err)).toBe(true);
    expect(getRetryExhaustedError(err)?.attempts).toBe(2);
  });

  it('returns false for other errors', () => {
    expect(isRetryExhaustedError(new Error('boom'))).toBe(false);
    expect(getRetryExhaustedError(new Error('boom'))).toBeNull();
  });
});

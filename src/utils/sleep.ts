import { MAX_DELAY_MS } from '../core/defaults.js';

/**
 * Waits for the given number of milliseconds.
 *
 * When a `signal` is given the wait is preemptible: the promise rejects with the
 * signal's reason as soon as it fires, and immediately when it already has. Waits past
 * {@link MAX_DELAY_MS} are cut to that length.
 *
 * @example
 * await sleep(250);
 * await sleep(backoff, controller.signal);
 */
export function sleep(ms: number, signal?: AbortSignal | null): Promise<void> {
  const delay = Math.min(ms, MAX_DELAY_MS);

  if (!signal) {
    return new Promise((resolve) => setTimeout(resolve, delay));
  }

  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timeout);
      reject(signal.reason);
    };

    const timeout = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, delay);

    signal.addEventListener('abort', onAbort, { once: true });
  });
}

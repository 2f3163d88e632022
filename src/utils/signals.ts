import { MAX_DELAY_MS } from '../core/defaults.js';
import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} after `timeoutMs`.
 *
 * When `timeoutMs` is `false`, `0` or unset, no signal is created. Timeouts past
 * {@link MAX_DELAY_MS} wait that long instead. The timer does not keep the process alive,
 * and is cleared once `scope` aborts.
 *
 * @returns An `AbortSignal` that aborts after the timeout, or `null`.
 */
export function createTimeoutSignal(timeoutMs?: number | false, scope?: AbortSignal): AbortSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();

  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`, timeoutMs)),
    Math.min(timeoutMs, MAX_DELAY_MS),
  );
  timeout.unref?.();

  controller.signal.addEventListener('abort', () => clearTimeout(timeout), {
    once: true,
  });
  scope?.addEventListener('abort', () => clearTimeout(timeout), { once: true });

  return controller.signal;
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * - No signals: returns `null`.
 * - One signal: returned as-is.
 * - Several: a new signal aborts when any source aborts, carrying that source's `reason`,
 *   or an {@link AbortError} when the source has none.
 *
 * The listeners placed on the sources are removed once the merged signal or `scope` aborts.
 */
export function mergeSignals(
  signals: Array<AbortSignal | null | undefined>,
  scope?: AbortSignal,
): AbortSignal | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return active[0];
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const abortFrom = (source: AbortSignal) => {
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  const detach = () => {
    for (const remove of listeners) {
      remove();
    }
  };
  controller.signal.addEventListener('abort', detach, { once: true });
  scope?.addEventListener('abort', detach, { once: true });

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return controller.signal;
}

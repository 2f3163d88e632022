import type { HeaderOptions } from '../types/request.js';

/**
 * Normalizes the different header container shapes into `[name, value]` pairs, keeping
 * `undefined` values so they can remove a header during a merge.
 */
function toEntries(headers?: HeaderOptions): Iterable<readonly [string, string | undefined]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (isEntryList(headers)) {
    return headers;
  }

  return Object.entries(headers);
}

function isEntryList(headers: HeaderOptions): headers is ReadonlyArray<readonly [string, string]> {
  return Array.isArray(headers);
}

/**
 * Merges header layers into a single `Headers` instance; later layers win.
 *
 * A header set to `undefined` in a later layer removes it, which is how a single
 * operation drops a client default.
 */
export function mergeHeaderOptions(...layers: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const layer of layers) {
    for (const [key, value] of toEntries(layer)) {
      if (value === undefined) {
        merged.delete(key);
        continue;
      }

      merged.set(key, value);
    }
  }

  return merged;
}

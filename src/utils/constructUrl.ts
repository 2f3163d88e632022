import { ConstructURLError } from '../error/constructUrlError.js';
import { safeWrap, type SafeWrap } from './wrap.js';

/** Query parameters appended to a resource URL; arrays repeat the key once per value. */
export type SearchParams = Record<string, string | readonly string[] | undefined>;

/**
 * Builds an absolute resource URL: `{baseUrl}/{segment}/{segment}?{search}`.
 *
 * - A trailing `/` on `baseUrl` is dropped, so `https://host/v2/` and `https://host/v2`
 *   produce the same URL.
 * - Segments are percent-encoded individually.
 * - Search values get standard query encoding only (`URLSearchParams`), in insertion order.
 */
export function constructUrl(
  baseUrl: string,
  segments: readonly string[],
  search: SearchParams = {},
): SafeWrap<ConstructURLError, string> {
  const path = [baseUrl.replace(/\/+$/, ''), ...segments.map((segment) => encodeURIComponent(segment))].join('/');

  if (segments.some((segment) => segment === '')) {
    return [new ConstructURLError('error constructing URL, empty path segment', path), null];
  }

  const [errUrl, url] = safeWrap(() => new URL(path));
  if (errUrl) {
    return [new ConstructURLError(`error constructing URL from ${path}`, path, { cause: errUrl }), null];
  }

  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(search)) {
    if (value === undefined) {
      continue;
    }

    for (const item of typeof value === 'string' ? [value] : value) {
      searchParams.append(key, item);
    }
  }

  const query = searchParams.toString();
  if (query) {
    url.search = query;
  }

  return [null, url.toString()];
}

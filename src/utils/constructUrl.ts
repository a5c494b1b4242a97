import { ConstructURLError } from '../error/constructUrlError.js';
import type { SafeWrap } from './wrap.js';

/** Supported REST API version prefix, inserted between base URL and path. */
export const API_VERSION = '/v1';

/** A single query value; arrays are sent as repeated keys. */
export type QueryValue = string | number | boolean | null | undefined | ReadonlyArray<string | number | boolean>;

/** Query parameters appended to the request URL. */
export type QueryParams = Record<string, QueryValue>;

/**
 * Composes `baseUrl + API_VERSION + path` and appends the query string.
 *
 * - A trailing slash on `baseUrl` is dropped and a missing leading slash on `path` is added.
 * - `null` and `undefined` query values are skipped.
 * - Absolute URLs or paths already carrying the version prefix are rejected.
 */
export function constructUrl(baseUrl: string, path: string, query?: QueryParams): SafeWrap<Error, string> {
  if (/^[a-z][a-z\d+.-]*:\/\//i.test(path)) {
    return [new ConstructURLError('error constructing URL, path must be relative', path), null];
  }

  const relative = path.startsWith('/') ? path : `/${path}`;
  if (relative === API_VERSION || relative.startsWith(`${API_VERSION}/`)) {
    return [new ConstructURLError(`error constructing URL, path must not include ${API_VERSION}`, path), null];
  }

  let result = `${baseUrl.replace(/\/+$/, '')}${API_VERSION}${relative}`;

  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value === undefined || value === null) {
      continue;
    }

    if (Array.isArray(value)) {
      for (const item of value) {
        searchParams.append(key, String(item));
      }
      continue;
    }

    searchParams.set(key, String(value));
  }

  if (searchParams.size > 0) {
    result += `${result.includes('?') ? '&' : '?'}${searchParams.toString()}`;
  }

  return [null, result];
}

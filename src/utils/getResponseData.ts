import type { JsonValue } from '../types/json.js';
import type { FetchResponse } from '../types/request.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/** Body of a successful response, tagged by how it was decoded. */
export type ResponseData =
  | { kind: 'json'; data: JsonValue }
  | { kind: 'bytes'; data: Uint8Array }
  | { kind: 'empty'; data: null };

/**
 * Whether a `Content-Type` header denotes a JSON body.
 */
export function isJsonContentType(contentType: string | null): boolean {
  return contentType?.toLowerCase().includes('json') ?? false;
}

/**
 * Safely extracts the response body into a tuple-style result.
 *
 * Behavior:
 * - Status 204 or 205 gives `{ kind: 'empty' }`.
 * - If the `Content-Type` mentions `json`, the body is decoded with `JSON.parse`;
 *   an empty body gives `{ kind: 'empty' }`, a decoding failure returns
 *   `[Error, null]` with the original error as `cause`.
 * - Any other body is returned as bytes, unchanged (possibly empty).
 */
export async function getResponseData(response: FetchResponse): SafeWrapAsync<Error, ResponseData> {
  // 204 and 205 never carry a body
  if (response.status === 204 || response.status === 205) {
    return [null, { kind: 'empty', data: null }];
  }

  if (!isJsonContentType(response.headers.get('Content-Type'))) {
    const [errBytes, buffer] = await safeWrapAsync(() => response.arrayBuffer());
    if (errBytes) {
      return [new Error('error reading response body in getResponseData', { cause: errBytes }), null];
    }

    return [null, { kind: 'bytes', data: new Uint8Array(buffer) }];
  }

  // Use .text as reader, since double reads with text -> json would cause TypeError
  // due to the body being consumed already
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in getResponseData', { cause: errText }), null];
  }

  if (!text) {
    return [null, { kind: 'empty', data: null }];
  }

  const [errJson, json] = safeWrap<JsonValue>(() => JSON.parse(text));
  if (errJson) {
    return [new Error('error parsing json response body in getResponseData', { cause: errJson }), null];
  }

  return [null, { kind: 'json', data: json }];
}

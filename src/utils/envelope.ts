import { isJsonObject, type JsonValue } from '../types/json.js';
import { Resource } from './resource.js';
import type { SafeWrap } from './wrap.js';

/** Body of a single resource sent to the API. */
export type RequestBody = Record<string, unknown>;

/** Key a list response nests its resources under. */
export const ITEMS_KEY = 'items';

/**
 * Wraps a resource body under the container the endpoint expects,
 * e.g. `{ component: { name: 'API' } }`.
 */
export function wrapEnvelope(container: string, body: RequestBody): Record<string, RequestBody> {
  return { [container]: body };
}

function toResources(items: JsonValue[]): SafeWrap<Error, Resource[]> {
  const resources: Resource[] = [];
  for (const [index, item] of items.entries()) {
    if (!isJsonObject(item)) {
      return [new Error(`error unwrapping envelope, item ${index} is not an object`), null];
    }

    resources.push(new Resource(item));
  }

  return [null, resources];
}

/**
 * Turns a decoded body into resources without looking at the envelope:
 * an object becomes one {@link Resource}, a list becomes a list of them.
 */
export function toResource(body: JsonValue): SafeWrap<Error, Resource | Resource[]> {
  if (Array.isArray(body)) {
    return toResources(body);
  }

  if (!isJsonObject(body)) {
    return [new Error(`error decoding body, expected an object, got ${body === null ? 'null' : typeof body}`), null];
  }

  return [null, new Resource(body)];
}

/**
 * Unwraps a decoded response body.
 *
 * - `{ items: [...] }` becomes the list of items, in order.
 * - Any other object becomes a single {@link Resource}.
 * - A bare list is treated like `items`.
 */
export function unwrapEnvelope(body: JsonValue): SafeWrap<Error, Resource | Resource[]> {
  if (!isJsonObject(body) || !(ITEMS_KEY in body)) {
    return toResource(body);
  }

  const items = body[ITEMS_KEY];
  if (!Array.isArray(items)) {
    return [new Error(`error unwrapping envelope, ${ITEMS_KEY} is not a list`), null];
  }

  return toResources(items);
}


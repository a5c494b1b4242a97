import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isJsonObject, type JsonObject, type JsonValue } from '../types/json.js';
import { validator } from './validator.js';
import type { SafeWrapAsync } from './wrap.js';

/** Values held by a {@link Resource}; nested objects are resources themselves. */
export type ResourceValue = string | number | boolean | null | Resource | ResourceValue[];

function toResourceValue(value: JsonValue): ResourceValue {
  if (Array.isArray(value)) {
    return value.map(toResourceValue);
  }

  if (isJsonObject(value)) {
    return new Resource(value);
  }

  return value;
}

function toJsonValue(value: ResourceValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(toJsonValue);
  }

  if (value instanceof Resource) {
    return value.toJSON();
  }

  return value;
}

/**
 * Read-only, ordered view of a decoded JSON object.
 *
 * Fields are looked up explicitly with {@link Resource.get}; use
 * {@link Resource.validate} to turn a resource into a typed structure.
 *
 * @example
 * const component = new Resource({ id: 'c1', name: 'API' });
 * component.get('name'); // 'API'
 * const [err, typed] = await component.validate(z.object({ id: z.string(), name: z.string() }));
 */
export class Resource implements Iterable<[string, ResourceValue]> {
  /** Decoded fields in response order */
  #fields: ReadonlyMap<string, ResourceValue>;

  /** Creates a new Resource from a decoded JSON object */
  constructor(object: JsonObject = {}) {
    this.#fields = new Map(Object.entries(object).map(([key, value]) => [key, toResourceValue(value)]));
  }

  /** Number of fields */
  get size(): number {
    return this.#fields.size;
  }

  /** Value of a field, or `undefined` when the resource has no such field */
  get(key: string): ResourceValue | undefined {
    return this.#fields.get(key);
  }

  /** Whether the field is present (also when its value is `null`) */
  has(key: string): boolean {
    return this.#fields.has(key);
  }

  /** Field names in response order */
  keys(): string[] {
    return [...this.#fields.keys()];
  }

  /** Field entries in response order */
  entries(): [string, ResourceValue][] {
    return [...this.#fields.entries()];
  }

  [Symbol.iterator](): Iterator<[string, ResourceValue]> {
    return this.#fields.entries();
  }

  /** Plain JSON object equal to the decoded input */
  toJSON(): JsonObject {
    const object: JsonObject = {};
    for (const [key, value] of this.#fields) {
      object[key] = toJsonValue(value);
    }

    return object;
  }

  /**
   * Validates the resource against a Standard Schema (zod, valibot, ...) and
   * returns the schema's typed output.
   */
  validate<T extends StandardSchemaV1>(schema: T): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<T>> {
    return validator(this.toJSON(), schema);
  }
}

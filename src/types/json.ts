/** Any value `JSON.parse` can produce. */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

/** A decoded JSON object. */
export type JsonObject = { [key: string]: JsonValue };

/**
 * Narrows a decoded JSON value to a plain object (arrays and `null` excluded).
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

import { isJsonObject, type JsonValue } from '../types/json.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * A single error reported by the API.
 */
export interface ErrorEntry {
  /** Error code, `error` when the API did not send one. */
  code: string;
  /** Human readable description. */
  message?: string;
  /** Detailed description. */
  details?: string;
  /** Resource name the error relates to. */
  resource?: string;
  /** Field of the resource the error relates to, as a JSON pointer. */
  field?: string;
}

const FALLBACK_CODE = 'error';

function optionalString(value: JsonValue | undefined): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  return typeof value === 'string' ? value : JSON.stringify(value);
}

function toEntry(value: JsonValue): ErrorEntry {
  if (!isJsonObject(value)) {
    return { code: FALLBACK_CODE, message: optionalString(value) };
  }

  const entry: ErrorEntry = { code: optionalString(value.code) ?? FALLBACK_CODE };
  const message = optionalString(value.message);
  const details = optionalString(value.details ?? value.detail);
  const resource = optionalString(value.resource);
  const field = optionalString(value.field);

  if (message !== undefined) entry.message = message;
  if (details !== undefined) entry.details = details;
  if (resource !== undefined) entry.resource = resource;
  if (field !== undefined) entry.field = field;

  return entry;
}

/**
 * Normalizes a decoded error body into a list of {@link ErrorEntry}.
 *
 * Accepts a bare list of errors, `{ errors: [...] }`, `{ error: "..." | [...] }`,
 * a single error object or a plain string.
 */
export function toErrorEntries(payload: JsonValue): ErrorEntry[] {
  if (payload === null) {
    return [];
  }

  if (Array.isArray(payload)) {
    return payload.map(toEntry);
  }

  if (isJsonObject(payload)) {
    const nested = payload.errors ?? payload.error;
    if (Array.isArray(nested)) {
      return nested.map(toEntry);
    }

    if (typeof nested === 'string') {
      return [{ code: FALLBACK_CODE, message: nested }];
    }
  }

  return [toEntry(payload)];
}

function formatEntry({ code, message, field }: ErrorEntry): string {
  let line = code;
  if (message) {
    line += `: ${message}`;
  }

  if (field) {
    line += ` (${field})`;
  }

  return line;
}

/**
 * Base for errors the API reports with a JSON error body.
 *
 * The decoded body is kept verbatim in {@link ApiError.errors}, the normalized
 * view in {@link ApiError.entries}. The message lists one entry per line.
 */
export abstract class ApiError extends Error {
  /** ApiError error-name */
  name = 'ApiError';
  /** HTTP status of the response */
  readonly status: number;
  /** Decoded error body, as sent by the API */
  readonly errors: JsonValue;
  /** Normalized error entries */
  readonly entries: readonly ErrorEntry[];

  /** Creates a new ApiError from the response status and its decoded body */
  constructor(status: number, errors: JsonValue, opts?: ErrorOptions) {
    const entries = toErrorEntries(errors);
    super(entries.length ? entries.map(formatEntry).join('\n') : `HTTP Error: ${status}`, opts);

    this.status = status;
    this.errors = errors;
    this.entries = Object.freeze(entries);
  }
}

/**
 * Type guard for any {@link ApiError}.
 */
export function isApiError(error: unknown): error is ApiError {
  return isErrorType(ApiError, error);
}

/**
 * Extract an {@link ApiError} from an unknown error value, following nested causes.
 */
export function getApiError(error: unknown): null | ApiError {
  return unwrapErrorType(ApiError, error);
}

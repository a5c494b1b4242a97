import type { JsonValue } from '../types/json.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when an error response could not be understood, most commonly
 * because its body was not JSON. Holds the body text verbatim.
 */
export class UnknownError extends Error {
  /** UnknownError error-name */
  name = 'UnknownError';
  /** HTTP status of the response */
  readonly status: number;
  /** Raw body of the response */
  readonly body: string;

  /** Creates a new UnknownError with the status and raw body of the response */
  constructor(
    status: number,
    body: string,
    message = `unknown HTTP error response, json expected; status=${status}; body=${body}`,
    opts?: ErrorOptions,
  ) {
    super(message, opts);
    this.status = status;
    this.body = body;
  }
}

/**
 * Error raised for a well-formed error body sent with a status outside 4xx/5xx.
 */
export class UnexpectedStatusError extends UnknownError {
  /** UnexpectedStatusError error-name */
  name = 'UnexpectedStatusError';
  /** Decoded body of the response */
  readonly errors: JsonValue;

  /** Creates a new UnexpectedStatusError with the status, raw and decoded body */
  constructor(status: number, body: string, errors: JsonValue, opts?: ErrorOptions) {
    super(status, body, `unexpected HTTP error status ${status}`, opts);
    this.errors = errors;
  }
}

/**
 * Type guard for {@link UnknownError}, including {@link UnexpectedStatusError}.
 */
export function isUnknownError(error: unknown): error is UnknownError {
  return isErrorType(UnknownError, error);
}

/**
 * Extract an {@link UnknownError} from an unknown error value, following nested causes.
 */
export function getUnknownError(error: unknown): null | UnknownError {
  return unwrapErrorType(UnknownError, error);
}

/**
 * Type guard for {@link UnexpectedStatusError}.
 */
export function isUnexpectedStatusError(error: unknown): error is UnexpectedStatusError {
  return isErrorType(UnexpectedStatusError, error);
}

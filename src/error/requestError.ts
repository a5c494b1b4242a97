import { ApiError } from './apiError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the request was invalid, e.g. unknown query parameter,
 * bad credentials or a malformed envelope (HTTP 4xx other than 420 and 422).
 */
export class RequestError extends ApiError {
  /** RequestError error-name */
  name = 'RequestError';
}

/**
 * Type guard for {@link RequestError}.
 */
export function isRequestError(error: unknown): error is RequestError {
  return isErrorType(RequestError, error);
}

/**
 * Extract a {@link RequestError} from an unknown error value, following nested causes.
 */
export function getRequestError(error: unknown): null | RequestError {
  return unwrapErrorType(RequestError, error);
}

import { ApiError } from './apiError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the API servers hit an unexpected condition (HTTP 5xx).
 */
export class ServerError extends ApiError {
  /** ServerError error-name */
  name = 'ServerError';
}

/**
 * Type guard for {@link ServerError}.
 */
export function isServerError(error: unknown): error is ServerError {
  return isErrorType(ServerError, error);
}

/**
 * Extract a {@link ServerError} from an unknown error value, following nested causes.
 */
export function getServerError(error: unknown): null | ServerError {
  return unwrapErrorType(ServerError, error);
}

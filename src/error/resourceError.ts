import { ApiError } from './apiError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the payload carried invalid or missing attributes (HTTP 422).
 */
export class ResourceError extends ApiError {
  /** ResourceError error-name */
  name = 'ResourceError';
}

/**
 * Type guard for {@link ResourceError}.
 */
export function isResourceError(error: unknown): error is ResourceError {
  return isErrorType(ResourceError, error);
}

/**
 * Extract a {@link ResourceError} from an unknown error value, following nested causes.
 */
export function getResourceError(error: unknown): null | ResourceError {
  return unwrapErrorType(ResourceError, error);
}

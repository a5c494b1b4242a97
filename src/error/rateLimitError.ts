import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the rate limit was exceeded (HTTP 420).
 * Carries no payload; retrying is left to the caller.
 */
export class RateLimitError extends Error {
  /** RateLimitError error-name */
  name = 'RateLimitError';

  /** Creates a new RateLimitError */
  constructor(message = 'rate limit exceeded', opts?: ErrorOptions) {
    super(message, opts);
  }
}

/**
 * Type guard for {@link RateLimitError}.
 */
export function isRateLimitError(error: unknown): error is RateLimitError {
  return isErrorType(RateLimitError, error);
}

/**
 * Extract a {@link RateLimitError} from an unknown error value, following nested causes.
 */
export function getRateLimitError(error: unknown): null | RateLimitError {
  return unwrapErrorType(RateLimitError, error);
}

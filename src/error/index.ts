/**
 * Error entrypoint: exports the error taxonomy and helpers for identifying and unwrapping error types.
 * Use this when you only need error utilities without the core client.
 * @module
 */

/** Base of the errors the API reports with a JSON body, plus its normalized entries. */
export { ApiError, type ErrorEntry, getApiError, isApiError, toErrorEntries } from './apiError.js';
/** Error raised for an invalid client configuration, before any request is sent. */
export { ConfigurationError, getConfigurationError, isConfigurationError } from './configurationError.js';
/** Error representing a error constructing URL. */
/** Extract an {@link ConstructURLError} from an unknown error value, following nested causes. */
/** Type guard for {@link ConstructURLError}. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Extracts an {@link HTTPError} from an unknown error value. */
/** Error representing a non-2xx HTTP response. */
/** Type guard that checks if an error is an {@link HTTPError}. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error raised when the rate limit was exceeded (HTTP 420). */
export { getRateLimitError, isRateLimitError, RateLimitError } from './rateLimitError.js';
/** Error raised for a malformed or rejected request (HTTP 4xx). */
export { getRequestError, isRequestError, RequestError } from './requestError.js';
/** Error raised for invalid or missing resource attributes (HTTP 422). */
export { getResourceError, isResourceError, ResourceError } from './resourceError.js';
/** Error raised when the API failed to handle the request (HTTP 5xx). */
export { getServerError, isServerError, ServerError } from './serverError.js';
/** Type guard that checks if an error is a {@link TimeoutError}. */
/** Error thrown when a request exceeds the configured timeout. */
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
/** Errors raised for error responses that could not be classified. */
export {
  getUnknownError,
  isUnexpectedStatusError,
  isUnknownError,
  UnexpectedStatusError,
  UnknownError,
} from './unknownError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Extracts a {@link ValidationError} from an unknown error value. */
/** Type guard that checks if an error is a {@link ValidationError}. */
/** Error thrown when validation of payloads fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';

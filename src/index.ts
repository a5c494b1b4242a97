/**
 * Root entrypoint: re-exports the envelope client, its configuration, logging and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * HTTP client for the status page API, wrapping and unwrapping the JSON envelope.
 */
export { EnvelopeClient } from './core/client.js';

/**
 * Options, props and response shapes of {@link EnvelopeClient}.
 */
export type {
  EnvelopeBody,
  EnvelopeClientProps,
  EnvelopeRequestOptions,
  EnvelopeResponse,
  HttpMethod,
  QueryParams,
  RequestBody,
} from './core/types.js';

/**
 * Configuration schema, defaults and loaders.
 */
export {
  type Configuration,
  type ConfigurationInput,
  configurationFromEnv,
  configurationSchema,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT,
  loadConfiguration,
  MAX_TIMEOUT,
} from './config/configuration.js';

/**
 * Logger contract and the bundled implementations.
 */
export { ConsoleLogger, type LogEntry, type Logger, type LogLevel, noopLogger } from './logger/logger.js';

/**
 * Default transport and its contract, for custom providers.
 */
export { FetchClient } from './fetch/client.js';
export type {
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  FetchResponse,
  HeaderOptions,
} from './types/request.js';

/**
 * Decoded response object with explicit lookup.
 */
export { Resource, type ResourceValue } from './utils/resource.js';

/**
 * Tuple-based `[error, data]` results returned by every operation.
 */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';

/**
 * JSON values as decoded from responses.
 */
export type { JsonObject, JsonValue } from './types/json.js';

/**
 * Error raised for a malformed or rejected request (HTTP 4xx).
 */
export { RequestError } from './error/requestError.js';

/**
 * Error raised for invalid or missing resource attributes (HTTP 422).
 */
export { ResourceError } from './error/resourceError.js';

/**
 * Error raised when the API failed to handle the request (HTTP 5xx).
 */
export { ServerError } from './error/serverError.js';

/**
 * Error raised when the rate limit was exceeded (HTTP 420).
 */
export { RateLimitError } from './error/rateLimitError.js';

/**
 * Error raised for an invalid client configuration.
 */
export { ConfigurationError } from './error/configurationError.js';

/**
 * Errors raised for error responses that could not be classified.
 */
export { UnexpectedStatusError, UnknownError } from './error/unknownError.js';

/**
 * Error representing a error constructing URL.
 */
export { ConstructURLError } from './error/constructUrlError.js';

/**
 * Error representing a non-2xx HTTP response.
 */
export { HTTPError } from './error/httpError.js';

/**
 * Error thrown when a request exceeds the configured timeout.
 */
export { TimeoutError } from './error/timeoutError.js';

/**
 * Error thrown when validation of payloads fails.
 */
export { ValidationError } from './error/validationError.js';

/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './error/unwrapErrorType.js';

/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './error/isErrorType.js';

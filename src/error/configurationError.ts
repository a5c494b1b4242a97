import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised for invalid client configuration, e.g. no API key or a bad base URL.
 * Always raised before any request is sent.
 */
export class ConfigurationError extends Error {
  /** ConfigurationError error-name */
  name = 'ConfigurationError';
}

/**
 * Type guard for {@link ConfigurationError}.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return isErrorType(ConfigurationError, error);
}

/**
 * Extract a {@link ConfigurationError} from an unknown error value, following nested causes.
 */
export function getConfigurationError(error: unknown): null | ConfigurationError {
  return unwrapErrorType(ConfigurationError, error);
}

import { RateLimitError } from '../error/rateLimitError.js';
import { RequestError } from '../error/requestError.js';
import { ResourceError } from '../error/resourceError.js';
import { ServerError } from '../error/serverError.js';
import { UnexpectedStatusError, UnknownError } from '../error/unknownError.js';
import type { HTTPError } from '../error/httpError.js';
import type { JsonValue } from '../types/json.js';
import { safeWrap, safeWrapAsync } from './wrap.js';

/** Status the API answers with once the rate limit is exceeded. */
export const RATE_LIMIT_STATUS = 420;

/** Status the API answers with for invalid resource attributes. */
export const RESOURCE_ERROR_STATUS = 422;

/**
 * Maps a non-2xx response onto the error taxonomy. Reads the response body once.
 *
 * - 420: {@link RateLimitError}, whatever the body.
 * - Body that is not JSON: {@link UnknownError} with the raw text.
 * - 422: {@link ResourceError}.
 * - Other 4xx: {@link RequestError}.
 * - 5xx: {@link ServerError}.
 * - Anything else: {@link UnexpectedStatusError}.
 *
 * The HTTPError is kept as `cause` of the returned error.
 */
export async function classifyErrorResponse(httpError: HTTPError): Promise<Error> {
  const { status } = httpError;
  const opts = { cause: httpError };

  const [errText, text] = await safeWrapAsync(() => httpError.response.text());

  if (status === RATE_LIMIT_STATUS) {
    return new RateLimitError(undefined, opts);
  }

  if (errText) {
    return new Error(`error reading error response body with status ${status}`, { cause: errText });
  }

  const [errJson, payload] = safeWrap<JsonValue>(() => JSON.parse(text));
  if (errJson) {
    return new UnknownError(status, text, undefined, opts);
  }

  if (status === RESOURCE_ERROR_STATUS) {
    return new ResourceError(status, payload, opts);
  }

  if (status >= 400 && status < 500) {
    return new RequestError(status, payload, opts);
  }

  if (status >= 500 && status < 600) {
    return new ServerError(status, payload, opts);
  }

  return new UnexpectedStatusError(status, text, payload, opts);
}

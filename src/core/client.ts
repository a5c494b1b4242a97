import type { Configuration } from '../config/configuration.js';
import { loadConfiguration } from '../config/configuration.js';
import { getHttpError } from '../error/httpError.js';
import { FetchClient } from '../fetch/client.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import { type Logger, noopLogger } from '../logger/logger.js';
import type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchResponse,
  HeaderOptions,
  HttpMethod,
} from '../types/request.js';
import { classifyErrorResponse } from '../utils/classifyError.js';
import { constructUrl, type QueryParams } from '../utils/constructUrl.js';
import { type RequestBody, toResource, unwrapEnvelope, wrapEnvelope } from '../utils/envelope.js';
import { getResponseData, type ResponseData } from '../utils/getResponseData.js';
import { createTimeoutSignal } from '../utils/signals.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import type { EnvelopeBody, EnvelopeClientProps, EnvelopeRequestOptions, EnvelopeResponse } from './types.js';

/** Content type sent when the request has no body. */
const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';
/** Content type of serialized bodies. */
const JSON_CONTENT_TYPE = 'application/json';

/** Validated configuration and the provider built from it. */
interface Connection {
  configuration: Configuration;
  fetchClient: FetchClientProviderDefinition;
}

/**
 * HTTP client for the status page API that:
 * - prefixes paths with the configured base URL and the `/v1` API version,
 * - authenticates with `Authorization: OAuth <apiKey>`,
 * - wraps request bodies in the endpoint's envelope and unwraps `items` lists,
 * - maps error responses onto the error taxonomy.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync}; nothing is retried.
 *
 * @example
 * const client = new EnvelopeClient({ configuration: { apiKey } });
 * const [err, res] = await client.post('/pages/p1/components', { name: 'API' }, { container: 'component' });
 * if (isResourceError(err)) console.log(getResourceError(err)?.entries);
 */
export class EnvelopeClient {
  /** Raw configuration, validated on first use. */
  #configurationInput: EnvelopeClientProps['configuration'];
  /** HTTP client implementation used for requests. */
  #fetchProvider: FetchClientProvider;
  /** Logger requests and failures are reported to. */
  #logger: Logger;
  /** Memoized configuration check and provider construction. */
  #connection?: SafeWrapAsync<Error, Connection>;

  /**
   * Creates a client. The configuration is validated before the first request
   * is sent; an invalid one fails every call with a `ConfigurationError`.
   */
  constructor({ configuration, logger = noopLogger, fetchProvider = FetchClient }: EnvelopeClientProps) {
    this.#configurationInput = configuration;
    this.#fetchProvider = fetchProvider;
    this.#logger = logger;
  }

  /**
   * Sends a GET request.
   *
   * @param path - Path below the API version, e.g. `/pages/p1/components`.
   * @param query - Query parameters.
   * @param options - Per-request options.
   * @returns A promise resolving to `[error, [status, headers, body]]`.
   */
  get(path: string, query?: QueryParams, options?: EnvelopeRequestOptions): SafeWrapAsync<Error, EnvelopeResponse> {
    return this.request('get', path, query, undefined, options);
  }

  /**
   * Sends a POST request, wrapping `body` under `options.container`.
   *
   * @returns A promise resolving to `[error, [status, headers, body]]`.
   */
  post(path: string, body?: RequestBody, options?: EnvelopeRequestOptions): SafeWrapAsync<Error, EnvelopeResponse> {
    return this.request('post', path, undefined, body, options);
  }

  /**
   * Sends a PUT request, wrapping `body` under `options.container`.
   *
   * @returns A promise resolving to `[error, [status, headers, body]]`.
   */
  put(path: string, body?: RequestBody, options?: EnvelopeRequestOptions): SafeWrapAsync<Error, EnvelopeResponse> {
    return this.request('put', path, undefined, body, options);
  }

  /**
   * Sends a PATCH request, wrapping `body` under `options.container`.
   *
   * @returns A promise resolving to `[error, [status, headers, body]]`.
   */
  patch(path: string, body?: RequestBody, options?: EnvelopeRequestOptions): SafeWrapAsync<Error, EnvelopeResponse> {
    return this.request('patch', path, undefined, body, options);
  }

  /**
   * Sends a DELETE request.
   *
   * @returns A promise resolving to `[error, [status, headers, body]]`.
   */
  delete(path: string, query?: QueryParams, options?: EnvelopeRequestOptions): SafeWrapAsync<Error, EnvelopeResponse> {
    return this.request('delete', path, query, undefined, options);
  }

  /**
   * Performs a single HTTP exchange.
   *
   * - Fails with a `ConfigurationError` (as cause) before any network call when the configuration is invalid.
   * - Sends `body`, when given, as JSON: wrapped as `{ [container]: body }` unless `raw`.
   *   Any method but GET may carry a body; a GET with a body fails before sending.
   * - Non-2xx responses fail with `RequestError`, `ResourceError`, `RateLimitError`,
   *   `ServerError`, `UnknownError` or `UnexpectedStatusError` as cause.
   * - JSON responses are decoded into {@link EnvelopeBody}, other bodies returned as bytes, unchanged.
   *
   * @returns A promise resolving to `[error, [status, headers, body]]`.
   */
  async request(
    method: HttpMethod,
    path: string,
    query?: QueryParams,
    body?: RequestBody | null,
    options: EnvelopeRequestOptions = {},
  ): SafeWrapAsync<Error, EnvelopeResponse> {
    const { headers, raw = false, container } = options;
    const verb = method.toUpperCase();

    const [errConnection, connection] = await this.#connect();
    if (errConnection) {
      return [new Error(`error configuring client in ${method}`, { cause: errConnection }), null];
    }

    const { configuration, fetchClient } = connection;
    const [errUrl, url] = constructUrl(configuration.baseUrl, path, query);
    if (errUrl) {
      return [new Error(`error constructing URL in ${method}`, { cause: errUrl }), null];
    }

    const [errPayload, payload] = this.#serialize(method, body, raw, container);
    if (errPayload) {
      return [new Error(`error serializing body in ${method}`, { cause: errPayload }), null];
    }

    const requestHeaders = mergeHeaderOptions(
      mergeHeaderOptions(
        {
          'Content-Type': FORM_CONTENT_TYPE,
          Authorization: `OAuth ${configuration.apiKey}`,
        },
        headers,
      ),
      payload === null ? undefined : { 'Content-Type': JSON_CONTENT_TYPE },
    );

    this.#logger.log({ level: 'debug', message: 'sending request', context: { method: verb, url, raw } });

    const timeout = createTimeoutSignal(configuration.timeout * 1000);
    const [errExchange, response] = await this.#exchange(fetchClient, method, url, {
      headers: requestHeaders,
      body: payload,
      signal: timeout?.signal,
      raw,
    });
    timeout?.clear();

    if (errExchange) {
      this.#logger.log({
        level: 'warn',
        message: 'request failed',
        context: { method: verb, url, error: errExchange.name, reason: errExchange.message },
      });
      return [new Error(`error doing request in ${method}`, { cause: errExchange }), null];
    }

    this.#logger.log({ level: 'debug', message: 'received response', context: { method: verb, url, status: response[0] } });
    return [null, response];
  }

  /**
   * Releases the provider's connections. Requests sent afterwards fail.
   */
  async dispose(): Promise<void> {
    if (!this.#connection) {
      return;
    }

    const [err, connection] = await this.#connection;
    if (err) {
      return;
    }

    await connection.fetchClient.dispose?.();
  }

  /**
   * Validates the configuration once and builds the provider from it.
   */
  #connect(): SafeWrapAsync<Error, Connection> {
    this.#connection ??= (async (): SafeWrapAsync<Error, Connection> => {
      const [err, configuration] = await loadConfiguration(this.#configurationInput);
      if (err) {
        return [err, null];
      }

      const fetchClient = new this.#fetchProvider({ verifySsl: configuration.verifySsl });
      return [null, { configuration, fetchClient }];
    })();

    return this.#connection;
  }

  /**
   * Serializes the body to JSON text, wrapping it in its envelope unless `raw`.
   * Returns `null` when there is no body.
   */
  #serialize(
    method: HttpMethod,
    body: RequestBody | null | undefined,
    raw: boolean,
    container: string | undefined,
  ): SafeWrap<Error, string | null> {
    if (body === undefined || body === null) {
      return [null, null];
    }

    if (method === 'get') {
      return [new Error('error GET requests cannot carry a body'), null];
    }

    if (raw) {
      return safeWrap(() => JSON.stringify(body));
    }

    if (!container) {
      return [new Error('error wrapping envelope, container is required when sending a body'), null];
    }

    return safeWrap(() => JSON.stringify(wrapEnvelope(container, body)));
  }

  /**
   * Sends the request through the provider, classifies error responses and decodes successful ones.
   */
  async #exchange(
    fetchClient: FetchClientProviderDefinition,
    method: HttpMethod,
    url: string,
    opts: { headers: HeaderOptions; body: string | null; signal?: AbortSignal; raw: boolean },
  ): SafeWrapAsync<Error, EnvelopeResponse> {
    const { headers, body, signal, raw } = opts;
    const [errWrapped, wrapped] = await safeWrapAsync((): SafeWrapAsync<Error, FetchResponse> => {
      if (method === 'get') {
        return fetchClient.get(url, { headers, signal });
      }

      return fetchClient[method](url, { headers, signal, body });
    });

    if (errWrapped) {
      return [new Error(`error calling request ${method.toUpperCase()} in request`, { cause: errWrapped }), null];
    }

    const [errResponse, response] = wrapped;
    if (errResponse) {
      const httpError = getHttpError(errResponse);
      if (!httpError) {
        return [new Error(`error request ${method.toUpperCase()} in request`, { cause: errResponse }), null];
      }

      return [await classifyErrorResponse(httpError), null];
    }

    const [errData, data] = await getResponseData(response);
    if (errData) {
      return [new Error(`error getting response in ${method.toUpperCase()}`, { cause: errData }), null];
    }

    const [errBody, decoded] = this.#decode(data, raw);
    if (errBody) {
      return [new Error(`error decoding response in ${method.toUpperCase()}`, { cause: errBody }), null];
    }

    return [null, [response.status, response.headers, decoded]];
  }

  /**
   * Turns the read body into the returned {@link EnvelopeBody}.
   */
  #decode(data: ResponseData, raw: boolean): SafeWrap<Error, EnvelopeBody> {
    if (data.kind !== 'json') {
      return [null, data.data];
    }

    return raw ? toResource(data.data) : unwrapEnvelope(data.data);
  }
}

import { Agent, type Dispatcher, fetch } from 'undici';
import { HTTPError } from '../error/httpError.js';
import type { FetchClientOptions, FetchOptions, FetchResponse, HeaderOptions } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/**
 * Thin wrapper around undici's `fetch` that:
 * - merges default and per-request headers,
 * - sends every request through one dispatcher, verifying TLS certificates unless told not to,
 * - returns error-first tuples via {@link SafeWrapAsync}, non-2xx responses as {@link HTTPError}.
 *
 * URLs are used as given; composing them is up to the caller.
 */
export class FetchClient {
  /** Default headers sent with every request. */
  #headers?: HeaderOptions;
  /** Dispatcher all requests go through. */
  #dispatcher: Dispatcher;
  /** Whether the dispatcher was created here and must be closed on dispose. */
  #ownsDispatcher: boolean;

  /** Creates a new instance of the fetch-client with the given options */
  constructor(opts: FetchClientOptions = {}) {
    this.#headers = opts.headers;
    this.#ownsDispatcher = !opts.dispatcher;
    this.#dispatcher = opts.dispatcher ?? new Agent({ connect: { rejectUnauthorized: opts.verifySsl ?? true } });
  }

  /**
   * Executes a GET request against the given url.
   *
   * @param url - Absolute request URL.
   * @param opts - Request options merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public get(url: string, opts: Omit<FetchOptions, 'method' | 'body'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request(url, { ...opts, method: 'GET', body: undefined });
  }

  /**
   * Executes a PUT request against the given url.
   *
   * @param url - Absolute request URL.
   * @param opts - Request options, carrying the serialized body.
   * @returns A promise resolving to `[error, response]`.
   */
  public put(url: string, opts: Omit<FetchOptions, 'method'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request(url, { ...opts, method: 'PUT' });
  }

  /**
   * Executes a PATCH request against the given url.
   *
   * @param url - Absolute request URL.
   * @param opts - Request options, carrying the serialized body.
   * @returns A promise resolving to `[error, response]`.
   */
  public patch(url: string, opts: Omit<FetchOptions, 'method'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request(url, { ...opts, method: 'PATCH' });
  }

  /**
   * Executes a POST request against the given url.
   *
   * @param url - Absolute request URL.
   * @param opts - Request options, carrying the serialized body.
   * @returns A promise resolving to `[error, response]`.
   */
  public post(url: string, opts: Omit<FetchOptions, 'method'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request(url, { ...opts, method: 'POST' });
  }

  /**
   * Executes a DELETE request against the given url.
   *
   * @param url - Absolute request URL.
   * @param opts - Request options, optionally carrying a serialized body.
   * @returns A promise resolving to `[error, response]`.
   */
  public delete(url: string, opts: Omit<FetchOptions, 'method'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request(url, { ...opts, method: 'DELETE' });
  }

  /**
   * Closes the dispatcher when it was created by this client.
   */
  public async dispose(): Promise<void> {
    if (this.#ownsDispatcher) {
      await this.#dispatcher.close();
    }
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   *
   * Errors:
   * - Network / fetch errors are wrapped in `Error`.
   * - Non-2xx responses are wrapped in `HTTPError`.
   */
  async #request(url: string, opts: FetchOptions): SafeWrapAsync<Error, FetchResponse> {
    const { headers: localHeaders, ...init } = opts;
    const headers = mergeHeaderOptions(this.#headers, localHeaders);

    const [err, res] = await safeWrapAsync(() =>
      fetch(url, {
        ...init,
        headers,
        dispatcher: this.#dispatcher,
      }),
    );

    if (err) {
      return [new Error(`error wrapping ${opts.method} request in fetchClient`, { cause: err }), null];
    }

    if (!res.ok) {
      return [new HTTPError(res, `error in ${opts.method} request in fetchClient`), null];
    }

    return [null, res];
  }
}

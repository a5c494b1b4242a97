import type { Dispatcher, RequestInit, Response } from 'undici';
import type { SafeWrapAsync } from '../utils/wrap.js';

/**
 * Header options accepted by the fetch wrapper.
 *
 * A `null` value removes a header set by an earlier (default) layer.
 */
export type HeaderOptions = [string, string][] | Record<string, string | null | undefined> | Iterable<[string, string]>;

/** HTTP verbs understood by the client. */
export type HttpMethod = 'get' | 'post' | 'put' | 'patch' | 'delete';

/** Options to pass in for each fetch request */
export interface FetchOptions extends Omit<RequestInit, 'headers' | 'dispatcher'> {
  /** Headers merged with provider defaults. */
  headers?: HeaderOptions;
  /** Abort signal to cancel the request, used for timeouts. */
  signal?: AbortSignal;
}

/** Response type returned by providers. */
export type FetchResponse = Response;

/** Options to configure a fetch provider. */
export interface FetchClientOptions extends Pick<FetchOptions, 'headers'> {
  /**
   * Whether TLS certificates are verified.
   * @default true
   */
  verifySsl?: boolean;
  /** Custom undici dispatcher; takes precedence over `verifySsl`. */
  dispatcher?: Dispatcher;
}

/** Contract for HTTP client implementations used by EnvelopeClient. */
export interface FetchClientProviderDefinition {
  /** Executes a GET request. */
  get: (url: string, options: Omit<FetchOptions, 'method' | 'body'>) => SafeWrapAsync<Error, FetchResponse>;
  /** Executes a PUT request. */
  put: (url: string, options: Omit<FetchOptions, 'method'>) => SafeWrapAsync<Error, FetchResponse>;
  /** Executes a PATCH request. */
  patch: (url: string, options: Omit<FetchOptions, 'method'>) => SafeWrapAsync<Error, FetchResponse>;
  /** Executes a POST request. */
  post: (url: string, options: Omit<FetchOptions, 'method'>) => SafeWrapAsync<Error, FetchResponse>;
  /** Executes a DELETE request. */
  delete: (url: string, options: Omit<FetchOptions, 'method'>) => SafeWrapAsync<Error, FetchResponse>;
  /** Optional lifecycle hook to dispose resources (e.g., keep-alive agents). */
  dispose?: () => Promise<void>;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  /** Creates a new instance of the fetch-client with the given options */
  new (opts: FetchClientOptions): FetchClientProviderDefinition;
}

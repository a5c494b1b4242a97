import type { Headers } from 'undici';
import type { Configuration, ConfigurationInput } from '../config/configuration.js';
import type { Logger } from '../logger/logger.js';
import type { FetchClientProvider, HeaderOptions, HttpMethod } from '../types/request.js';
import type { QueryParams } from '../utils/constructUrl.js';
import type { RequestBody } from '../utils/envelope.js';
import type { Resource } from '../utils/resource.js';

export type { HttpMethod, QueryParams, RequestBody };

/** Per-request options accepted by every client operation. */
export interface EnvelopeRequestOptions {
  /**
   * Headers merged into the defaults; a `null` value removes a default header.
   * @default {}
   */
  headers?: HeaderOptions;
  /**
   * Send the body as-is and return the decoded response without unwrapping `items`.
   * @default false
   */
  raw?: boolean;
  /**
   * Envelope key the body is wrapped under, e.g. `component`.
   * Required whenever a body is sent and `raw` is false.
   */
  container?: string;
}

/**
 * Decoded body of a successful response:
 * - `Resource[]` for `{ items: [...] }` (or a bare list),
 * - `Resource` for any other JSON object,
 * - `Uint8Array` for bodies that are not JSON, as received,
 * - `null` for empty bodies.
 */
export type EnvelopeBody = Resource | Resource[] | Uint8Array | null;

/** Result of a successful exchange. */
export type EnvelopeResponse = [status: number, headers: Headers, body: EnvelopeBody];

/** Configuration for constructing an {@link EnvelopeClient}. */
export interface EnvelopeClientProps {
  /** API key, base URL, timeout and TLS settings; validated before the first request. */
  configuration: ConfigurationInput | Configuration;
  /**
   * Logger requests and failures are reported to.
   * @default noopLogger
   */
  logger?: Logger;
  /** HTTP client implementation used for requests. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
}

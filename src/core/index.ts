/**
 * Core entrypoint: exports the envelope client and its option and response types.
 * Import from here if you only need the client/types without error helpers.
 * @module
 */

/**
 * HTTP client that composes URLs, authenticates, wraps and unwraps the
 * envelope and classifies error responses.
 */
export { EnvelopeClient } from './client.js';

/** Options, props and response shapes of {@link EnvelopeClient}. */
export type {
  EnvelopeBody,
  EnvelopeClientProps,
  EnvelopeRequestOptions,
  EnvelopeResponse,
  HttpMethod,
  QueryParams,
  RequestBody,
} from './types.js';

import type { UploadableIO } from '../media/uploadableIO.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the transport; `null`/`undefined` values remove a header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null | undefined>;

/** HTTP verbs spoken by the Graph API. */
export type HttpVerb = 'get' | 'post' | 'delete';

/**
 * Part of the response a call is interested in.
 * - `body`: the decoded body (default)
 * - `headers`: the response headers, redirects are not followed
 * - `status`: the status code
 */
export type HttpComponent = 'body' | 'headers' | 'status';

/** Wire-ready parameters: strings, plus uploads which force a multipart body. */
export type HttpParams = Record<string, string | UploadableIO>;

/** Response as produced by a transport, consumed once by the client. */
export interface RawResponse {
  status: number;
  /** Response headers keyed by lower-cased name */
  headers: Record<string, string>;
  /** Undecoded body text, empty when there is none */
  body: string;
}

/** Per-request options handed to the transport. */
export interface HttpRequestOptions {
  headers?: HeaderOptions;
  /** Combined caller, timeout and client-lifetime signal */
  signal?: AbortSignal;
  /** @default 'body' */
  httpComponent?: HttpComponent;
}

/** Defaults a transport is constructed with, and can be reconfigured with. */
export interface HttpServiceOptions {
  headers?: HeaderOptions;
}

/** Contract for transports used by the graph client. */
export interface HttpServiceDefinition {
  /**
   * Performs one request. `path` is relative to the base URL unless it is absolute.
   * GET and DELETE carry `params` in the query string, POST in the body.
   * Non-2xx statuses are not errors at this level; only a failure to obtain a response is.
   */
  request: (
    verb: HttpVerb,
    path: string,
    params: HttpParams,
    options: HttpRequestOptions,
  ) => SafeWrapAsync<Error, RawResponse>;
  /** Updates default options for the transport. */
  config: (opts: HttpServiceOptions) => void;
  /** Optional lifecycle hook to dispose resources (e.g., keep-alive agents). */
  dispose?: () => void;
}

/** Factory signature for constructing transports. */
export interface HttpServiceProvider {
  /** Creates a new transport for a base URL */
  new (baseUrl: string, opts: HttpServiceOptions): HttpServiceDefinition;
}

/**
 * Root entrypoint for graphcall: re-exports the client, media helpers, transport and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Constructor and runtime options accepted by {@link GraphClient}.
 */
export type { GraphClientConfig, GraphClientProps, HttpClientOptions } from './core/client.js';

/**
 * Graph API client: objects, connections, media, search, queries and batches.
 */
export { GraphClient } from './core/client.js';

/**
 * Batch scope returned by {@link GraphClient.beginBatch}.
 */
export { type BatchOptions, GraphBatch } from './core/batch.js';

/**
 * Page of results with `nextPage`/`previousPage`.
 */
export { GraphCollection, type PagingMode } from './core/collection.js';

/**
 * Shapes of calls, arguments and results.
 */
export type {
  CallOptions,
  GraphArgs,
  GraphArgValue,
  GraphCall,
  GraphResult,
  JsonCodec,
  JsonObject,
  JsonValue,
  MediaArgs,
} from './core/types.js';

/**
 * Byte source for uploads.
 */
export { UploadableIO, type UploadSource } from './media/uploadableIO.js';

/**
 * Default transport, on the native `fetch` API.
 */
export { FetchService } from './fetch/client.js';

/**
 * Transport contract, for plugging in another HTTP implementation.
 */
export type {
  HeaderOptions,
  HttpComponent,
  HttpParams,
  HttpRequestOptions,
  HttpServiceDefinition,
  HttpServiceOptions,
  HttpServiceProvider,
  HttpVerb,
  RawResponse,
} from './types/request.js';

/**
 * Logging contract for the `debug` option.
 */
export type { Logger } from './utils/logger.js';

/**
 * Tuple results returned by every call.
 */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';

/**
 * Error thrown when a request is aborted via AbortController.
 */
export { AbortError, isAbortError } from './error/abortError.js';

/**
 * Error constructing a call: argument counts, missing pages, batch misuse.
 */
export { ArgumentError, getArgumentError, isArgumentError } from './error/argumentError.js';

/**
 * Error payload reported by the Graph API.
 */
export { GraphAPIError, getGraphAPIError, isGraphAPIError } from './error/graphAPIError.js';

/**
 * Error for writes and deletes attempted without an access token.
 */
export { isMissingAccessTokenError, MissingAccessTokenError } from './error/missingAccessTokenError.js';

/**
 * Error thrown when a request exceeds the configured timeout.
 */
export { getTimeoutError, isTimeoutError, TimeoutError } from './error/timeoutError.js';

/**
 * Network, decoding and server failures below the Graph API.
 */
export { getTransportError, isTransportError, TransportError } from './error/transportError.js';

/**
 * Error thrown when validation of payloads fails.
 */
export { getValidationError, isValidationError, ValidationError } from './error/validationError.js';

/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './error/unwrapErrorType.js';

/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './error/isErrorType.js';

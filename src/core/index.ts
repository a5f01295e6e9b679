/**
 * Core entrypoint: exports the graph client, batch scopes, page collections and call types.
 * Import from here if you only need the client/types without error helpers.
 * @module
 */

/**
 * Constructor and runtime options accepted by {@link GraphClient}.
 */
export type { GraphClientConfig, GraphClientProps, HttpClientOptions } from './client.js';

/**
 * Graph API client. Every verb returns an error-first tuple via {@link SafeWrapAsync}.
 */
export { GraphClient } from './client.js';

/** Verbs shared by the client and batch scopes. */
export { GraphAPIMethods } from './api.js';

/** Batch scope collapsing queued calls into one request. */
export { type BatchOptions, GraphBatch } from './batch.js';

/** One page of a connection, with access to its neighbours. */
export { GraphCollection, type PagingMode } from './collection.js';

/** Classifies a decoded body as an API error. */
export { checkResponse } from './checkResponse.js';

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
} from './types.js';

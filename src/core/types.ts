import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { UploadableIO, UploadSource } from '../media/uploadableIO.js';
import type { HeaderOptions, HttpComponent, HttpVerb } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { GraphCollection } from './collection.js';

/** Any value JSON can represent. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** A decoded JSON object. */
export type JsonObject = { [key: string]: JsonValue };

/** Encoder/decoder used for response bodies and for arguments embedded as JSON strings. */
export interface JsonCodec {
  encode: (value: JsonValue) => string;
  decode: (text: string) => JsonValue;
}

/**
 * A single argument value. Objects and arrays travel as embedded JSON strings,
 * `null` and `undefined` are dropped, uploads turn the request into multipart.
 */
export type GraphArgValue = JsonValue | UploadableIO | undefined;

/** Arguments of a graph call, in insertion order. */
export type GraphArgs = { [key: string]: GraphArgValue };

/** What a graph call resolves to before post-processing. */
export type GraphResult = JsonValue | GraphCollection;

/** Options accepted by every graph call. */
export interface CallOptions {
  headers?: HeaderOptions;
  /**
   * Request timeout in milliseconds, overriding the client default.
   * Ignored for calls inside a batch; pass it to `execute` instead.
   */
  timeout?: number | false;
  signal?: AbortSignal;
  /** @default 'body' */
  httpComponent?: HttpComponent;
  /** Send to the video upload host instead of the regular base URL. */
  video?: boolean;
  /** Schema the decoded body must satisfy; the body itself is returned unchanged. */
  schema?: StandardSchemaV1;
  /** Per-call override of the client's `validation` flag. */
  validate?: boolean;
}

/**
 * A logical call against the graph, immutable once dispatched.
 *
 * @typeParam R - Result type after `postProcess`.
 */
export interface GraphCall<R = GraphResult> {
  /** `id`, `id/connection`, or an absolute URL for page links */
  readonly path: string;
  readonly args: Readonly<GraphArgs>;
  readonly verb: HttpVerb;
  readonly options: Readonly<CallOptions>;
  /** Applied last, after error classification and page wrapping */
  readonly postProcess: (result: GraphResult) => R;
}

/** Anything able to fetch another page for a {@link GraphCollection}. */
export interface GraphPager {
  getPage: (call: GraphCall) => SafeWrapAsync<Error, GraphResult>;
}

/** Shared state needed to turn a raw response into a call result. */
export interface ResponseContext {
  json: JsonCodec;
  /** Global schema-validation flag */
  validation: boolean;
  /** Whether `paging.next`/`paging.previous` links are followed when no cursors are present */
  legacyPaging: boolean;
  /** Client issuing follow-up page calls */
  pager: GraphPager;
}

/**
 * Arguments accepted by `putPicture`/`putVideo`:
 * - `(source, contentType?, args?, targetId?, options?)` for uploads
 * - `(url, args?, targetId?, options?)` for media fetched by the API from a URL
 */
export type MediaArgs =
  | [source: UploadSource, contentType?: string, args?: GraphArgs, targetId?: string, options?: CallOptions]
  | [source: UploadSource, args?: GraphArgs, targetId?: string, options?: CallOptions];

/** Checks for a plain, non-null, non-array object. */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep copy of a JSON value with every nested object and array frozen.
 */
export function freezeJson(value: JsonObject): JsonObject;
export function freezeJson(value: JsonValue): JsonValue;
export function freezeJson(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    const copy = value.map((item) => freezeJson(item));
    Object.freeze(copy);
    return copy;
  }

  if (isJsonObject(value)) {
    const copy: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      copy[key] = freezeJson(item);
    }

    Object.freeze(copy);
    return copy;
  }

  return value;
}

import { UploadableIO } from '../media/uploadableIO.js';
import type { HeaderOptions, HttpParams } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/**
 * Filters out unsupported values and turns remaining into strings.
 */
function sanitize(value: unknown): string | null {
  const type = typeof value;
  return type === 'object' || type === 'function' || type === 'symbol' ? null : String(value);
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, unknown]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers;
  }

  return Object.entries(headers);
}

/**
 * Merge global and local headers into a single `Headers` instance, normalizing keys.
 */
export function mergeHeaderOptions(globalHeaders?: HeaderOptions, localHeaders?: HeaderOptions): Headers {
  const merged = new Headers();

  for (const [key, value] of [...toEntries(globalHeaders), ...toEntries(localHeaders)]) {
    if (value == null) {
      merged.delete(key);
      continue;
    }

    const clean = sanitize(value);
    if (clean !== null) {
      merged.set(key, clean);
    }
  }

  return merged;
}

/** Request parameters split into plain form fields and file uploads. */
export interface SplitParams {
  fields: Record<string, string>;
  uploads: Array<[name: string, upload: UploadableIO]>;
}

/**
 * Separates uploads from plain parameters, keeping the order of each.
 */
export function splitParams(params: HttpParams): SplitParams {
  const split: SplitParams = { fields: {}, uploads: [] };

  for (const [key, value] of Object.entries(params)) {
    if (value instanceof UploadableIO) {
      split.uploads.push([key, value]);
      continue;
    }

    split.fields[key] = value;
  }

  return split;
}

/**
 * Appends fields to the query string of a URL, keeping any query it already has.
 */
export function appendQuery(url: string, fields: Record<string, string>): string {
  const query = new URLSearchParams(fields).toString();
  if (!query) {
    return url;
  }

  return `${url}${url.includes('?') ? '&' : '?'}${query}`;
}

/**
 * Builds a multipart body: plain fields first, then one file part per upload.
 */
export async function toFormData({ fields, uploads }: SplitParams): SafeWrapAsync<Error, FormData> {
  const form = new FormData();
  for (const [key, value] of Object.entries(fields)) {
    form.append(key, value);
  }

  for (const [key, upload] of uploads) {
    const [err, blob] = await upload.toBlob();
    if (err) {
      return [new Error(`error preparing upload ${key}`, { cause: err }), null];
    }

    form.append(key, blob, upload.filename);
  }

  return [null, form];
}

/**
 * Copies response headers into a plain object keyed by lower-cased name.
 */
export function readHeaders(headers: Headers): Record<string, string> {
  const read: Record<string, string> = {};
  for (const [key, value] of headers) {
    read[key.toLowerCase()] = value;
  }

  return read;
}

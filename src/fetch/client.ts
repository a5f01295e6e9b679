import { ArgumentError } from '../error/argumentError.js';
import type {
  HttpParams,
  HttpRequestOptions,
  HttpServiceDefinition,
  HttpServiceOptions,
  HttpVerb,
  RawResponse,
} from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { appendQuery, mergeHeaderOptions, readHeaders, splitParams, toFormData } from './utils.js';

/**
 * Transport on the native `fetch` API that:
 * - prefixes relative paths with a configured base URL,
 * - sends GET/DELETE params as a query string and POST params as a form,
 *   switching to `multipart/form-data` when an upload is present,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Any status is returned as a response; only failing to get one is an error.
 */
export class FetchService implements HttpServiceDefinition {
  /** Base URL prepended to relative paths. */
  #baseUrl: string;
  /** Default options (headers). */
  #opts: HttpServiceOptions;

  /** Creates a new instance of the fetch-service, with a base-url + options */
  constructor(baseUrl: string, opts?: HttpServiceOptions) {
    if (!baseUrl.endsWith('/')) {
      baseUrl += '/';
    }

    this.#baseUrl = baseUrl;
    this.#opts = opts ?? {};
  }

  /**
   * Updates default options (merged with existing headers).
   */
  public config(opts: HttpServiceOptions) {
    this.#opts = {
      ...this.#opts,
      ...opts,
      headers: mergeHeaderOptions(this.#opts.headers, opts.headers),
    };
  }

  /**
   * Performs one request.
   *
   * @param path - Path relative to the base URL (e.g. `me/friends`), or an absolute URL.
   * @param params - Wire parameters; uploads are only accepted for POST.
   * @param options - Per-call headers, signal and the response part the caller wants.
   *                  With `httpComponent: 'headers'` redirects are not followed.
   * @returns A promise resolving to `[error, response]`.
   */
  public async request(
    verb: HttpVerb,
    path: string,
    params: HttpParams,
    options: HttpRequestOptions = {},
  ): SafeWrapAsync<Error, RawResponse> {
    const method = verb.toUpperCase();
    const split = splitParams(params);

    let url = this.constructPath(path);
    let body: URLSearchParams | FormData | undefined;
    if (verb !== 'post') {
      if (split.uploads.length > 0) {
        return [new ArgumentError(`error uploads require POST, got ${method}`), null];
      }

      url = appendQuery(url, split.fields);
    } else if (split.uploads.length > 0) {
      const [errForm, form] = await toFormData(split);
      if (errForm) {
        return [new Error(`error building multipart body for ${method} request in fetchService`, { cause: errForm }), null];
      }

      body = form;
    } else {
      body = new URLSearchParams(split.fields);
    }

    const headers = mergeHeaderOptions(this.#opts.headers, options.headers);
    const [err, res] = await safeWrapAsync(() =>
      fetch(url, {
        method,
        headers,
        body,
        redirect: options.httpComponent === 'headers' ? 'manual' : 'follow',
        ...(options.signal && { signal: options.signal }),
      }),
    );

    if (err) {
      return [new Error(`error wrapping ${method} request in fetchService`, { cause: err }), null];
    }

    const [errText, text] = await safeWrapAsync(() => res.text());
    if (errText) {
      return [new Error(`error reading body of ${method} response in fetchService`, { cause: errText }), null];
    }

    return [null, { status: res.status, headers: readHeaders(res.headers), body: text }];
  }

  /**
   * Joins the base URL and path into a single URL string; absolute URLs pass through.
   *
   * - Strips a leading slash from the path to avoid `//` in the URL.
   */
  private constructPath(path: string): string {
    if (/^https?:\/\//.test(path)) {
      return path;
    }

    return `${this.#baseUrl}${path.replace(/^\//, '')}`;
  }
}

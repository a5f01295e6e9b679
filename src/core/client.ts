import { ArgumentError } from '../error/argumentError.js';
import { TransportError } from '../error/transportError.js';
import { FetchService } from '../fetch/client.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import { isUrl } from '../media/parseMediaArgs.js';
import type {
  HeaderOptions,
  HttpParams,
  HttpServiceDefinition,
  HttpServiceProvider,
  HttpVerb,
  RawResponse,
} from '../types/request.js';
import { type Logger, resolveLogger } from '../utils/logger.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { GraphAPIMethods } from './api.js';
import { type BatchOptions, GraphBatch } from './batch.js';
import { encodeArgs } from './encodeArgs.js';
import { describeCall, processResponse } from './response.js';
import type { CallOptions, GraphCall, JsonCodec, ResponseContext } from './types.js';

/** Transport defaults applied to every call. */
export interface HttpClientOptions {
  /** Headers sent with every request, merged under per-call headers */
  headers?: HeaderOptions;
  /**
   * Request timeout in milliseconds, `false` to disable.
   * @default 60_000
   */
  timeout?: number | false;
}

/** Settings that can be changed on a live client through {@link GraphClient.config}. */
export interface GraphClientConfig {
  /** Token sent as `access_token`; required for writes and deletes. */
  accessToken?: string;
  httpOpts?: HttpClientOptions;
  /** `true` logs to the console, a {@link Logger} receives the lines instead. */
  debug?: boolean | Logger;
}

/** Configuration for constructing a {@link GraphClient}, extends {@link GraphClientConfig}. */
export interface GraphClientProps extends GraphClientConfig {
  /** @default 'https://graph.facebook.com/' */
  baseUrl?: string;
  /** Host video uploads are sent to. @default 'https://graph-video.facebook.com/' */
  videoBaseUrl?: string;
  /** Transport implementation. Defaults to {@link FetchService}. */
  httpService?: HttpServiceProvider;
  /** Codec for response bodies and JSON-embedded arguments. Defaults to `JSON`. */
  json?: JsonCodec;
  /**
   * Global validation flag; calls carrying a `schema` are validated when `true`.
   * Per-call `validate` overrides this.
   * @default true
   */
  validation?: boolean;
  /**
   * Follow `paging.next`/`paging.previous` links for pages without cursors.
   * @default true
   */
  legacyPaging?: boolean;
}

const DEFAULT_JSON: JsonCodec = {
  encode: (value) => JSON.stringify(value),
  decode: (text) => JSON.parse(text),
};

/**
 * Client for the Graph API that:
 * - sends every verb of {@link GraphAPIMethods} through a pluggable transport,
 * - adds the access token and guards writes without one,
 * - classifies API errors and wraps pageable results in a {@link GraphCollection},
 * - collapses calls into a single request with {@link GraphClient.batch}.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync} or {@link SafeWrap}.
 *
 * @example
 * const graph = new GraphClient({ accessToken: process.env.GRAPH_TOKEN });
 * const [err, me] = await graph.getObject('me');
 */
export class GraphClient extends GraphAPIMethods {
  /** Underlying transport instance. */
  #httpService: HttpServiceDefinition;
  /** Token added to every call as `access_token`. */
  #accessToken?: string;
  /** Default request timeout in milliseconds. */
  #defaultTimeout = 60_000;
  /** Configured request timeout, overrides the default. */
  #timeout?: number | false;
  /** Host for uploads marked as video. */
  #videoBaseUrl: string;
  #json: JsonCodec;
  #validation: boolean;
  #legacyPaging: boolean;
  #logger: Logger;
  /** Open batch scope, at most one per client. */
  #batch: GraphBatch | null = null;
  /** Global abort-controller for disposing */
  #abortController: AbortController;

  /**
   * Creates a GraphClient and the transport it sends through.
   *
   * @param props - Token, hosts, transport and processing options.
   */
  constructor({
    accessToken,
    baseUrl = 'https://graph.facebook.com/',
    videoBaseUrl = 'https://graph-video.facebook.com/',
    httpService = FetchService,
    httpOpts,
    json = DEFAULT_JSON,
    validation = true,
    legacyPaging = true,
    debug,
  }: GraphClientProps = {}) {
    super();

    this.#accessToken = accessToken;
    this.#timeout = httpOpts?.timeout;
    this.#videoBaseUrl = videoBaseUrl.endsWith('/') ? videoBaseUrl : `${videoBaseUrl}/`;
    this.#json = json;
    this.#validation = validation;
    this.#legacyPaging = legacyPaging;
    this.#logger = resolveLogger(debug);
    this.#abortController = new AbortController();
    this.#httpService = new httpService(baseUrl, {
      headers: mergeHeaderOptions({ Accept: 'application/json' }, httpOpts?.headers),
    });
  }

  /** Current access token, if any. */
  get accessToken(): string | undefined {
    return this.#accessToken;
  }

  /**
   * Updates the token, transport defaults and logger at runtime.
   */
  config(opts: GraphClientConfig) {
    const { accessToken, httpOpts, debug } = opts;

    if ('accessToken' in opts) {
      this.#accessToken = accessToken;
    }

    if (debug !== undefined) {
      this.#logger = resolveLogger(debug);
    }

    if (!httpOpts) {
      return;
    }

    if (httpOpts.timeout !== undefined) {
      this.#timeout = httpOpts.timeout;
    }

    if (httpOpts.headers) {
      this.#httpService.config({ headers: httpOpts.headers });
    }
  }

  /**
   * Aborts in-flight calls and releases the transport. The client should not be used afterwards.
   */
  dispose() {
    this.#abortController.abort('client was disposed');
    this.#httpService.dispose?.();
  }

  /**
   * Opens a batch scope. Calls made on the returned handle are queued and sent
   * as one request by {@link GraphBatch.execute}.
   *
   * @returns `[ArgumentError, null]` while another scope is open on this client.
   */
  beginBatch(): SafeWrap<Error, GraphBatch> {
    if (this.#batch) {
      return [new ArgumentError('error a batch is already open on this client'), null];
    }

    const batch = new GraphBatch({
      accessToken: () => this.#accessToken,
      context: () => this.#context(),
      logger: () => this.#logger,
      send: (verb, path, params, options) => this.#send(verb, path, params, options),
      release: () => {
        if (this.#batch === batch) {
          this.#batch = null;
        }
      },
    });

    this.#batch = batch;
    return [null, batch];
  }

  /**
   * Runs `block` inside a batch scope and executes the batch once the block returns.
   *
   * The promises returned by calls inside the block settle only when the batch executes,
   * so the block must be synchronous: a block returning a promise discards the batch,
   * which settles its queued calls with an {@link ArgumentError}, and fails with one.
   *
   * @example
   * const [err, results] = await graph.batch((batch) => {
   *   batch.getObject('me');
   *   batch.getConnections('me', 'friends');
   * });
   * // results: [me, friends]
   *
   * @returns The per-call results in registration order, each either an `Error` or a value.
   */
  async batch(block: (batch: GraphBatch) => void, httpOptions: BatchOptions = {}): SafeWrapAsync<Error, unknown[]> {
    const [errBegin, scope] = this.beginBatch();
    if (errBegin) {
      return [errBegin, null];
    }

    const [errBlock, returned] = safeWrap((): unknown => block(scope));
    if (errBlock) {
      await scope.discard();
      return [new Error('error running batch block', { cause: errBlock }), null];
    }

    if (returned instanceof Promise) {
      await scope.discard();
      const [errAsync] = await safeWrapAsync(() => returned);
      return [
        new ArgumentError('error batch block must be synchronous, await its calls after the batch executes', {
          ...(errAsync && { cause: errAsync }),
        }),
        null,
      ];
    }

    return scope.execute(httpOptions);
  }

  protected currentAccessToken(): string | undefined {
    return this.#accessToken;
  }

  /**
   * Sends one call: encode args, hit the transport, turn the response into a result.
   */
  protected async dispatch<R>(call: GraphCall<R>): SafeWrapAsync<Error, R> {
    const label = describeCall(call);
    this.#logger.debug(label);

    const [errEncode, params] = encodeArgs(call.args, this.#json);
    if (errEncode) {
      return this.#fail(label, errEncode);
    }

    const [errSend, response] = await this.#send(call.verb, call.path, params, call.options);
    if (errSend) {
      return this.#fail(label, errSend);
    }

    const [errProcess, result] = await processResponse(response, call, this.#context());
    if (errProcess) {
      return this.#fail(label, errProcess);
    }

    return [null, result];
  }

  #fail(label: string, error: Error): [Error, null] {
    this.#logger.warn(`${label} failed`, error);
    return [error, null];
  }

  #context(): ResponseContext {
    return {
      json: this.#json,
      validation: this.#validation,
      legacyPaging: this.#legacyPaging,
      pager: this,
    };
  }

  /**
   * Single transport call with the access token added and the caller, timeout and
   * client-lifetime signals merged; the merge and the timer are released once the transport
   * returns. Any failure to obtain a response is a {@link TransportError}.
   */
  async #send(
    verb: HttpVerb,
    path: string,
    params: HttpParams,
    options: Pick<CallOptions, 'headers' | 'timeout' | 'signal' | 'httpComponent' | 'video'>,
  ): SafeWrapAsync<Error, RawResponse> {
    const label = describeCall({ verb, path });
    const timeout = options.timeout ?? this.#timeout ?? this.#defaultTimeout;
    const timeoutSignal = createTimeoutSignal(timeout);
    const merged = mergeSignals([options.signal, timeoutSignal?.signal, this.#abortController.signal]);
    const target = options.video && !isUrl(path) ? `${this.#videoBaseUrl}${path.replace(/^\//, '')}` : path;
    const requestParams: HttpParams = this.#accessToken ? { ...params, access_token: this.#accessToken } : params;

    const [errWrapped, wrapped] = await safeWrapAsync(() =>
      this.#httpService.request(verb, target, requestParams, {
        headers: options.headers,
        httpComponent: options.httpComponent,
        ...(merged && { signal: merged.signal }),
      }),
    );
    merged?.release();
    timeoutSignal?.release();
    if (errWrapped) {
      return [new TransportError(`error calling ${label}`, { cause: errWrapped }), null];
    }

    const [err, response] = wrapped;
    if (err) {
      return [new TransportError(`error calling ${label}`, { cause: err }), null];
    }

    return [null, response];
  }
}

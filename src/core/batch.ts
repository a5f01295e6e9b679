import { ArgumentError } from '../error/argumentError.js';
import { TransportError } from '../error/transportError.js';
import { UploadableIO } from '../media/uploadableIO.js';
import type { HttpParams, HttpVerb, RawResponse } from '../types/request.js';
import type { Logger } from '../utils/logger.js';
import { type SafeWrap, type SafeWrapAsync, settled } from '../utils/wrap.js';
import { GraphAPIMethods } from './api.js';
import { checkResponse } from './checkResponse.js';
import { encodeArgs } from './encodeArgs.js';
import { decodeBody, processResponse } from './response.js';
import { type CallOptions, type GraphCall, isJsonObject, type JsonCodec, type JsonObject, type ResponseContext } from './types.js';

/** Transport options for the single request a batch is sent as. */
export type BatchOptions = Pick<CallOptions, 'headers' | 'timeout' | 'signal'>;

/** What a batch scope needs from the client that opened it. */
export interface BatchHost {
  accessToken: () => string | undefined;
  context: () => ResponseContext;
  logger: () => Logger;
  send: (verb: HttpVerb, path: string, params: HttpParams, options: BatchOptions) => SafeWrapAsync<Error, RawResponse>;
  /** Frees the client for the next scope */
  release: () => void;
}

/** Queued call, settled once with its part of the batch response. */
interface PendingCall {
  call: GraphCall<unknown>;
  /** Resolves the caller's promise and reports the slot value (error or result). */
  settle: (response: SafeWrap<Error, RawResponse>) => Promise<unknown>;
}

const BATCH_LABEL = 'POST batch';

/**
 * Relative URL of a call inside a batch; page links are absolute, so their host is dropped.
 */
function relativeUrl(path: string, query: string): string {
  const relative = path.replace(/^https?:\/\/[^/]+/, '').replace(/^\//, '');
  return query ? `${relative}?${query}` : relative;
}

/**
 * Splits the response of a batch request into one response per call.
 *
 * Fails as a whole when the request itself failed: an error payload, a non-2xx status,
 * a body that is not a list or a list of the wrong length. A `null` entry, which the API
 * returns for calls it did not run, only fails that entry.
 */
function splitBatchResponse(
  response: RawResponse,
  count: number,
  json: JsonCodec,
): SafeWrap<Error, SafeWrap<Error, RawResponse>[]> {
  const [errDecode, decoded] = decodeBody(response, json, BATCH_LABEL);
  if (errDecode) {
    return [errDecode, null];
  }

  const errAPI = checkResponse(decoded, response.status);
  if (errAPI) {
    return [errAPI, null];
  }

  if (response.status >= 400) {
    return [
      new TransportError(`error in ${BATCH_LABEL}, server responded with ${response.status}`, {
        status: response.status,
      }),
      null,
    ];
  }

  if (!Array.isArray(decoded)) {
    return [new TransportError(`error in ${BATCH_LABEL}, response is not a list`, { status: response.status }), null];
  }

  if (decoded.length !== count) {
    return [
      new TransportError(`error in ${BATCH_LABEL}, got ${decoded.length} responses for ${count} calls`, {
        status: response.status,
      }),
      null,
    ];
  }

  const parts = decoded.map((part, index): SafeWrap<Error, RawResponse> => {
    if (part === null) {
      return [new TransportError(`error in ${BATCH_LABEL}, no response for call ${index}`), null];
    }

    if (!isJsonObject(part) || typeof part.code !== 'number') {
      return [new TransportError(`error in ${BATCH_LABEL}, malformed response for call ${index}`), null];
    }

    const headers: Record<string, string> = {};
    if (Array.isArray(part.headers)) {
      for (const header of part.headers) {
        if (isJsonObject(header) && typeof header.name === 'string' && typeof header.value === 'string') {
          headers[header.name.toLowerCase()] = header.value;
        }
      }
    }

    const { body } = part;
    return [
      null,
      {
        status: part.code,
        headers,
        body: typeof body === 'string' ? body : body === null || body === undefined ? '' : json.encode(body),
      },
    ];
  });

  return [null, parts];
}

/**
 * Batch scope opened by {@link GraphClient.beginBatch}.
 *
 * Exposes the same verbs as the client; each call is queued and returns a promise that
 * settles once {@link GraphBatch.execute} has sent all queued calls as one request and
 * split the combined response. Results are in registration order. A scope executes once.
 *
 * @example
 * const [errBegin, batch] = graph.beginBatch();
 * const me = batch.getObject('me');
 * const friends = batch.getConnections('me', 'friends');
 * const [err, results] = await batch.execute();
 * const [errMe, profile] = await me;
 */
export class GraphBatch extends GraphAPIMethods {
  #host: BatchHost;
  #pending: PendingCall[] = [];
  #state: 'open' | 'executed' | 'discarded' = 'open';

  constructor(host: BatchHost) {
    super();
    this.#host = host;
  }

  /** Number of queued calls. */
  get size(): number {
    return this.#pending.length;
  }

  /** Whether calls can still be added. */
  get open(): boolean {
    return this.#state === 'open';
  }

  /**
   * Sends the queued calls as one request and settles every call with its part of the response.
   *
   * @returns The per-call results in registration order, each either an `Error` or a value;
   *          `[error, null]` when the batch as a whole failed, in which case every call
   *          settles with that same error.
   */
  async execute(httpOptions: BatchOptions = {}): SafeWrapAsync<Error, unknown[]> {
    if (this.#state !== 'open') {
      return [new ArgumentError(`error batch was already ${this.#state}`), null];
    }

    this.#state = 'executed';
    this.#host.release();

    const pending = this.#pending;
    this.#pending = [];
    if (pending.length === 0) {
      return [null, []];
    }

    const logger = this.#host.logger();
    logger.debug(`${BATCH_LABEL} (${pending.length} calls)`);

    const { json } = this.#host.context();
    const [errSerialize, params] = this.#serialize(pending, json);
    if (errSerialize) {
      return this.#failAll(pending, errSerialize, logger);
    }

    const [errSend, response] = await this.#host.send('post', '', params, httpOptions);
    if (errSend) {
      return this.#failAll(pending, errSend, logger);
    }

    const [errSplit, parts] = splitBatchResponse(response, pending.length, json);
    if (errSplit) {
      return this.#failAll(pending, errSplit, logger);
    }

    const results: unknown[] = [];
    for (const [index, entry] of pending.entries()) {
      results.push(await entry.settle(parts[index]));
    }

    return [null, results];
  }

  /**
   * Closes the scope without sending anything; queued calls settle with an {@link ArgumentError}.
   */
  async discard(): Promise<void> {
    if (this.#state !== 'open') {
      return;
    }

    this.#state = 'discarded';
    this.#host.release();

    const pending = this.#pending;
    this.#pending = [];
    for (const entry of pending) {
      await entry.settle([new ArgumentError('error batch was discarded before executing'), null]);
    }
  }

  protected currentAccessToken(): string | undefined {
    return this.#host.accessToken();
  }

  /**
   * Queues a call; the returned promise settles when the batch executes.
   */
  protected dispatch<R>(call: GraphCall<R>): SafeWrapAsync<Error, R> {
    if (this.#state !== 'open') {
      return Promise.resolve([new ArgumentError(`error batch was already ${this.#state}`), null]);
    }

    return new Promise<SafeWrap<Error, R>>((resolve) => {
      this.#pending.push({
        call,
        settle: async (response) => {
          const outcome = await this.#outcome(response, call);
          resolve(outcome);
          return settled(outcome);
        },
      });
    });
  }

  async #outcome<R>(response: SafeWrap<Error, RawResponse>, call: GraphCall<R>): SafeWrapAsync<Error, R> {
    const [errResponse, raw] = response;
    if (errResponse) {
      return [errResponse, null];
    }

    return processResponse(raw, call, this.#host.context());
  }

  async #failAll(pending: PendingCall[], error: Error, logger: Logger): SafeWrapAsync<Error, unknown[]> {
    logger.warn(`${BATCH_LABEL} failed`, error);
    for (const entry of pending) {
      await entry.settle([error, null]);
    }

    return [error, null];
  }

  /**
   * Encodes the queued calls into the `batch` parameter; uploads are attached as
   * separate multipart fields named `op{call}_file{n}`.
   */
  #serialize(pending: PendingCall[], json: JsonCodec): SafeWrap<Error, HttpParams> {
    const operations: JsonObject[] = [];
    const files: HttpParams = {};

    for (const [index, { call }] of pending.entries()) {
      const [errEncode, params] = encodeArgs(call.args, json);
      if (errEncode) {
        return [new ArgumentError(`error encoding batch call ${index}`, { cause: errEncode }), null];
      }

      const fields = new URLSearchParams();
      const attached: string[] = [];
      for (const [key, value] of Object.entries(params)) {
        if (value instanceof UploadableIO) {
          const name = `op${index}_file${attached.length}`;
          attached.push(name);
          files[name] = value;
          continue;
        }

        fields.append(key, value);
      }

      const query = fields.toString();
      const operation: JsonObject = { method: call.verb.toUpperCase() };
      if (call.verb === 'post') {
        operation.relative_url = relativeUrl(call.path, '');
        operation.body = query;
      } else {
        operation.relative_url = relativeUrl(call.path, query);
      }

      if (attached.length > 0) {
        operation.attached_files = attached.join(',');
      }

      operations.push(operation);
    }

    return [null, { ...files, batch: json.encode(operations) }];
  }
}

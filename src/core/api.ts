import { MissingAccessTokenError } from '../error/missingAccessTokenError.js';
import { parseMediaArgs } from '../media/parseMediaArgs.js';
import { UploadableIO } from '../media/uploadableIO.js';
import type { HttpVerb } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { GraphCollection } from './collection.js';
import {
  type CallOptions,
  freezeJson,
  type GraphArgs,
  type GraphCall,
  type GraphResult,
  isJsonObject,
  type JsonObject,
  type JsonValue,
  type MediaArgs,
} from './types.js';

const identity = (result: GraphResult): unknown => result;

/** Copies args so that later changes to nested objects do not reach a dispatched call. */
function freezeArgs(args: GraphArgs): Readonly<GraphArgs> {
  const copy: GraphArgs = {};
  for (const [key, value] of Object.entries(args)) {
    copy[key] = value === undefined || value instanceof UploadableIO ? value : freezeJson(value);
  }

  return Object.freeze(copy);
}

function joinIds(ids: readonly string[] | string): string {
  return typeof ids === 'string' ? ids : ids.join(',');
}

function itemsOf(result: GraphResult): JsonValue[] {
  if (result instanceof GraphCollection) {
    return result.items;
  }

  return Array.isArray(result) ? result : [];
}

/**
 * Graph API verbs shared by the client and by batch scopes.
 *
 * Every verb funnels into {@link GraphAPIMethods.graphCall}, which guards writes and deletes
 * against a missing access token and hands the frozen call to `dispatch`: the client sends
 * it straight away, a batch scope queues it until the batch executes.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync}.
 */
export abstract class GraphAPIMethods {
  /** Access token writes and deletes are checked against. */
  protected abstract currentAccessToken(): string | undefined;

  /** Sends or queues a call; resolves with its processed result. */
  protected abstract dispatch<R>(call: GraphCall<R>): SafeWrapAsync<Error, R>;

  /**
   * Direct access to the Graph API; every other method is built on this one.
   *
   * @param path - Object id, `id/connection`, or an absolute URL.
   * @param postProcess - Applied to the result after error checks and page wrapping.
   */
  graphCall(path: string, args?: GraphArgs, verb?: HttpVerb, options?: CallOptions): SafeWrapAsync<Error, GraphResult>;
  graphCall<R>(
    path: string,
    args: GraphArgs,
    verb: HttpVerb,
    options: CallOptions,
    postProcess: (result: GraphResult) => R,
  ): SafeWrapAsync<Error, R>;
  async graphCall(
    path: string,
    args: GraphArgs = {},
    verb: HttpVerb = 'get',
    options: CallOptions = {},
    postProcess: (result: GraphResult) => unknown = identity,
  ): SafeWrapAsync<Error, unknown> {
    if (verb !== 'get' && !this.currentAccessToken()) {
      const message = verb === 'delete' ? 'Delete requires an access token' : 'Write operations require an access token';
      return [new MissingAccessTokenError(message), null];
    }

    const call: GraphCall<unknown> = {
      path,
      args: freezeArgs(args),
      verb,
      options: Object.freeze({ ...options }),
      postProcess,
    };

    return this.dispatch(Object.freeze(call));
  }

  /**
   * Fetches a single object.
   * @example
   * const [err, me] = await graph.getObject('me', { fields: 'id,name' });
   */
  getObject(id: string, args: GraphArgs = {}, options: CallOptions = {}): SafeWrapAsync<Error, GraphResult> {
    return this.graphCall(id, args, 'get', options);
  }

  /**
   * Fetches several objects in one request, keyed by id. An empty list resolves to `[]` without a request.
   */
  async getObjects(
    ids: readonly string[] | string,
    args: GraphArgs = {},
    options: CallOptions = {},
  ): SafeWrapAsync<Error, GraphResult> {
    if (ids.length === 0) {
      return [null, []];
    }

    return this.graphCall('', { ...args, ids: joinIds(ids) }, 'get', options);
  }

  /**
   * Writes an object to a connection of its parent.
   * @example
   * const [err, created] = await graph.putObject('me', 'feed', { message: 'Hello, world' });
   */
  putObject(
    parentObject: string,
    connectionName: string,
    args: GraphArgs = {},
    options: CallOptions = {},
  ): SafeWrapAsync<Error, GraphResult> {
    return this.graphCall(`${parentObject}/${connectionName}`, args, 'post', options);
  }

  /** Deletes an object. Also used for posts, comments, photos and videos. */
  deleteObject(id: string, options: CallOptions = {}): SafeWrapAsync<Error, GraphResult> {
    return this.graphCall(id, {}, 'delete', options);
  }

  /** Fetches a connection of an object; list results come back as a {@link GraphCollection}. */
  getConnections(
    id: string,
    connectionName: string,
    args: GraphArgs = {},
    options: CallOptions = {},
  ): SafeWrapAsync<Error, GraphResult> {
    return this.graphCall(`${id}/${connectionName}`, args, 'get', options);
  }

  putConnections(
    id: string,
    connectionName: string,
    args: GraphArgs = {},
    options: CallOptions = {},
  ): SafeWrapAsync<Error, GraphResult> {
    return this.graphCall(`${id}/${connectionName}`, args, 'post', options);
  }

  deleteConnections(
    id: string,
    connectionName: string,
    args: GraphArgs = {},
    options: CallOptions = {},
  ): SafeWrapAsync<Error, GraphResult> {
    return this.graphCall(`${id}/${connectionName}`, args, 'delete', options);
  }

  /**
   * Resolves the URL of an object's picture. The API answers with a redirect,
   * so the result is the `Location` header rather than a body.
   */
  getPicture(object: string, args: GraphArgs = {}, options: CallOptions = {}): SafeWrapAsync<Error, string | null> {
    return this.graphCall(
      `${object}/picture`,
      args,
      'get',
      { ...options, httpComponent: 'headers' },
      (headers) => (isJsonObject(headers) && typeof headers.location === 'string' ? headers.location : null),
    );
  }

  /**
   * Uploads a photo, or has the API fetch one from a URL.
   *
   * @example
   * await graph.putPicture('/tmp/cat.jpg', 'image/jpeg', { message: 'Cat' }, 'me');
   * await graph.putPicture(bytes, { message: 'Cat' });
   * await graph.putPicture('https://example.com/cat.jpg', { message: 'Cat' }, pageId);
   */
  async putPicture(...mediaArgs: MediaArgs): SafeWrapAsync<Error, GraphResult> {
    const [err, parsed] = parseMediaArgs(mediaArgs, 'photos');
    if (err) {
      return [err, null];
    }

    return this.putObject(parsed.target, parsed.connection, parsed.args, parsed.options);
  }

  /** Uploads a video; same argument shapes as {@link GraphAPIMethods.putPicture}. */
  async putVideo(...mediaArgs: MediaArgs): SafeWrapAsync<Error, GraphResult> {
    const [err, parsed] = parseMediaArgs(mediaArgs, 'videos');
    if (err) {
      return [err, null];
    }

    return this.putObject(parsed.target, parsed.connection, parsed.args, parsed.options);
  }

  /**
   * Posts to a feed.
   * @param attachment - Link details such as `name`, `link`, `caption`, `description`, `picture`.
   */
  putWallPost(
    message: string,
    attachment: GraphArgs = {},
    profileId = 'me',
    options: CallOptions = {},
  ): SafeWrapAsync<Error, GraphResult> {
    return this.putObject(profileId, 'feed', { ...attachment, message }, options);
  }

  putComment(objectId: string, message: string, options: CallOptions = {}): SafeWrapAsync<Error, GraphResult> {
    return this.putObject(objectId, 'comments', { message }, options);
  }

  putLike(objectId: string, options: CallOptions = {}): SafeWrapAsync<Error, GraphResult> {
    return this.putObject(objectId, 'likes', {}, options);
  }

  deleteLike(objectId: string, options: CallOptions = {}): SafeWrapAsync<Error, GraphResult> {
    return this.graphCall(`${objectId}/likes`, {}, 'delete', options);
  }

  /** Searches the graph; `null` terms leave `q` out, e.g. for place searches by `center`. */
  search(searchTerms: string | null, args: GraphArgs = {}, options: CallOptions = {}): SafeWrapAsync<Error, GraphResult> {
    return this.graphCall('search', searchTerms === null ? args : { ...args, q: searchTerms }, 'get', options);
  }

  fqlQuery(query: string, args: GraphArgs = {}, options: CallOptions = {}): SafeWrapAsync<Error, GraphResult> {
    return this.getObject('fql', { ...args, q: query }, options);
  }

  /**
   * Runs several named queries at once and returns their result sets keyed by name.
   * @example
   * const [err, sets] = await graph.fqlMultiquery({ friends: 'SELECT uid2 FROM friend WHERE uid1 = me()' });
   * sets?.friends;
   */
  fqlMultiquery(
    queries: Record<string, string>,
    args: GraphArgs = {},
    options: CallOptions = {},
  ): SafeWrapAsync<Error, JsonObject> {
    return this.graphCall('fql', { ...args, q: queries }, 'get', options, (result) => {
      const outcome: JsonObject = {};
      for (const entry of itemsOf(result)) {
        if (isJsonObject(entry) && typeof entry.name === 'string') {
          outcome[entry.name] = entry.fql_result_set ?? null;
        }
      }

      return outcome;
    });
  }

  /** Reads the access token of a page the current user manages. */
  getPageAccessToken(
    objectId: string,
    args: GraphArgs = {},
    options: CallOptions = {},
  ): SafeWrapAsync<Error, string | null> {
    return this.graphCall(objectId, { ...args, fields: 'access_token' }, 'get', options, (result) =>
      isJsonObject(result) && typeof result.access_token === 'string' ? result.access_token : null,
    );
  }

  /** Fetches the comments attached to external URLs. An empty list resolves to `[]` without a request. */
  async getCommentsForUrls(
    urls: readonly string[] | string,
    args: GraphArgs = {},
    options: CallOptions = {},
  ): SafeWrapAsync<Error, GraphResult> {
    if (urls.length === 0) {
      return [null, []];
    }

    return this.getObject('comments', { ...args, ids: joinIds(urls) }, options);
  }

  /** Sets demographic restrictions on an app; the restrictions travel as embedded JSON. */
  setAppRestrictions(
    appId: string,
    restrictions: JsonObject,
    args: GraphArgs = {},
    options: CallOptions = {},
  ): SafeWrapAsync<Error, GraphResult> {
    return this.graphCall(appId, { ...args, restrictions }, 'post', options);
  }

  /** Replays a page call, as produced by {@link GraphCollection.nextPageParams}. */
  getPage(params: GraphCall): SafeWrapAsync<Error, GraphResult> {
    return this.graphCall(params.path, { ...params.args }, params.verb, params.options);
  }
}

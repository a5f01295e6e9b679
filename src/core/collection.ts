import { ArgumentError } from '../error/argumentError.js';
import { type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import {
  freezeJson,
  type GraphArgs,
  type GraphCall,
  type GraphPager,
  type GraphResult,
  isJsonObject,
  type JsonObject,
  type JsonValue,
} from './types.js';

/** Which paging style a page was returned with. */
export type PagingMode = 'cursor' | 'legacy' | 'none';

type Direction = 'next' | 'previous';

const CURSOR_PARAM: Record<Direction, 'after' | 'before'> = { next: 'after', previous: 'before' };

function readString(source: JsonObject | null, key: string): string | null {
  const value = source?.[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * One page of a connection (or any other response with a `data` array), with links
 * to the adjacent pages.
 *
 * The page is immutable: the stored body is a frozen copy, iterating re-reads it every
 * time, and moving to another page dispatches a fresh call and returns a new collection.
 *
 * @example
 * const [err, friends] = await graph.getConnections('me', 'friends');
 * if (friends instanceof GraphCollection) {
 *   for (const friend of friends) console.log(friend);
 *   const [errNext, more] = await friends.nextPage();
 * }
 */
export class GraphCollection implements Iterable<JsonValue> {
  /** Decoded body the page was built from, frozen */
  readonly raw: JsonObject;
  /** The `paging` block, when the response had one */
  readonly paging: JsonObject | null;
  /** Call that produced this page */
  #call: GraphCall<unknown>;
  /** Client issuing page calls */
  #pager: GraphPager;
  /** Whether `next`/`previous` links may be followed without cursors */
  #legacyPaging: boolean;

  private constructor(raw: JsonObject, call: GraphCall<unknown>, pager: GraphPager, legacyPaging: boolean) {
    this.raw = freezeJson(raw);
    this.paging = isJsonObject(this.raw.paging) ? this.raw.paging : null;
    this.#call = call;
    this.#pager = pager;
    this.#legacyPaging = legacyPaging;
  }

  /**
   * Wraps a result in a {@link GraphCollection} when it is a mapping with a `data` array;
   * returns any other result untouched.
   */
  static evaluate(
    result: GraphResult,
    call: GraphCall<unknown>,
    context: { pager: GraphPager; legacyPaging: boolean },
  ): GraphResult {
    if (result instanceof GraphCollection || !isJsonObject(result) || !Array.isArray(result.data)) {
      return result;
    }

    return new GraphCollection(result, call, context.pager, context.legacyPaging);
  }

  /** Items of this page, as a fresh array. */
  get items(): JsonValue[] {
    const { data } = this.raw;
    return Array.isArray(data) ? [...data] : [];
  }

  get length(): number {
    return this.items.length;
  }

  *[Symbol.iterator](): Iterator<JsonValue> {
    yield* this.items;
  }

  /**
   * Paging style of this page. Cursor paging wins whenever a `cursors` block is present;
   * `next`/`previous` links alone are only honoured with legacy paging enabled.
   */
  get mode(): PagingMode {
    if (isJsonObject(this.paging?.cursors)) {
      return 'cursor';
    }

    if (this.#legacyPaging && (readString(this.paging, 'next') || readString(this.paging, 'previous'))) {
      return 'legacy';
    }

    return 'none';
  }

  /** Call that fetches the next page, or `null` on the last page. */
  nextPageParams(): GraphCall | null {
    return this.#pageParams('next');
  }

  /** Call that fetches the previous page, or `null` on the first page. */
  previousPageParams(): GraphCall | null {
    return this.#pageParams('previous');
  }

  /** Fetches the next page; an {@link ArgumentError} when there is none. */
  nextPage(): SafeWrapAsync<Error, GraphResult> {
    return this.#page('next');
  }

  /** Fetches the previous page; an {@link ArgumentError} when there is none. */
  previousPage(): SafeWrapAsync<Error, GraphResult> {
    return this.#page('previous');
  }

  async #page(direction: Direction): SafeWrapAsync<Error, GraphResult> {
    const params = this.#pageParams(direction);
    if (!params) {
      return [new ArgumentError(`error no ${direction} page for ${this.#call.path}`), null];
    }

    return this.#pager.getPage(params);
  }

  #pageParams(direction: Direction): GraphCall | null {
    const link = readString(this.paging, direction);
    if (!link) {
      return null;
    }

    switch (this.mode) {
      case 'cursor':
        return this.#cursorParams(direction);
      case 'legacy':
        return this.#linkParams(link);
      default:
        return null;
    }
  }

  /** Re-issues the originating call with the `after`/`before` cursor. */
  #cursorParams(direction: Direction): GraphCall | null {
    const cursors = this.paging?.cursors;
    const cursor = isJsonObject(cursors) ? readString(cursors, CURSOR_PARAM[direction]) : null;
    if (!cursor) {
      return null;
    }

    const args: GraphArgs = {};
    for (const [key, value] of Object.entries(this.#call.args)) {
      if (key !== 'after' && key !== 'before') {
        args[key] = value;
      }
    }

    args[CURSOR_PARAM[direction]] = cursor;
    return this.#pageCall(this.#call.path, args);
  }

  /** Splits an absolute `next`/`previous` link into its path and query arguments. */
  #linkParams(link: string): GraphCall | null {
    const [errUrl, url] = safeWrap(() => new URL(link));
    if (errUrl) {
      return null;
    }

    const args: GraphArgs = {};
    for (const [key, value] of url.searchParams) {
      args[key] = value;
    }

    return this.#pageCall(`${url.origin}${url.pathname}`, args);
  }

  #pageCall(path: string, args: GraphArgs): GraphCall {
    const call: GraphCall = {
      path,
      args,
      verb: 'get',
      options: this.#call.options,
      postProcess: (result) => result,
    };

    return Object.freeze(call);
  }
}

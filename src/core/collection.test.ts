import { afterEach, describe, expect, it, vi } from 'vitest';
import { ArgumentError } from '../error/argumentError.js';
import { GraphCollection } from './collection.js';
import type { GraphCall, GraphPager, JsonValue } from './types.js';

const getPage = vi.fn<GraphPager['getPage']>();
const pager: GraphPager = { getPage };

const originCall = (overrides: Partial<GraphCall> = {}): GraphCall => ({
  path: 'me/friends',
  args: { limit: 2 },
  verb: 'get',
  options: {},
  postProcess: (result) => result,
  ...overrides,
});

const toPage = (result: JsonValue, legacyPaging = true, call = originCall()): GraphCollection => {
  const evaluated = GraphCollection.evaluate(result, call, { pager, legacyPaging });
  if (!(evaluated instanceof GraphCollection)) {
    throw new Error('expected a collection');
  }

  return evaluated;
};

describe('GraphCollection', () => {
  afterEach(() => {
    vi.resetAllMocks();
  });

  describe('evaluate', () => {
    it('only wraps mappings with a data list', () => {
      const context = { pager, legacyPaging: true };

      expect(GraphCollection.evaluate({ id: '1' }, originCall(), context)).toEqual({ id: '1' });
      expect(GraphCollection.evaluate({ data: 'text' }, originCall(), context)).toEqual({ data: 'text' });
      expect(GraphCollection.evaluate([1, 2], originCall(), context)).toEqual([1, 2]);
      expect(GraphCollection.evaluate(null, originCall(), context)).toBeNull();
      expect(GraphCollection.evaluate({ data: [] }, originCall(), context)).toBeInstanceOf(GraphCollection);
    });
  });

  describe('iteration', () => {
    it('yields the items of the page, every time it is iterated', () => {
      const page = toPage({ data: ['a', 'b', 'c'] });

      expect([...page]).toEqual(['a', 'b', 'c']);
      expect([...page]).toEqual(['a', 'b', 'c']);
      expect(page.length).toBe(3);
    });

    it('hands out copies of the items', () => {
      const page = toPage({ data: ['a', 'b'] });

      page.items.push('c');

      expect(page.items).toEqual(['a', 'b']);
      expect(page.raw).toEqual({ data: ['a', 'b'] });
    });

    it('keeps a frozen copy of its body', () => {
      const body = { data: [{ id: 'a' }], paging: { next: 'https://graph.facebook.com/me/friends?offset=1' } };
      const page = toPage(body);

      body.data.push({ id: 'b' });

      expect(Object.isFrozen(page.raw)).toBe(true);
      expect(Object.isFrozen(page.raw.data)).toBe(true);
      expect(() => {
        if (page.paging) {
          page.paging.next = 'https://other.example/x';
        }
      }).toThrow(TypeError);
      expect(page.items).toEqual([{ id: 'a' }]);
      expect(page.nextPageParams()?.path).toBe('https://graph.facebook.com/me/friends');
    });
  });

  describe('legacy paging', () => {
    const body = {
      data: ['a', 'b'],
      paging: {
        next: 'https://graph.facebook.com/me/friends?limit=2&offset=2',
        previous: 'https://graph.facebook.com/me/friends?limit=2&offset=0',
      },
    };

    it('turns the next link into an absolute path and query args', () => {
      const page = toPage(body);

      expect(page.mode).toBe('legacy');
      expect(page.nextPageParams()).toMatchObject({
        path: 'https://graph.facebook.com/me/friends',
        args: { limit: '2', offset: '2' },
        verb: 'get',
      });
      expect(page.previousPageParams()?.args).toEqual({ limit: '2', offset: '0' });
    });

    it('fetches the next page with one call through the pager', async () => {
      const next = toPage({ data: ['c'] });
      getPage.mockResolvedValueOnce([null, next]);
      const page = toPage(body);

      const [err, result] = await page.nextPage();

      expect(err).toBeNull();
      expect(result).toBe(next);
      expect(getPage).toHaveBeenCalledOnce();
      expect(getPage.mock.calls[0][0]).toMatchObject({
        path: 'https://graph.facebook.com/me/friends',
        args: { limit: '2', offset: '2' },
      });
    });

    it('ignores links when legacy paging is disabled', async () => {
      const page = toPage(body, false);

      const [err] = await page.nextPage();

      expect(page.mode).toBe('none');
      expect(page.nextPageParams()).toBeNull();
      expect(err).toBeInstanceOf(ArgumentError);
      expect(err?.message).toBe('error no next page for me/friends');
      expect(getPage).not.toHaveBeenCalled();
    });

    it('has no page behind a link that does not parse', () => {
      const page = toPage({ data: [], paging: { next: 'not a url' } });

      expect(page.nextPageParams()).toBeNull();
    });
  });

  describe('cursor paging', () => {
    it('re-issues the original call with the after cursor', () => {
      const call = originCall({ args: { limit: 2, before: 'stale' }, options: { headers: { 'X-Trace': '1' } } });
      const page = toPage(
        {
          data: ['a', 'b'],
          paging: {
            cursors: { after: 'QVFI', before: 'QVFA' },
            next: 'https://graph.facebook.com/me/friends?limit=2&after=QVFI',
          },
        },
        false,
        call,
      );

      expect(page.mode).toBe('cursor');
      expect(page.nextPageParams()).toMatchObject({
        path: 'me/friends',
        args: { limit: 2, after: 'QVFI' },
        verb: 'get',
        options: { headers: { 'X-Trace': '1' } },
      });
      expect(page.nextPageParams()?.args).not.toHaveProperty('before');
    });

    it('needs a previous link for the before cursor', async () => {
      const page = toPage({
        data: ['a'],
        paging: { cursors: { after: 'QVFI', before: 'QVFA' }, next: 'https://graph.facebook.com/me/friends' },
      });

      const [err] = await page.previousPage();

      expect(page.previousPageParams()).toBeNull();
      expect(err?.message).toBe('error no previous page for me/friends');
    });

    it('treats a missing next link as the last page', () => {
      const page = toPage({ data: ['a'], paging: { cursors: { after: 'QVFI', before: 'QVFA' } } });

      expect(page.nextPageParams()).toBeNull();
    });

    it('fetches the previous page with the before cursor', async () => {
      getPage.mockResolvedValueOnce([null, { data: [] }]);
      const page = toPage({
        data: ['c'],
        paging: {
          cursors: { after: 'QVFJ', before: 'QVFB' },
          previous: 'https://graph.facebook.com/me/friends?before=QVFB',
        },
      });

      const [err] = await page.previousPage();

      expect(err).toBeNull();
      expect(getPage.mock.calls[0][0].args).toEqual({ limit: 2, before: 'QVFB' });
    });
  });
});

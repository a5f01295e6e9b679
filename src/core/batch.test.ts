import { afterEach, describe, expect, test, vi } from 'vitest';
import { z } from 'zod';
import { ArgumentError } from '../error/argumentError.js';
import { GraphAPIError, getGraphAPIError } from '../error/graphAPIError.js';
import { isMissingAccessTokenError } from '../error/missingAccessTokenError.js';
import { isTransportError, TransportError } from '../error/transportError.js';
import { getValidationError, ValidationError } from '../error/validationError.js';
import { UploadableIO } from '../media/uploadableIO.js';
import type { HttpServiceDefinition, RawResponse } from '../types/request.js';
import type { Logger } from '../utils/logger.js';
import type { SafeWrap } from '../utils/wrap.js';
import type { GraphBatch } from './batch.js';
import { type GraphClientProps, GraphClient } from './client.js';
import { GraphCollection } from './collection.js';

const request = vi.fn<HttpServiceDefinition['request']>();

class MockHttpService implements HttpServiceDefinition {
  request = request;
  config = vi.fn();
}

const respond = (status: number, body: unknown): SafeWrap<Error, RawResponse> => [
  null,
  { status, headers: {}, body: JSON.stringify(body) },
];

const createClient = (props: GraphClientProps = {}) =>
  new GraphClient({
    accessToken: 'test-token',
    httpService: MockHttpService,
    httpOpts: { timeout: false },
    ...props,
  });

const openBatch = (graph: GraphClient): GraphBatch => {
  const [err, batch] = graph.beginBatch();
  if (err) {
    throw err;
  }

  return batch;
};

describe('GraphBatch', () => {
  afterEach(() => {
    vi.resetAllMocks();
  });

  test('sends all queued calls as one request and returns results in order', async () => {
    request.mockResolvedValueOnce(
      respond(200, [
        { code: 200, headers: [{ name: 'Content-Type', value: 'application/json' }], body: '{"id":"1"}' },
        { code: 200, headers: [], body: '{"data":[{"id":"a"}]}' },
      ]),
    );
    const graph = createClient();
    const batch = openBatch(graph);

    const me = batch.getObject('me');
    const friends = batch.getConnections('me', 'friends', { limit: 1 });
    expect(batch.size).toBe(2);

    const [err, results] = await batch.execute();

    expect(err).toBeNull();
    expect(request).toHaveBeenCalledOnce();
    expect(request.mock.calls[0].slice(0, 3)).toEqual([
      'post',
      '',
      {
        batch: '[{"method":"GET","relative_url":"me"},{"method":"GET","relative_url":"me/friends?limit=1"}]',
        access_token: 'test-token',
      },
    ]);
    expect(results).toHaveLength(2);
    expect(results?.[0]).toEqual({ id: '1' });
    expect(results?.[1]).toBeInstanceOf(GraphCollection);
    expect(await me).toEqual([null, { id: '1' }]);

    const [errFriends, page] = await friends;
    expect(errFriends).toBeNull();
    expect(page instanceof GraphCollection && page.items).toEqual([{ id: 'a' }]);
  });

  test('puts post args in the operation body', async () => {
    request.mockResolvedValueOnce(respond(200, [{ code: 200, headers: [], body: { id: '123_456' } }]));
    const graph = createClient();
    const batch = openBatch(graph);

    const post = batch.putObject('me', 'feed', { message: 'Hello, world' });
    await batch.execute();

    expect(request.mock.calls[0][2].batch).toBe(
      '[{"method":"POST","relative_url":"me/feed","body":"message=Hello%2C+world"}]',
    );
    expect(await post).toEqual([null, { id: '123_456' }]);
  });

  test('sends args as they were when the call was queued', async () => {
    request.mockResolvedValueOnce(respond(200, [{ code: 200, headers: [], body: 'true' }]));
    const graph = createClient();
    const batch = openBatch(graph);
    const restrictions = { age: '18+' };

    const restricted = batch.setAppRestrictions('app', restrictions);
    restrictions.age = '21+';
    await batch.execute();

    expect(request.mock.calls[0][2].batch).toBe(
      '[{"method":"POST","relative_url":"app","body":"restrictions=%7B%22age%22%3A%2218%2B%22%7D"}]',
    );
    expect(await restricted).toEqual([null, true]);
  });

  test('attaches uploads as separate multipart fields', async () => {
    request.mockResolvedValueOnce(respond(200, [{ code: 200, headers: [], body: '{"id":"photo-1"}' }]));
    const graph = createClient();
    const batch = openBatch(graph);

    const photo = batch.putPicture(new Uint8Array([1, 2, 3]), 'image/png', { message: 'Cat' });
    await batch.execute();

    const params = request.mock.calls[0][2];
    expect(params.op0_file0).toBeInstanceOf(UploadableIO);
    expect(params.batch).toBe(
      '[{"method":"POST","relative_url":"me/photos","body":"message=Cat","attached_files":"op0_file0"}]',
    );
    expect(await photo).toEqual([null, { id: 'photo-1' }]);
  });

  test('captures errors per call without failing the others', async () => {
    request.mockResolvedValueOnce(
      respond(200, [
        {
          code: 400,
          headers: [],
          body: '{"error":{"message":"Unsupported get request","type":"GraphMethodException","code":100}}',
        },
        { code: 200, headers: [], body: '{"id":"2"}' },
      ]),
    );
    const graph = createClient();
    const batch = openBatch(graph);

    const missing = batch.getObject('missing');
    const found = batch.getObject('2');
    const [err, results] = await batch.execute();

    expect(err).toBeNull();
    expect(results?.[0]).toBeInstanceOf(GraphAPIError);
    expect(results?.[1]).toEqual({ id: '2' });

    const [errMissing] = await missing;
    expect(getGraphAPIError(errMissing)?.message).toBe('GraphMethodException: Unsupported get request');
    expect(getGraphAPIError(errMissing)?.status).toBe(400);
    expect(await found).toEqual([null, { id: '2' }]);
  });

  test('fails only the call whose part of the response is null', async () => {
    request.mockResolvedValueOnce(respond(200, [null, { code: 200, headers: [], body: 'true' }]));
    const graph = createClient();
    const batch = openBatch(graph);

    const first = batch.getObject('1');
    const second = batch.getObject('2');
    await batch.execute();

    const [errFirst] = await first;
    expect(errFirst).toBeInstanceOf(TransportError);
    expect(errFirst?.message).toBe('error in POST batch, no response for call 0');
    expect(await second).toEqual([null, true]);
  });

  test('reads headers of a part for header calls', async () => {
    request.mockResolvedValueOnce(
      respond(200, [
        { code: 302, headers: [{ name: 'Location', value: 'https://cdn.example.com/ada.jpg' }], body: null },
      ]),
    );
    const graph = createClient();
    const batch = openBatch(graph);

    const picture = batch.getPicture('ada');
    await batch.execute();

    expect(await picture).toEqual([null, 'https://cdn.example.com/ada.jpg']);
  });

  test('validates each part against its own schema', async () => {
    request.mockResolvedValueOnce(
      respond(200, [
        { code: 200, headers: [], body: '{"id":1}' },
        { code: 200, headers: [], body: '{"id":"2"}' },
      ]),
    );
    const graph = createClient();
    const batch = openBatch(graph);
    const schema = z.object({ id: z.string() });

    const invalid = batch.getObject('1', {}, { schema });
    const valid = batch.getObject('2', {}, { schema });
    await batch.execute();

    const [errInvalid] = await invalid;
    expect(errInvalid).toBeInstanceOf(ValidationError);
    expect(errInvalid?.message).toMatch(/^error validating result of GET 1; issues: /);
    expect(getValidationError(errInvalid)?.issues[0].path).toEqual(['id']);
    expect(await valid).toEqual([null, { id: '2' }]);
  });

  test('fails every call with the same error when the batch request is rejected', async () => {
    request.mockResolvedValueOnce(
      respond(400, { error: { type: 'OAuthException', message: 'Invalid OAuth access token', code: 190 } }),
    );
    const graph = createClient();
    const batch = openBatch(graph);

    const first = batch.getObject('1');
    const second = batch.getObject('2');
    const [err, results] = await batch.execute();

    expect(results).toBeNull();
    expect(err).toBeInstanceOf(GraphAPIError);
    expect(err?.message).toBe('OAuthException: Invalid OAuth access token');
    expect((await first)[0]).toBe(err);
    expect((await second)[0]).toBe(err);
  });

  test('fails every call when the response does not match the calls', async () => {
    request.mockResolvedValueOnce(respond(200, [{ code: 200, headers: [], body: '{}' }]));
    const graph = createClient();
    const batch = openBatch(graph);

    const first = batch.getObject('1');
    batch.getObject('2');
    const [err] = await batch.execute();

    expect(isTransportError(err)).toBe(true);
    expect(err?.message).toBe('error in POST batch, got 1 responses for 2 calls');
    expect((await first)[0]).toBe(err);
  });

  test('fails every call when the response is not a list', async () => {
    request.mockResolvedValueOnce(respond(200, { id: '1' }));
    const graph = createClient();
    const batch = openBatch(graph);

    batch.getObject('1');
    const [err] = await batch.execute();

    expect(err?.message).toBe('error in POST batch, response is not a list');
  });

  test('fails every call when the transport fails', async () => {
    request.mockResolvedValueOnce([new Error('offline'), null]);
    const graph = createClient();
    const batch = openBatch(graph);

    const first = batch.getObject('1');
    const [err] = await batch.execute();

    expect(isTransportError(err)).toBe(true);
    expect(err?.message).toBe('error calling POST /');
    expect((await first)[0]).toBe(err);
  });

  test('fails writes without an access token without queueing them', async () => {
    const graph = createClient({ accessToken: undefined });
    const batch = openBatch(graph);

    const [err] = await batch.putObject('me', 'feed', { message: 'Hello, world' });

    expect(isMissingAccessTokenError(err)).toBe(true);
    expect(batch.size).toBe(0);
  });

  test('executes an empty batch without a request', async () => {
    const graph = createClient();
    const batch = openBatch(graph);

    expect(await batch.execute()).toEqual([null, []]);
    expect(request).not.toHaveBeenCalled();
  });

  test('allows one open batch per client', async () => {
    const graph = createClient();
    const batch = openBatch(graph);

    const [err, nested] = graph.beginBatch();
    expect(nested).toBeNull();
    expect(err).toBeInstanceOf(ArgumentError);
    expect(err?.message).toBe('error a batch is already open on this client');

    await batch.execute();
    const [errAfter, next] = graph.beginBatch();
    expect(errAfter).toBeNull();
    expect(next?.open).toBe(true);
  });

  test('executes once and refuses calls afterwards', async () => {
    const graph = createClient();
    const batch = openBatch(graph);
    await batch.execute();

    const [errExecute] = await batch.execute();
    const [errCall] = await batch.getObject('me');

    expect(batch.open).toBe(false);
    expect(errExecute).toBeInstanceOf(ArgumentError);
    expect(errExecute?.message).toBe('error batch was already executed');
    expect(errCall?.message).toBe('error batch was already executed');
  });

  test('discard settles queued calls and frees the client', async () => {
    const graph = createClient();
    const batch = openBatch(graph);

    const me = batch.getObject('me');
    await batch.discard();

    const [err] = await me;
    expect(err).toBeInstanceOf(ArgumentError);
    expect(err?.message).toBe('error batch was discarded before executing');
    expect(request).not.toHaveBeenCalled();
    expect(graph.beginBatch()[0]).toBeNull();
  });

  test('logs one line per batch', async () => {
    const logger: Logger = { debug: vi.fn(), warn: vi.fn() };
    request.mockResolvedValueOnce(
      respond(200, [
        { code: 200, headers: [], body: '{}' },
        { code: 200, headers: [], body: '{}' },
      ]),
    );
    const graph = createClient({ debug: logger });
    const batch = openBatch(graph);

    batch.getObject('1');
    batch.getObject('2');
    await batch.execute();

    expect(logger.debug).toHaveBeenCalledOnce();
    expect(logger.debug).toHaveBeenCalledWith('POST batch (2 calls)');
  });
});

describe('GraphClient.batch', () => {
  afterEach(() => {
    vi.resetAllMocks();
  });

  test('runs the block and executes the batch', async () => {
    request.mockResolvedValueOnce(
      respond(200, [
        { code: 200, headers: [], body: '{"id":"1"}' },
        { code: 200, headers: [], body: '{"id":"2"}' },
      ]),
    );
    const graph = createClient();

    const [err, results] = await graph.batch(
      (batch) => {
        batch.getObject('1');
        batch.getObject('2');
      },
      { headers: { 'X-Batch': 'yes' } },
    );

    expect(err).toBeNull();
    expect(results).toEqual([{ id: '1' }, { id: '2' }]);
    expect(request.mock.calls[0][3].headers).toEqual({ 'X-Batch': 'yes' });
  });

  test('discards the batch when the block throws', async () => {
    const graph = createClient();
    const queued: Array<Promise<SafeWrap<Error, unknown>>> = [];

    const [err] = await graph.batch((batch) => {
      queued.push(batch.getObject('1'));
      throw new Error('block failed');
    });

    expect(err?.message).toBe('error running batch block');
    expect(err?.cause).toEqual(new Error('block failed'));
    expect(request).not.toHaveBeenCalled();
    const [errQueued] = await queued[0];
    expect(errQueued?.message).toBe('error batch was discarded before executing');
    expect((await graph.batch(() => {}))[0]).toBeNull();
  });

  test('fails a nested batch', async () => {
    const graph = createClient();
    const nested: Array<Promise<SafeWrap<Error, unknown[]>>> = [];

    await graph.batch(() => {
      nested.push(graph.batch(() => {}));
    });

    const [errNested] = await nested[0];
    expect(errNested).toBeInstanceOf(ArgumentError);
    expect(errNested?.message).toBe('error a batch is already open on this client');
  });

  test('fails instead of hanging when the block awaits its own calls', async () => {
    const graph = createClient();
    const seen: Array<SafeWrap<Error, unknown>> = [];

    const [err] = await graph.batch(async (batch) => {
      seen.push(await batch.getObject('1'));
    });

    expect(err).toBeInstanceOf(ArgumentError);
    expect(err?.message).toBe('error batch block must be synchronous, await its calls after the batch executes');
    expect(request).not.toHaveBeenCalled();
    expect(seen[0][0]?.message).toBe('error batch was discarded before executing');
    expect((await graph.batch(() => {}))[0]).toBeNull();
  });
});

import { ArgumentError } from '../error/argumentError.js';
import { type CallOptions, type GraphArgs, type GraphArgValue, isJsonObject, type JsonValue } from '../core/types.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';
import { isUploadSource, UploadableIO } from './uploadableIO.js';

/** Connections media can be posted to. */
export type MediaConnection = 'photos' | 'videos';

/** Where the media comes from: a URL the API fetches itself, or bytes we upload. */
export type MediaTarget = { kind: 'url'; url: string } | { kind: 'upload'; io: UploadableIO };

/** Canonical form of a `putPicture`/`putVideo` call. */
export interface ParsedMediaArgs {
  target: string;
  connection: MediaConnection;
  /** Caller args plus `url` or `source` */
  args: GraphArgs;
  options: CallOptions;
  media: MediaTarget;
}

/**
 * Whether a value is an absolute http(s) URL.
 */
export function isUrl(value: unknown): value is string {
  if (typeof value !== 'string') {
    return false;
  }

  const [err, url] = safeWrap(() => new URL(value));
  if (err) {
    return false;
  }

  return url.protocol === 'http:' || url.protocol === 'https:';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof UploadableIO) &&
    !isUploadSource(value)
  );
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value);
  }

  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }

  return isJsonObject(value) && Object.values(value).every(isJsonValue);
}

function isGraphArgValue(value: unknown): value is GraphArgValue {
  return value === undefined || value instanceof UploadableIO || isJsonValue(value);
}

function toGraphArgs(value: Record<string, unknown>): SafeWrap<Error, GraphArgs> {
  const args: GraphArgs = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!isGraphArgValue(entry)) {
      return [new ArgumentError(`error unsupported value for argument ${key}`), null];
    }

    args[key] = entry;
  }

  return [null, args];
}

function isCallOptions(value: unknown): value is CallOptions {
  return isPlainObject(value);
}

/**
 * Normalizes the positional arguments of `putPicture`/`putVideo`:
 *
 *   (source, contentType?, args?, targetId?, options?)
 *   (url, args?, targetId?, options?)
 *
 * The first value is a URL when it parses as an absolute http(s) URL; anything else is
 * a byte source. For byte sources, a second value that is not an args object is read
 * as the content type. Target defaults to `me`.
 */
export function parseMediaArgs(mediaArgs: readonly unknown[], connection: MediaConnection): SafeWrap<Error, ParsedMediaArgs> {
  const method = connection === 'photos' ? 'putPicture' : 'putVideo';
  if (mediaArgs.length < 1 || mediaArgs.length > 5) {
    return [new ArgumentError(`error wrong number of arguments for ${method}`), null];
  }

  const [source] = mediaArgs;
  const fromUrl = isUrl(source);

  const offset = fromUrl || mediaArgs.length === 1 || isPlainObject(mediaArgs[1]) ? 0 : 1;
  const hint = offset === 1 ? mediaArgs[1] : undefined;
  if (hint !== undefined && hint !== null && typeof hint !== 'string') {
    return [new ArgumentError(`error content type for ${method} must be a string`), null];
  }

  const rawArgs = mediaArgs[1 + offset] ?? {};
  if (!isPlainObject(rawArgs)) {
    return [new ArgumentError(`error args for ${method} must be an object`), null];
  }

  const [errArgs, args] = toGraphArgs(rawArgs);
  if (errArgs) {
    return [errArgs, null];
  }

  const target = mediaArgs[2 + offset] ?? 'me';
  if (typeof target !== 'string' && typeof target !== 'number') {
    return [new ArgumentError(`error target id for ${method} must be a string`), null];
  }

  const options = mediaArgs[3 + offset] ?? {};
  if (!isCallOptions(options)) {
    return [new ArgumentError(`error options for ${method} must be an object`), null];
  }

  let media: MediaTarget;
  if (isUrl(source)) {
    media = { kind: 'url', url: source };
  } else if (isUploadSource(source)) {
    media = { kind: 'upload', io: new UploadableIO(source, typeof hint === 'string' ? hint : undefined) };
  } else {
    return [new ArgumentError(`error unsupported media source for ${method}`), null];
  }

  if (media.kind === 'url') {
    args.url = media.url;
  } else {
    args.source = media.io;
  }

  return [
    null,
    {
      target: String(target),
      connection,
      args,
      options: connection === 'videos' ? { ...options, video: true } : { ...options },
      media,
    },
  ];
}

import { ArgumentError } from '../error/argumentError.js';
import { UploadableIO } from '../media/uploadableIO.js';
import type { HttpParams } from '../types/request.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';
import type { GraphArgs, JsonCodec } from './types.js';

/**
 * Turns graph args into wire parameters: strings pass through, numbers and booleans are
 * stringified, objects and arrays are embedded as JSON, `null`/`undefined` are dropped
 * and uploads are kept for the multipart body.
 */
export function encodeArgs(args: Readonly<GraphArgs>, json: JsonCodec): SafeWrap<Error, HttpParams> {
  const params: HttpParams = {};

  for (const [key, value] of Object.entries(args)) {
    if (value === null || value === undefined) {
      continue;
    }

    if (typeof value === 'string' || value instanceof UploadableIO) {
      params[key] = value;
      continue;
    }

    if (typeof value === 'number' || typeof value === 'boolean') {
      params[key] = String(value);
      continue;
    }

    const [errEncode, encoded] = safeWrap(() => json.encode(value));
    if (errEncode) {
      return [new ArgumentError(`error encoding argument ${key} as json`, { cause: errEncode }), null];
    }

    params[key] = encoded;
  }

  return [null, params];
}

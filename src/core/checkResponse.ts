import { GraphAPIError } from '../error/graphAPIError.js';
import { isJsonObject, type JsonValue } from './types.js';

/**
 * Looks for a Graph API error in a decoded body. Only a mapping with an `error` key
 * counts; arrays, scalars and mappings without `error` are successes and yield `null`.
 * The value of the `error` key becomes the payload of the returned {@link GraphAPIError}.
 */
export function checkResponse(body: JsonValue, status?: number): GraphAPIError | null {
  if (!isJsonObject(body) || !('error' in body)) {
    return null;
  }

  return new GraphAPIError(body.error, { status });
}

import { TransportError } from '../error/transportError.js';
import { getValidationError, ValidationError } from '../error/validationError.js';
import type { RawResponse } from '../types/request.js';
import { validator } from '../utils/validator.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import { checkResponse } from './checkResponse.js';
import { GraphCollection } from './collection.js';
import type { GraphCall, JsonCodec, JsonValue, ResponseContext } from './types.js';

/**
 * Short human-readable form of a call, e.g. `GET me/friends`.
 */
export function describeCall(call: Pick<GraphCall<unknown>, 'verb' | 'path'>): string {
  return `${call.verb.toUpperCase()} ${call.path || '/'}`;
}

/**
 * Decodes a response body. An empty body decodes to `null`.
 */
export function decodeBody(response: RawResponse, json: JsonCodec, label: string): SafeWrap<Error, JsonValue> {
  if (!response.body.trim()) {
    return [null, null];
  }

  const [errDecode, decoded] = safeWrap(() => json.decode(response.body));
  if (errDecode) {
    return [
      new TransportError(`error decoding response body of ${label}`, { status: response.status, cause: errDecode }),
      null,
    ];
  }

  return [null, decoded];
}

/**
 * Picks the requested part of the response. Bodies are decoded and checked for API errors;
 * for `headers`/`status` the body is only looked at when the status signals a failure.
 */
function readResponse(response: RawResponse, call: GraphCall<unknown>, json: JsonCodec): SafeWrap<Error, JsonValue> {
  const label = describeCall(call);
  const component = call.options.httpComponent ?? 'body';
  const partial: JsonValue = component === 'headers' ? { ...response.headers } : response.status;

  if (component !== 'body' && response.status < 400) {
    return [null, partial];
  }

  const [errDecode, decoded] = decodeBody(response, json, label);
  if (errDecode) {
    return [errDecode, null];
  }

  const errAPI = checkResponse(decoded, response.status);
  if (errAPI) {
    return [errAPI, null];
  }

  if (response.status >= 500) {
    return [
      new TransportError(`error in ${label}, server responded with ${response.status}`, { status: response.status }),
      null,
    ];
  }

  return [null, component === 'body' ? decoded : partial];
}

/**
 * Turns the raw response of a call into its result:
 * 1. decode and classify API errors,
 * 2. validate against the call's schema (when enabled),
 * 3. wrap pageable results in a {@link GraphCollection},
 * 4. apply the call's post-processing.
 *
 * Used for direct calls as well as for each part of a batch response.
 */
export async function processResponse<R>(
  response: RawResponse,
  call: GraphCall<R>,
  context: ResponseContext,
): SafeWrapAsync<Error, R> {
  const label = describeCall(call);
  const [errRead, result] = readResponse(response, call, context.json);
  if (errRead) {
    return [errRead, null];
  }

  const { schema, validate = context.validation } = call.options;
  if (schema && validate) {
    const [errValidate] = await validator(result, schema);
    if (errValidate) {
      const issues = getValidationError(errValidate)?.issues ?? [];
      return [new ValidationError(`error validating result of ${label}`, issues, { cause: errValidate }), null];
    }
  }

  const evaluated = GraphCollection.evaluate(result, call, context);
  const [errProcess, processed] = safeWrap(() => call.postProcess(evaluated));
  if (errProcess) {
    return [new Error(`error post-processing result of ${label}`, { cause: errProcess }), null];
  }

  return [null, processed];
}

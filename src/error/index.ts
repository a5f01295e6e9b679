/**
 * Error entrypoint: the error classes a graph call can produce, plus helpers
 * for identifying and unwrapping them.
 * @module
 */

/** Error used as abort reason for signals aborted without one. */
/** Type guard for {@link AbortError}. */
export { AbortError, isAbortError } from './abortError.js';
/** Error constructing a call: argument counts, missing pages, batch misuse. */
export { ArgumentError, getArgumentError, isArgumentError } from './argumentError.js';
/** Error payload reported by the Graph API. */
export { GraphAPIError, type GraphAPIErrorOptions, getGraphAPIError, isGraphAPIError } from './graphAPIError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Local guard for writes and deletes without an access token. */
export { isMissingAccessTokenError, MissingAccessTokenError } from './missingAccessTokenError.js';
/** Abort reason for timed out transport calls. */
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
/** Network, decoding and server failures below the Graph API. */
export { getTransportError, isTransportError, TransportError, type TransportErrorOptions } from './transportError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Result rejected by a caller-supplied schema. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';

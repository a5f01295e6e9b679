import { isErrorType } from './isErrorType.js';

/**
 * Error raised locally, before any request is made, when a write or delete
 * is attempted on a client without an access token.
 */
export class MissingAccessTokenError extends Error {
  /** MissingAccessTokenError error-name */
  static name = 'MissingAccessTokenError';
}

/**
 * Type guard for {@link MissingAccessTokenError}.
 */
export function isMissingAccessTokenError(error: unknown): error is MissingAccessTokenError {
  return isErrorType(MissingAccessTokenError, error);
}

import { isErrorType } from './isErrorType.js';

/**
 * Error used as the abort reason when a signal fires without a reason of its own.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}, also matching the DOMException thrown by fetch on abort.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}

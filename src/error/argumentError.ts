import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a call that could not be constructed: wrong media argument counts,
 * missing page cursors, misuse of a batch scope or unsupported parameter values.
 */
export class ArgumentError extends Error {
  /** ArgumentError error-name */
  static name = 'ArgumentError';
}

/**
 * Type guard for {@link ArgumentError}.
 */
export function isArgumentError(error: unknown): error is ArgumentError {
  return isErrorType(ArgumentError, error);
}

/**
 * Extract an {@link ArgumentError} from an unknown error value, following nested causes.
 */
export function getArgumentError(error: unknown): ArgumentError | null {
  return unwrapErrorType(ArgumentError, error);
}

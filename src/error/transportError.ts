import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Options accepted by {@link TransportError}, on top of the regular `ErrorOptions`. */
export interface TransportErrorOptions extends ErrorOptions {
  /** HTTP status of the response, if one was received */
  status?: number;
}

/**
 * Error representing a failure below the Graph API: network errors, aborts and timeouts,
 * bodies that cannot be decoded, or server failures without an error payload.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  static name = 'TransportError';
  /** HTTP status if a response was received */
  #status: number | null;

  /** Creates a new TransportError, optionally carrying the response status */
  constructor(message: string, opts: TransportErrorOptions = {}) {
    const { status, ...errorOptions } = opts;
    super(message, errorOptions);
    this.#status = status ?? null;
  }

  /** HTTP status of the failed response, `null` when no response arrived */
  get status(): number | null {
    return this.#status;
  }
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): TransportError | null {
  return unwrapErrorType(TransportError, error);
}

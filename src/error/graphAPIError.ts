import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Options accepted by {@link GraphAPIError}, on top of the regular `ErrorOptions`. */
export interface GraphAPIErrorOptions extends ErrorOptions {
  /** HTTP status the error payload arrived with, when known. */
  status?: number;
}

function readString(payload: unknown, key: string): string | null {
  if (!payload || typeof payload !== 'object' || !(key in payload)) {
    return null;
  }

  const value: unknown = Reflect.get(payload, key);
  return typeof value === 'string' ? value : null;
}

function readNumber(payload: unknown, key: string): number | null {
  if (!payload || typeof payload !== 'object' || !(key in payload)) {
    return null;
  }

  const value: unknown = Reflect.get(payload, key);
  return typeof value === 'number' ? value : null;
}

/**
 * Error reported by the Graph API itself, i.e. a decoded body carrying an `error` key.
 * The value of that key is kept untouched as {@link GraphAPIError.payload}.
 */
export class GraphAPIError extends Error {
  /** GraphAPIError error-name */
  static name = 'GraphAPIError';
  /** Raw value of the `error` key */
  #payload: unknown;
  /** HTTP status of the response, if known */
  #status: number | null;

  /** Error type reported by the API, e.g. `OAuthException` */
  readonly type: string | null;
  /** Numeric error code reported by the API */
  readonly code: number | null;
  /** Numeric error subcode reported by the API */
  readonly subcode: number | null;
  /** Trace id the API attaches for support requests */
  readonly traceId: string | null;

  /** Creates a new GraphAPIError from the raw `error` payload of a response */
  constructor(payload: unknown, opts: GraphAPIErrorOptions = {}) {
    const { status, ...errorOptions } = opts;
    const type = readString(payload, 'type');
    const message = typeof payload === 'string' ? payload : readString(payload, 'message');

    super(
      type && message ? `${type}: ${message}` : (message ?? type ?? 'error reported by graph api'),
      errorOptions,
    );

    this.#payload = payload;
    this.#status = status ?? null;
    this.type = type;
    this.code = readNumber(payload, 'code');
    this.subcode = readNumber(payload, 'error_subcode');
    this.traceId = readString(payload, 'fbtrace_id');
  }

  /** Raw `error` payload of the response */
  get payload(): unknown {
    return this.#payload;
  }

  /** HTTP status of the response, `null` for errors built outside a response */
  get status(): number | null {
    return this.#status;
  }
}

/**
 * Type guard for {@link GraphAPIError}.
 */
export function isGraphAPIError(error: unknown): error is GraphAPIError {
  return isErrorType(GraphAPIError, error);
}

/**
 * Extract a {@link GraphAPIError} from an unknown error value, following nested causes.
 */
export function getGraphAPIError(error: unknown): GraphAPIError | null {
  return unwrapErrorType(GraphAPIError, error);
}

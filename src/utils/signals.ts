import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** A signal tied to sources (timers, other signals) that can be let go of once the request is done. */
export interface LinkedSignal {
  signal: AbortSignal;
  /** Detaches from the sources without aborting */
  release: () => void;
}

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError}
 * after `timeoutMs`. Returns `null` when the timeout is disabled (`false` or `0`).
 * `release` clears the timer.
 */
export function createTimeoutSignal(timeoutMs?: number | false): LinkedSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();

  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );

  timeout.unref?.();
  const release = () => clearTimeout(timeout);
  controller.signal.addEventListener('abort', release, { once: true });

  return { signal: controller.signal, release };
}

/**
 * Merges several optional signals into one that aborts as soon as any source does,
 * carrying over the source's reason (or an {@link AbortError} when it has none).
 * Returns `null` for no signals and the signal itself for exactly one.
 * `release` removes the listeners added to the sources.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): LinkedSignal | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return { signal: active[0], release: () => {} };
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const abortFrom = (source: AbortSignal) => {
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };
  const release = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };

  controller.signal.addEventListener('abort', release, { once: true });

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, release };
}

/**
 * Minimal logging contract used by the client. `console` satisfies it.
 */
export interface Logger {
  debug: (message: string, ...meta: unknown[]) => void;
  warn: (message: string, ...meta: unknown[]) => void;
}

/** Logger that drops everything; used unless `debug` is configured. */
export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
};

/**
 * Resolves the `debug` client option into a {@link Logger}:
 * `true` logs to the console, a logger object is used as is, anything else is silent.
 */
export function resolveLogger(debug?: boolean | Logger): Logger {
  if (debug === true) {
    return console;
  }

  if (debug && typeof debug === 'object') {
    return debug;
  }

  return silentLogger;
}

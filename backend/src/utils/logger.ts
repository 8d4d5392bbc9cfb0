export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

/**
 * Console logger with a `[scope]` prefix. Debug lines are dropped unless `debug` is set.
 */
export function createLogger(scope: string, debug = false): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (debug) console.debug(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => console.info(`${prefix} ${message}`, ...details),
    warn: (message, ...details) => console.warn(`${prefix} ${message}`, ...details),
    error: (message, ...details) => console.error(`${prefix} ${message}`, ...details),
    child: (childScope) => createLogger(`${scope}:${childScope}`, debug),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};

/**
 * Sink for cache, guard and transaction diagnostics.
 * `warn` and `error` are required; `info` and `debug` are optional, so
 * callers use `logger.debug?.(...)` for per-query chatter.
 */
export interface Logger {
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  info?(message: string, ...args: unknown[]): void;
  debug?(message: string, ...args: unknown[]): void;
}

// Default for every txcache component that takes a `logger` option
export const consoleLogger: Logger = {
  warn: (message: string, ...args: unknown[]) => console.warn(message, ...args),
  error: (message: string, ...args: unknown[]) => console.error(message, ...args),
  info: (message: string, ...args: unknown[]) => console.info(message, ...args),
  debug: (message: string, ...args: unknown[]) => console.debug(message, ...args),
};

/**
 * Discards everything; used by tests and by callers that only want insights events
 */
export const silentLogger: Logger = {
  warn: () => {},
  error: () => {},
  info: () => {},
  debug: () => {},
};

/**
 * Minimal logging surface used by the engine and the file store.
 *
 * Pass your own implementation (pino, winston, a test spy) to route
 * messages elsewhere.
 *
 * @category Logging
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const PREFIX = "[barshift]";

/** Writes through `console`, prefixing every message. */
export const consoleLogger: Logger = {
  debug: (message, context) => console.debug(`${PREFIX} ${message}`, context ?? ""),
  info: (message, context) => console.info(`${PREFIX} ${message}`, context ?? ""),
  warn: (message, context) => console.warn(`${PREFIX} ${message}`, context ?? ""),
  error: (message, context) => console.error(`${PREFIX} ${message}`, context ?? ""),
};

/** Discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

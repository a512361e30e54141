/**
 * Logging
 *
 * The SDK reports failures through a Logger instead of throwing. Pass your own
 * implementation in the client config to route them elsewhere.
 */

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const PREFIX = '[kaleidoscope]';

function write(sink: (...args: unknown[]) => void, message: string, context?: LogContext): void {
  if (context && Object.keys(context).length > 0) {
    sink(`${PREFIX} ${message}`, context);
  } else {
    sink(`${PREFIX} ${message}`);
  }
}

/**
 * Default logger, writes to the console
 */
export const consoleLogger: Logger = {
  debug: (message, context) => write(console.debug, message, context),
  info: (message, context) => write(console.info, message, context),
  warn: (message, context) => write(console.warn, message, context),
  error: (message, context) => write(console.error, message, context),
};

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

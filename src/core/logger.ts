/**
 * Logger Interface
 * Structured logging abstraction; the library never writes to the console unless asked to
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const levelOrder: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Discards everything. Default for every component.
 */
/* eslint-disable @typescript-eslint/no-empty-function */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
/* eslint-enable @typescript-eslint/no-empty-function */

/**
 * Console logger that drops entries below `minLevel`
 */
export function createConsoleLogger(minLevel: LogLevel = 'debug'): Logger {
  const write = (level: LogLevel, message: string, context?: LogContext): void => {
    if (levelOrder[level] < levelOrder[minLevel]) return;
    const line = `[${level.toUpperCase()}] ${message}`;
    const sink = level === 'debug' ? console.debug : level === 'info' ? console.info : level === 'warn' ? console.warn : console.error;
    if (context) {
      sink(line, context);
    } else {
      sink(line);
    }
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  };
}

export const consoleLogger: Logger = createConsoleLogger();

/**
 * Prefix every message with a component tag, e.g. `[nonce] synced`
 */
export function createPrefixedLogger(logger: Logger, prefix: string): Logger {
  return {
    debug(message: string, context?: LogContext): void {
      logger.debug(`[${prefix}] ${message}`, context);
    },
    info(message: string, context?: LogContext): void {
      logger.info(`[${prefix}] ${message}`, context);
    },
    warn(message: string, context?: LogContext): void {
      logger.warn(`[${prefix}] ${message}`, context);
    },
    error(message: string, context?: LogContext): void {
      logger.error(`[${prefix}] ${message}`, context);
    },
  };
}

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/**
 * Destination for formatted log lines. Defaults to the console.
 */
export interface LogSink {
  write(level: LogLevel, line: string): void;
}

/**
 * Logger options
 */
export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  context?: Record<string, unknown>;
  sink?: LogSink;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const consoleSink: LogSink = {
  write(level: LogLevel, line: string) {
    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  },
};

/**
 * Check whether a string names a log level
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Create a console logger.
 *
 * Lines look like `[2024-01-15T09:30:00.000Z] [INFO] [invoice-bridge] message {"fileName":"a.xml"}`.
 * Context passed to `child()` is merged into every line the child writes.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? 'info'];
  const prefix = options.prefix ?? 'invoice-bridge';
  const baseContext = options.context ?? {};
  const sink = options.sink ?? consoleSink;

  const shouldLog = (level: LogLevel): boolean => LOG_LEVELS[level] >= minLevel;

  const formatMessage = (level: LogLevel, message: string, context?: Record<string, unknown>): string => {
    const timestamp = new Date().toISOString();
    const mergedContext = { ...baseContext, ...context };
    const contextStr = Object.keys(mergedContext).length > 0
      ? ` ${JSON.stringify(mergedContext)}`
      : '';

    return `[${timestamp}] [${level.toUpperCase()}] [${prefix}] ${message}${contextStr}`;
  };

  const log = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (shouldLog(level)) {
      sink.write(level, formatMessage(level, message, context));
    }
  };

  const logger: Logger = {
    debug(message: string, context?: Record<string, unknown>) {
      log('debug', message, context);
    },

    info(message: string, context?: Record<string, unknown>) {
      log('info', message, context);
    },

    warn(message: string, context?: Record<string, unknown>) {
      log('warn', message, context);
    },

    error(message: string, context?: Record<string, unknown>) {
      log('error', message, context);
    },

    child(context: Record<string, unknown>): Logger {
      const childOptions: LoggerOptions = {
        prefix,
        sink,
        context: { ...baseContext, ...context },
      };
      if (options.level !== undefined) {
        childOptions.level = options.level;
      }
      return createLogger(childOptions);
    },
  };

  return logger;
}

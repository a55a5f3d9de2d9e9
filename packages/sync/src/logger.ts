/**
 * Log levels for structured logging
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface that consumers can implement
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: Error, data?: Record<string, unknown>): void;
}

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Context name (e.g., 'SyncController', 'SyncScheduler') */
  context?: string;
  /** Custom log handler */
  handler?: (entry: LogEntry) => void;
  /** Enable logging (default: false in production) */
  enabled?: boolean;
}

/**
 * Logging setting accepted by the sync components: options for the built-in
 * logger, a custom logger, or `false` to disable logging.
 */
export type LoggerSetting = LoggerOptions | Logger | false;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function defaultLogHandler(entry: LogEntry): void {
  const prefix = entry.context ? `[${entry.context}]` : '';
  const timestamp = new Date(entry.timestamp).toISOString();
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';

  switch (entry.level) {
    case 'debug':
      console.debug(`${timestamp} DEBUG${prefix} ${entry.message}${dataStr}`);
      break;
    case 'info':
      console.info(`${timestamp} INFO${prefix} ${entry.message}${dataStr}`);
      break;
    case 'warn':
      console.warn(`${timestamp} WARN${prefix} ${entry.message}${dataStr}`);
      break;
    case 'error':
      console.error(`${timestamp} ERROR${prefix} ${entry.message}${dataStr}`, entry.error ?? '');
      break;
  }
}

/**
 * Create a structured logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = 'info',
    context,
    handler = defaultLogHandler,
    enabled = process.env.NODE_ENV !== 'production',
  } = options;

  const minPriority = LOG_LEVEL_PRIORITY[level];

  function log(
    logLevel: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!enabled || LOG_LEVEL_PRIORITY[logLevel] < minPriority) return;

    handler({
      level: logLevel,
      message,
      timestamp: Date.now(),
      context,
      data,
      error,
    });
  }

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, error, data) => log('error', message, data, error),
  };
}

/**
 * No-op logger that doesn't output anything
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

function isLogger(setting: LoggerOptions | Logger): setting is Logger {
  return 'debug' in setting && typeof setting.debug === 'function';
}

/**
 * Turn a logging setting into a logger for the given component
 */
export function resolveLogger(setting: LoggerSetting | undefined, context: string): Logger {
  if (setting === false) return noopLogger;
  if (setting && isLogger(setting)) return setting;
  return createLogger({ context, ...setting });
}

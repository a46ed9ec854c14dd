import { HomeSyncError } from '@homesync/core';

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
  /** Context name (e.g., 'PushChannel', 'PollFetcher') */
  context?: string;
  /** Custom log handler */
  handler?: (entry: LogEntry) => void;
  /** Enable logging (default: false in production) */
  enabled?: boolean;
}

/**
 * What components accept for their `logger` option: options for a new
 * logger, a ready logger, or `false` for silence.
 */
export type LoggerSetting = LoggerOptions | Logger | false;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const CONSOLE_METHOD: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

/**
 * One console line per entry. Sync errors print their code, context and
 * suggestion instead of a bare stack.
 */
function defaultLogHandler(entry: LogEntry): void {
  const prefix = entry.context ? `[${entry.context}]` : '';
  const timestamp = new Date(entry.timestamp).toISOString();
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  const line = `${timestamp} ${entry.level.toUpperCase()}${prefix} ${entry.message}${dataStr}`;

  if (entry.error instanceof HomeSyncError) {
    CONSOLE_METHOD[entry.level](`${line}\n${entry.error.format()}`);
  } else if (entry.error) {
    CONSOLE_METHOD[entry.level](line, entry.error);
  } else {
    CONSOLE_METHOD[entry.level](line);
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

  function shouldLog(logLevel: LogLevel): boolean {
    if (!enabled) return false;
    return LOG_LEVEL_PRIORITY[logLevel] >= minPriority;
  }

  function log(
    logLevel: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!shouldLog(logLevel)) return;

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
    debug(message: string, data?: Record<string, unknown>): void {
      log('debug', message, data);
    },
    info(message: string, data?: Record<string, unknown>): void {
      log('info', message, data);
    },
    warn(message: string, data?: Record<string, unknown>): void {
      log('warn', message, data);
    },
    error(message: string, error?: Error, data?: Record<string, unknown>): void {
      log('error', message, data, error);
    },
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

export function isLogger(setting: LoggerOptions | Logger): setting is Logger {
  return (
    'debug' in setting &&
    typeof setting.debug === 'function' &&
    'error' in setting &&
    typeof setting.error === 'function'
  );
}

/**
 * Turn a component's `logger` option into a logger. Options get the
 * component's context name unless they set their own.
 */
export function resolveLogger(setting: LoggerSetting | undefined, context: string): Logger {
  if (setting === false) return noopLogger;
  if (setting && isLogger(setting)) return setting;
  return createLogger({ context, ...setting });
}

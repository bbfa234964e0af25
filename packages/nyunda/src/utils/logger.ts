/**
 * Minimal leveled logger.
 *
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext, error?: Error): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const PREFIX = '[nyunda]';

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(level: LogLevel = 'info'): Logger {
  const enabled = (target: LogLevel) => PRIORITY[target] >= PRIORITY[level];

  const format = (message: string, context?: LogContext) =>
    context && Object.keys(context).length > 0
      ? `${PREFIX} ${message} ${JSON.stringify(context)}`
      : `${PREFIX} ${message}`;

  return {
    debug(message, context) {
      if (enabled('debug')) console.debug(format(message, context));
    },
    info(message, context) {
      if (enabled('info')) console.info(format(message, context));
    },
    warn(message, context) {
      if (enabled('warn')) console.warn(format(message, context));
    },
    error(message, context, error) {
      if (!enabled('error')) return;
      console.error(format(message, context));
      if (error) console.error(error);
    },
  };
}

export const silentLogger: Logger = createLogger('silent');

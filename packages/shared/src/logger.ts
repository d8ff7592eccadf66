/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include correlation IDs from AsyncLocalStorage context.
 * The level threshold starts at `info`; entry points set it once from
 * Config.logLevel with setLogLevel().
 */

import { getCorrelationId, getContext } from './context';
import { isError } from './errors';

export interface LogContext {
  [key: string]: unknown;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const reqContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    sourceId: reqContext?.sourceId,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (enabled('info')) console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (enabled('warn')) console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    if (!enabled('error')) return;
    const errorContext = {
      ...context,
      error:
        isError(error)
          ? {
              message: error.message,
              stack: error.stack,
              name: error.name,
            }
          : String(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (enabled('debug')) console.debug(formatLog('DEBUG', message, context));
  },
};

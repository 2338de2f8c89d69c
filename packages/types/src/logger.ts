/**
 * Structured JSON logging over console.
 */
import { getConfig, type LogLevel } from './config.js';

export interface LogContext {
  [key: string]: unknown;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return SEVERITY[level] >= SEVERITY[getConfig().logLevel];
}

function formatLog(level: string, message: string, context?: LogContext): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...context,
  });
}

export const logger = {
  debug: (message: string, context?: LogContext): void => {
    if (enabled('debug')) console.debug(formatLog('DEBUG', message, context));
  },

  info: (message: string, context?: LogContext): void => {
    if (enabled('info')) console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext): void => {
    if (enabled('warn')) console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: unknown, context?: LogContext): void => {
    if (!enabled('error')) return;
    const errorContext = {
      ...context,
      error:
        error instanceof Error
          ? { message: error.message, stack: error.stack, name: error.name }
          : String(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },
};

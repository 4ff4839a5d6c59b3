import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';
import { getLoggingConfig, getRedactPaths } from '../config/logging.js';

/**
 * AsyncLocalStorage for run context (batch ID, dataset ID, etc.)
 */
export const runContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current run context
 */
export function getRunContext(): Record<string, unknown> {
  return runContext.getStore() || {};
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const config = getLoggingConfig();
  const options: LoggerOptions = {
    level: config.level,
    base: {
      env: process.env.NODE_ENV || 'development',
      service: 'catalog-enricher',
    },
    redact: { paths: getRedactPaths(config), censor: '[REDACTED]' },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(config.enablePrettyPrint && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  };

  return pino(options);
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  const context = { ...getRunContext(), ...additionalContext };
  return logger.child(context);
}

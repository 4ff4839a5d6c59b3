/**
 * Logging Configuration
 *
 * Centralized configuration for structured logging with Pino.
 * Supports different log levels and formats for development, test and production.
 */

export interface LoggingConfig {
  level: string;
  enablePrettyPrint: boolean;
  redactSensitiveFields: string[];
}

/**
 * Get logging configuration from environment variables
 */
export function getLoggingConfig(): LoggingConfig {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isDevelopment = nodeEnv === 'development';
  // Keep vitest output clean unless a level is asked for explicitly
  const defaultLevel = nodeEnv === 'test' ? 'silent' : isDevelopment ? 'debug' : 'info';

  return {
    level: process.env.LOG_LEVEL || defaultLevel,
    enablePrettyPrint: isDevelopment && process.env.LOG_PRETTY !== 'false',
    redactSensitiveFields: ['apiKey', 'token', 'authorization', 'password', 'secret'],
  };
}

/**
 * Pino redact paths for the configured sensitive fields, at the top level and one level deep
 */
export function getRedactPaths(config: LoggingConfig): string[] {
  return config.redactSensitiveFields.flatMap((field) => [field, `*.${field}`]);
}

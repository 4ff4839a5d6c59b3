/**
 * Provider error normalization
 *
 * Both SDKs throw API errors carrying an HTTP `status` and response `headers`.
 * They are mapped onto the service error types so retry and circuit-breaker
 * decisions do not depend on which provider is configured.
 */

import {
  ServiceAuthenticationError,
  ServiceConfigurationError,
  ServiceConnectionError,
  ServiceRateLimitError,
} from '../../utils/serviceErrors.js';
import { OperationTimeoutError } from '../../utils/withTimeout.js';
import { isRetryableError } from '../../utils/retry.js';

function readStatus(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function readHeader(error: unknown, name: string): string | undefined {
  if (!error || typeof error !== 'object' || !('headers' in error)) {
    return undefined;
  }
  const headers = error.headers;
  if (!headers || typeof headers !== 'object') {
    return undefined;
  }
  if ('get' in headers && typeof headers.get === 'function') {
    const value: unknown = headers.get(name);
    return typeof value === 'string' ? value : undefined;
  }
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name && typeof value === 'string') {
      return value;
    }
  }
  return undefined;
}

function parseRetryAfterSeconds(error: unknown): number | undefined {
  const header = readHeader(error, 'retry-after');
  if (!header) {
    return undefined;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds > 0) {
    return seconds;
  }
  // HTTP-date form
  const date = Date.parse(header);
  if (!isNaN(date)) {
    const delta = Math.ceil((date - Date.now()) / 1000);
    return delta > 0 ? delta : undefined;
  }
  return undefined;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Convert an SDK error into a service error
 */
export function toServiceError(serviceName: string, error: unknown): Error {
  if (
    error instanceof ServiceRateLimitError ||
    error instanceof ServiceAuthenticationError ||
    error instanceof ServiceConnectionError ||
    error instanceof ServiceConfigurationError ||
    error instanceof OperationTimeoutError
  ) {
    return error;
  }

  const status = readStatus(error);
  if (status === 429) {
    return new ServiceRateLimitError(serviceName, parseRetryAfterSeconds(error));
  }
  if (status === 401 || status === 403) {
    return new ServiceAuthenticationError(serviceName, status, messageOf(error));
  }
  return new ServiceConnectionError(serviceName, status, messageOf(error));
}

/**
 * Network failures, timeouts, rate limits and 5xx responses
 */
export function isTransientProviderError(error: unknown): boolean {
  if (error instanceof ServiceRateLimitError || error instanceof OperationTimeoutError) {
    return true;
  }
  if (error instanceof ServiceConnectionError) {
    const status = error.statusCode;
    return status === undefined || status === 408 || status >= 500;
  }
  return isRetryableError(error);
}

/**
 * Authentication failures, missing configuration and rejected (4xx) requests.
 * Retrying cannot fix these.
 */
export function isFatalProviderError(error: unknown): boolean {
  if (error instanceof ServiceAuthenticationError || error instanceof ServiceConfigurationError) {
    return true;
  }
  if (error instanceof ServiceConnectionError) {
    const status = error.statusCode;
    return status !== undefined && status >= 400 && status < 500 && status !== 408 && status !== 429;
  }
  return false;
}

/**
 * Retry Utility with Exponential Backoff
 *
 * Provides a centralized retry mechanism with exponential backoff and full jitter
 * for transient failures. Honours provider Retry-After hints and a cancellation signal.
 */

import { logger } from './logger.js';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Total number of attempts, including the first one (default: 3) */
  maxAttempts?: number;
  /** Base delay in milliseconds (default: 1000) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier?: number;
  /** 'full' draws the delay uniformly from [0, backoff]; 'none' uses the backoff as is (default: 'full') */
  jitter?: 'full' | 'none';
  /** Function to determine if an error is retryable (default: retries on transient errors) */
  isRetryable?: (error: unknown) => boolean;
  /** Custom delay function (overrides backoff and Retry-After if provided) */
  getDelay?: (attempt: number, error: unknown) => number;
  /** Stops retrying when aborted; checked before each attempt and while waiting */
  signal?: AbortSignal;
  /** Waits between attempts; injectable for tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Source of randomness for jitter; injectable for tests */
  random?: () => number;
}

/**
 * Default retry configuration
 */
const DEFAULT_RETRY_CONFIG = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
} as const;

/**
 * Raised when the cancellation signal fires before or between attempts
 */
export class RetryAbortedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError?: unknown
  ) {
    super(`Operation aborted after ${attempts} attempt(s)`);
    this.name = 'RetryAbortedError';
  }
}

function readProperty(value: unknown, key: string): unknown {
  return value !== null && typeof value === 'object' ? Reflect.get(value, key) : undefined;
}

function classifyStatus(status: unknown): boolean | null {
  if (typeof status !== 'number' || status === 0) {
    return null;
  }
  // Retry on rate limit (429) and server errors (5xx)
  if (status === 429 || (status >= 500 && status < 600)) {
    return true;
  }
  // Don't retry on 4xx client errors (except 429)
  if (status >= 400 && status < 500) {
    return false;
  }
  return null;
}

/**
 * Default retryable error detection
 * Retries on transient errors: 429, 500, 502, 503, 504, ECONNRESET, ETIMEDOUT
 */
function defaultIsRetryable(error: unknown): boolean {
  // Check for HTTP status codes
  const responseVerdict = classifyStatus(readProperty(readProperty(error, 'response'), 'status'));
  if (responseVerdict !== null) {
    return responseVerdict;
  }

  // Check for ServiceConnectionError / AppError (has statusCode)
  const statusVerdict = classifyStatus(readProperty(error, 'statusCode'));
  if (statusVerdict !== null) {
    return statusVerdict;
  }

  // Check for ServiceRateLimitError (by name)
  if (readProperty(error, 'name') === 'ServiceRateLimitError') {
    return true;
  }

  // Check for network error codes
  const code = readProperty(error, 'code');
  if (code === 'ECONNRESET' || code === 'ETIMEDOUT' || code === 'ECONNREFUSED' || code === 'ECONNABORTED') {
    return true;
  }

  // Check for error messages
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (
      message.includes('timeout') ||
      message.includes('timed out') ||
      message.includes('network') ||
      message.includes('econnreset') ||
      message.includes('etimedout')
    ) {
      return true;
    }
  }

  // Check for axios errors without response (network errors)
  if (readProperty(error, 'isAxiosError') === true && !readProperty(error, 'response')) {
    return true;
  }

  return false;
}

/**
 * Calculate exponential backoff delay
 *
 * @param attempt - Number of failed attempts so far, minus one (0-indexed)
 * @returns Upper bound of the delay in milliseconds
 */
export function calculateExponentialBackoff(
  attempt: number,
  initialDelay: number,
  multiplier: number,
  maxDelay: number
): number {
  const delay = initialDelay * Math.pow(multiplier, attempt);
  return Math.min(delay, maxDelay);
}

/**
 * Extract a Retry-After hint from an error, in milliseconds, or null if not present
 */
export function getRetryAfterDelay(error: unknown): number | null {
  const headers = readProperty(readProperty(error, 'response'), 'headers');
  const retryAfter = readProperty(headers, 'retry-after') ?? readProperty(headers, 'Retry-After');
  const value = Array.isArray(retryAfter) ? retryAfter[0] : retryAfter;
  if (typeof value === 'string' || typeof value === 'number') {
    const seconds = parseInt(String(value), 10);
    if (!isNaN(seconds) && seconds > 0) {
      return seconds * 1000;
    }
  }

  // Check for ServiceRateLimitError retryAfterSeconds
  const retryAfterSeconds = readProperty(error, 'retryAfterSeconds');
  if (typeof retryAfterSeconds === 'number' && retryAfterSeconds > 0) {
    return retryAfterSeconds * 1000;
  }

  return null;
}

/**
 * Wait for `ms`, rejecting early with the signal's reason if it aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Retry an operation with exponential backoff
 *
 * @param operation - The operation to retry; receives the 1-based attempt number
 * @param config - Retry configuration
 * @param context - Optional context for logging (e.g., operation name, dataset)
 * @returns Result of the operation
 * @throws The last error if it is not retryable or all attempts are exhausted,
 *   RetryAbortedError if the signal fires first
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  config: RetryConfig = {},
  context?: string
): Promise<T> {
  const {
    maxAttempts = DEFAULT_RETRY_CONFIG.maxAttempts,
    initialDelay = DEFAULT_RETRY_CONFIG.initialDelay,
    maxDelay = DEFAULT_RETRY_CONFIG.maxDelay,
    multiplier = DEFAULT_RETRY_CONFIG.multiplier,
    jitter = 'full',
    isRetryable = defaultIsRetryable,
    getDelay,
    signal,
    sleep: wait = sleep,
    random = Math.random,
  } = config;

  const contextStr = context ? ` (${context})` : '';
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw new RetryAbortedError(attempt - 1, lastError);
    }

    try {
      const result = await operation(attempt);

      if (attempt > 1) {
        logger.info(
          { attempt, maxAttempts, context },
          `Operation succeeded after ${attempt - 1} retry attempts${contextStr}`
        );
      }

      return result;
    } catch (error) {
      lastError = error;

      if (signal?.aborted) {
        throw new RetryAbortedError(attempt, error);
      }

      if (!isRetryable(error)) {
        logger.debug(
          { attempt, maxAttempts, error: error instanceof Error ? error.message : String(error), context },
          `Non-retryable error encountered${contextStr}`
        );
        throw error;
      }

      if (attempt >= maxAttempts) {
        logger.error(
          { attempt, maxAttempts, error: error instanceof Error ? error.message : String(error), context },
          `Operation failed after ${maxAttempts} attempts${contextStr}`
        );
        throw error;
      }

      let delay: number;
      if (getDelay) {
        delay = getDelay(attempt - 1, error);
      } else {
        const retryAfterDelay = getRetryAfterDelay(error);
        if (retryAfterDelay !== null) {
          delay = Math.min(retryAfterDelay, maxDelay);
          logger.warn(
            { attempt, maxAttempts, delay, retryAfter: retryAfterDelay, context },
            `Rate limit detected, using Retry-After delay${contextStr}`
          );
        } else {
          const ceiling = calculateExponentialBackoff(attempt - 1, initialDelay, multiplier, maxDelay);
          delay = jitter === 'full' ? Math.floor(random() * ceiling) : ceiling;
        }
      }

      logger.warn(
        { attempt, maxAttempts, delay, error: error instanceof Error ? error.message : String(error), context },
        `Retrying operation${contextStr} (attempt ${attempt + 1}/${maxAttempts})`
      );

      try {
        await wait(delay, signal);
      } catch {
        throw new RetryAbortedError(attempt, error);
      }
    }
  }

  // Unreachable while maxAttempts >= 1
  throw lastError ?? new Error(`Operation failed after retries${contextStr}`);
}

/**
 * Check if an error is retryable using default logic
 */
export function isRetryableError(error: unknown): boolean {
  return defaultIsRetryable(error);
}

import { describe, it, expect, vi } from 'vitest';
import { isFatalProviderError, isTransientProviderError, toServiceError } from '../providerErrors.js';
import {
  ServiceAuthenticationError,
  ServiceConfigurationError,
  ServiceConnectionError,
  ServiceRateLimitError,
} from '../../../utils/serviceErrors.js';
import { OperationTimeoutError } from '../../../utils/withTimeout.js';

function apiError(message: string, status: number, headers?: unknown): Error {
  return Object.assign(new Error(message), { status, headers });
}

describe('toServiceError', () => {
  it('maps 429 to a rate limit error with the Retry-After hint', () => {
    const error = toServiceError('openai', apiError('slow down', 429, new Headers({ 'retry-after': '7' })));

    expect(error).toBeInstanceOf(ServiceRateLimitError);
    expect(error.message).toBe('openai rate limit exceeded. Retry after 7s');
  });

  it('reads Retry-After from a plain header record', () => {
    const error = toServiceError('anthropic', apiError('slow down', 429, { 'Retry-After': '3' }));
    expect(error).toMatchObject({ retryAfterSeconds: 3 });
  });

  it('accepts Retry-After as an HTTP date', () => {
    vi.spyOn(Date, 'now').mockReturnValue(Date.parse('2026-01-01T00:00:00.000Z'));

    const error = toServiceError(
      'openai',
      apiError('slow down', 429, new Headers({ 'retry-after': 'Thu, 01 Jan 2026 00:00:30 GMT' }))
    );

    expect(error).toMatchObject({ retryAfterSeconds: 30 });
  });

  it('maps 401 and 403 to authentication errors', () => {
    const error = toServiceError('openai', apiError('bad key', 401));

    expect(error).toBeInstanceOf(ServiceAuthenticationError);
    expect(error.message).toBe('openai authentication failed (HTTP 401): bad key');
    expect(toServiceError('openai', apiError('forbidden', 403))).toBeInstanceOf(ServiceAuthenticationError);
  });

  it('maps other failures to connection errors', () => {
    expect(toServiceError('openai', apiError('boom', 500)).message).toBe('openai connection failed (HTTP 500): boom');

    const network = toServiceError('openai', new Error('socket hang up'));
    expect(network).toBeInstanceOf(ServiceConnectionError);
    expect(network).toMatchObject({ statusCode: undefined, message: 'openai connection failed: socket hang up' });
  });

  it('passes service errors through unchanged', () => {
    const timeout = new OperationTimeoutError('completion', 100);
    expect(toServiceError('openai', timeout)).toBe(timeout);
  });
});

describe('isTransientProviderError', () => {
  it.each([
    ['rate limit', new ServiceRateLimitError('openai')],
    ['timeout', new OperationTimeoutError('completion', 100)],
    ['503', new ServiceConnectionError('openai', 503, 'unavailable')],
    ['408', new ServiceConnectionError('openai', 408, 'request timeout')],
    ['network', new ServiceConnectionError('openai', undefined, 'socket hang up')],
  ])('treats %s as transient', (_label, error) => {
    expect(isTransientProviderError(error)).toBe(true);
  });

  it.each([
    ['400', new ServiceConnectionError('openai', 400, 'bad request')],
    ['auth', new ServiceAuthenticationError('openai', 401, 'bad key')],
    ['unclassified', new Error('unexpected payload')],
  ])('does not treat %s as transient', (_label, error) => {
    expect(isTransientProviderError(error)).toBe(false);
  });
});

describe('isFatalProviderError', () => {
  it('flags bad credentials and rejected requests', () => {
    expect(isFatalProviderError(new ServiceAuthenticationError('openai', 403, 'forbidden'))).toBe(true);
    expect(isFatalProviderError(new ServiceConfigurationError('openai', ['OPENAI_API_KEY']))).toBe(true);
    expect(isFatalProviderError(new ServiceConnectionError('openai', 400, 'bad request'))).toBe(true);
  });

  it('leaves retryable and unclassified errors alone', () => {
    expect(isFatalProviderError(new ServiceConnectionError('openai', 408, 'request timeout'))).toBe(false);
    expect(isFatalProviderError(new ServiceConnectionError('openai', 502, 'bad gateway'))).toBe(false);
    expect(isFatalProviderError(new ServiceConnectionError('openai', undefined, 'reset'))).toBe(false);
    expect(isFatalProviderError(new ServiceRateLimitError('openai', 5))).toBe(false);
    expect(isFatalProviderError(new Error('unexpected payload'))).toBe(false);
  });
});

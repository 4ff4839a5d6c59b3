/**
 * Centralized HTTP Client Configuration
 *
 * Provides shared HTTP/HTTPS agents with connection pooling and a factory
 * function for creating configured axios instances. Retries and circuit
 * breaking are layered on by callers, not by the client.
 */

import axios from 'axios';
import type { AxiosInstance, CreateAxiosDefaults } from 'axios';
import https from 'https';
import http from 'http';
import { logger } from '../utils/logger.js';

// Default per-request timeout for catalog operations
export const HTTP_TIMEOUTS = {
  STANDARD: 30000,
} as const;

// Shared across all HTTP clients to maximize connection reuse
const httpAgent = new http.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000, // Keep connections alive for 30 seconds
  maxSockets: 50,        // Maximum number of sockets per host
  maxFreeSockets: 10,    // Maximum number of free sockets per host
  timeout: 60000,        // Socket timeout in milliseconds
});

const httpsAgent = new https.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 50,
  maxFreeSockets: 10,
  timeout: 60000,
});

// Request start times, keyed by the config object axios hands back on the response
const requestStartTimes = new WeakMap<object, number>();

/**
 * Create a configured axios instance with connection pooling and default settings
 *
 * @param config - Optional axios configuration to merge with defaults
 */
export function createHttpClient(config?: CreateAxiosDefaults): AxiosInstance {
  const client = axios.create({
    timeout: HTTP_TIMEOUTS.STANDARD,
    httpAgent,
    httpsAgent,
    ...config,
  });

  // Enforce a timeout on every request, even when a caller passes timeout: 0
  client.interceptors.request.use((requestConfig) => {
    if (!requestConfig.timeout) {
      requestConfig.timeout = HTTP_TIMEOUTS.STANDARD;
      logger.debug(
        { url: requestConfig.url, method: requestConfig.method },
        'HTTP request without explicit timeout, using default STANDARD timeout (30s)'
      );
    }
    requestStartTimes.set(requestConfig, Date.now());
    return requestConfig;
  });

  client.interceptors.response.use(
    (response) => {
      const startTime = requestStartTimes.get(response.config);
      if (startTime !== undefined) {
        logger.debug(
          { url: response.config.url, status: response.status, durationMs: Date.now() - startTime },
          'HTTP request completed'
        );
      }
      return response;
    },
    (error: unknown) => {
      if (axios.isAxiosError(error)) {
        logger.debug(
          { url: error.config?.url, status: error.response?.status, code: error.code },
          'HTTP request failed'
        );
      }
      return Promise.reject(error);
    }
  );

  return client;
}

import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { logger, runContext } from '../utils/logger.js';

/**
 * Middleware to generate and attach request ID to each request
 * Also sets up async context for logging
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  // Generate or use existing request ID
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header ? header : randomUUID();

  // Set request ID in response header
  res.setHeader('X-Request-ID', requestId);

  // Run request in async context
  runContext.run({ requestId }, () => {
    logger.info({
      requestId,
      method: req.method,
      path: req.path,
    }, 'Incoming request');

    next();
  });
}

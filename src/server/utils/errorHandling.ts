/**
 * Error handling utilities for route handlers
 */

import { Request, Response, NextFunction } from 'express';
import { NotFoundError } from '../types/errors.js';

/**
 * Wraps an async route handler to automatically catch errors and pass them to Express error middleware
 *
 * Usage:
 * ```typescript
 * router.get('/:id', asyncHandler(async (req, res) => {
 *   const data = await service.getData(req.params.id);
 *   res.json(data);
 * }));
 * ```
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Helper to throw NotFoundError if resource is null/undefined
 *
 * Usage:
 * ```typescript
 * const suggestion = await store.get(id);
 * throwIfNotFound(suggestion, 'Suggestion', id);
 * res.json(suggestion);
 * ```
 */
export function throwIfNotFound<T>(
  resource: T | null | undefined,
  resourceName: string,
  identifier?: string
): asserts resource is T {
  if (!resource) {
    throw new NotFoundError(resourceName, identifier);
  }
}

/**
 * Serializable view of an error for result payloads and CLI output
 */
export interface ErrorInfo {
  code: string;
  message: string;
}

export function toErrorInfo(error: unknown): ErrorInfo {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return { code: error.code, message: error.message };
  }
  return {
    code: 'INTERNAL_SERVER_ERROR',
    message: error instanceof Error ? error.message : String(error),
  };
}

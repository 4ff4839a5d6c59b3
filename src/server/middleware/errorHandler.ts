import type { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger.js';
import { BadRequestError, NotFoundError, toAppError } from '../types/errors.js';
import type { ErrorResponse } from '../types/errors.js';

/**
 * express.json() rejects unparseable bodies with a SyntaxError carrying status 400
 */
function isBodyParseError(error: unknown): boolean {
    return error instanceof SyntaxError && 'status' in error && error.status === 400;
}

/**
 * Transform error to standardized error response.
 * Non-operational errors keep their details out of the response body.
 */
export function transformErrorToResponse(error: unknown, req: Request): ErrorResponse {
    const appError = toAppError(isBodyParseError(error) ? new BadRequestError('Malformed JSON request body') : error);
    const message = appError.isOperational || process.env.NODE_ENV !== 'production'
        ? appError.message
        : 'An unexpected error occurred';

    return {
        error: appError.name,
        code: appError.code,
        message,
        statusCode: appError.statusCode,
        timestamp: new Date().toISOString(),
        path: req.path,
        ...(appError.isOperational && appError.context ? { context: appError.context } : {}),
    };
}

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app
 */
export function errorHandler(
    err: unknown,
    req: Request,
    res: Response,
    next: NextFunction
): void {
    // NotFoundError is an expected scenario (unknown suggestion id), so log at info level
    if (err instanceof NotFoundError) {
        logger.info({
            message: err.message,
            path: req.path,
            method: req.method,
        }, 'Resource not found');
    } else {
        logger.error({
            error: err,
            path: req.path,
            method: req.method,
        }, 'Request failed');
    }

    if (res.headersSent) {
        next(err);
        return;
    }

    const response = transformErrorToResponse(err, req);
    res.status(response.statusCode).json(response);
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
}

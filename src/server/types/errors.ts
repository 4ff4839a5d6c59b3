/**
 * Centralized error type definitions for the catalog enricher
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Client errors
  BAD_REQUEST = 'BAD_REQUEST',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',

  // Server errors
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
  EXTERNAL_SERVICE_ERROR = 'EXTERNAL_SERVICE_ERROR',

  // Enrichment pipeline
  DATASET_FETCH_FAILED = 'DATASET_FETCH_FAILED',
  GENERATION_TRANSIENT = 'GENERATION_TRANSIENT',
  GENERATION_FATAL = 'GENERATION_FATAL',
  CIRCUIT_OPEN = 'CIRCUIT_OPEN',
  ENRICHMENT_CANCELLED = 'ENRICHMENT_CANCELLED',
  APPLY_WRITE_FAILED = 'APPLY_WRITE_FAILED',
}

/**
 * Domain-specific error types
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, additionalContext?: Record<string, unknown>) {
    const message = identifier ? `${resource} with identifier '${identifier}' not found` : `${resource} not found`;
    super(message, ErrorCode.NOT_FOUND, 404, true, { resource, identifier, ...additionalContext });
  }
}

export class ConflictError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFLICT, 409, true, context);
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.BAD_REQUEST, 400, true, context);
  }
}

export class ExternalServiceError extends AppError {
  constructor(service: string, message: string, context?: Record<string, unknown>) {
    super(
      `External service error (${service}): ${message}`,
      ErrorCode.EXTERNAL_SERVICE_ERROR,
      502,
      true,
      { service, ...context }
    );
  }
}

// ---------------------------------------------------------------------------
// Catalog errors
// ---------------------------------------------------------------------------

export class DatasetNotFoundError extends NotFoundError {
  constructor(datasetId: string) {
    super('Dataset', datasetId);
  }
}

/**
 * Catalog-side metadata changed since the schema was fetched
 */
export class CatalogConflictError extends ConflictError {
  constructor(datasetId: string, detail: string) {
    super(`Catalog rejected write for '${datasetId}': ${detail}`, { datasetId });
  }
}

// ---------------------------------------------------------------------------
// Enrichment pipeline errors
// ---------------------------------------------------------------------------

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class FetchError extends AppError {
  constructor(
    public readonly datasetId: string,
    public readonly reason: 'not_found' | 'unavailable',
    cause: unknown
  ) {
    super(
      `Failed to fetch schema for '${datasetId}': ${describeCause(cause)}`,
      ErrorCode.DATASET_FETCH_FAILED,
      reason === 'not_found' ? 404 : 502,
      true,
      { datasetId, reason }
    );
  }
}

/** Retry ceiling exhausted (or an unclassified provider failure) for one dataset */
export class GenerationTransientError extends AppError {
  constructor(
    public readonly datasetId: string,
    public readonly attempts: number,
    cause: unknown
  ) {
    super(
      `Suggestion generation failed for '${datasetId}' after ${attempts} attempt(s): ${describeCause(cause)}`,
      ErrorCode.GENERATION_TRANSIENT,
      502,
      true,
      { datasetId, attempts }
    );
  }
}

/** Authentication or configuration problem; retrying cannot help */
export class GenerationFatalError extends AppError {
  constructor(
    public readonly datasetId: string,
    cause: unknown
  ) {
    super(
      `Language model rejected the request: ${describeCause(cause)}`,
      ErrorCode.GENERATION_FATAL,
      502,
      false,
      { datasetId }
    );
  }
}

export class CircuitOpenError extends AppError {
  constructor(
    public readonly breakerName: string,
    public readonly retryAfterMs: number
  ) {
    super(
      `Circuit breaker '${breakerName}' is open. Retry after ${Math.ceil(retryAfterMs / 1000)}s`,
      ErrorCode.CIRCUIT_OPEN,
      503,
      true,
      { breakerName, retryAfterMs }
    );
  }
}

export class EnrichmentCancelledError extends AppError {
  constructor(datasetId: string) {
    super(`Enrichment of '${datasetId}' was cancelled`, ErrorCode.ENRICHMENT_CANCELLED, 499, true, { datasetId });
  }
}

export class ApplyWriteError extends AppError {
  constructor(suggestionId: string, cause: unknown) {
    super(
      `Catalog write failed for suggestion '${suggestionId}': ${describeCause(cause)}`,
      ErrorCode.APPLY_WRITE_FAILED,
      502,
      true,
      { suggestionId }
    );
  }
}

/** Errors a single dataset pipeline can end with */
export type EnrichmentError =
  | FetchError
  | GenerationTransientError
  | GenerationFatalError
  | CircuitOpenError
  | EnrichmentCancelledError;

/**
 * Standardized error response format
 */
export interface ErrorResponse {
  error: string;
  code: string;
  message: string;
  statusCode: number;
  timestamp: string;
  path?: string;
  context?: Record<string, unknown>;
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
}

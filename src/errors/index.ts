/**
 * Custom Error Classes
 *
 * Standardized error types for better error handling and debugging.
 *
 * Scrape failures are split by blast radius:
 * - NavigationError: page/frame/filter list missing, the whole pass is abandoned
 * - ExtractionError: one filter's table missing, only that filter is skipped
 * - StorageError: the pass could not be committed, its batch is rolled back
 */

/**
 * Base error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error for validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, public field: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

/**
 * Error for page, frame or filter-list lookups that did not resolve in time
 */
export class NavigationError extends AppError {
  constructor(message: string, public step: string, cause?: Error) {
    super(message, 'NAVIGATION_FAILURE', 502, cause);
  }
}

/**
 * Error for a ranking table that could not be read for one filter
 */
export class ExtractionError extends AppError {
  constructor(message: string, public filter: string, cause?: Error) {
    super(message, 'EXTRACTION_FAILURE', 502, cause);
  }
}

/**
 * Error for a pass whose writes could not be committed
 */
export class StorageError extends AppError {
  constructor(message: string, public operation: string, cause?: Error) {
    super(message, 'STORAGE_FAILURE', 500, cause);
  }
}

/**
 * Error for a backend that could not be reached at all
 */
export class BackendUnavailableError extends AppError {
  constructor(message: string, public backend: string, cause?: Error) {
    super(message, 'BACKEND_UNAVAILABLE', 503, cause);
  }
}

/**
 * Error for database operations
 */
export class DatabaseError extends AppError {
  constructor(message: string, public operation: string, cause?: Error) {
    super(message, 'DATABASE_ERROR', 500, cause);
  }
}

/**
 * Normalizes an unknown throwable into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

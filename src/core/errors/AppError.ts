/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the entire application.
 *
 * USAGE:
 * ```typescript
 * // In service
 * throw new InvalidInputError('Depot index 5 is out of bounds', ErrorCode.INVALID_DEPOT_INDEX, [
 *   { field: 'depot_index', message: 'Must be between 0 and 2', value: 5 }
 * ]);
 *
 * // In route handler
 * throw InvalidInputError.fromZodError(parsed.error);
 * ```
 *
 * Every error carries a stable `kind` (what class of failure happened) and a
 * finer `code`. Clients branch on `kind`; `code` narrows it down.
 *
 * =============================================================================
 */

import {
  ErrorCode,
  ErrorKind,
  ERROR_MESSAGES,
  ERROR_SUGGESTIONS,
  HTTP_STATUS
} from '../constants';

/**
 * Field-level error detail
 */
export interface ErrorDetail {
  field?: string;
  message: string;
  value?: unknown;
}

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly kind: ErrorKind;
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly details: ErrorDetail[];
  public readonly suggestion?: string;
  public readonly timestamp: string;

  constructor(
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
    kind: ErrorKind = ErrorKind.INTERNAL_ERROR,
    code: ErrorCode = ErrorCode.INTERNAL_ERROR,
    details: ErrorDetail[] = [],
    suggestion: string | undefined = ERROR_SUGGESTIONS[code],
    isOperational: boolean = true
  ) {
    super(message || ERROR_MESSAGES[code]);

    this.statusCode = statusCode;
    this.kind = kind;
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.isOperational = isOperational;
    this.timestamp = new Date().toISOString();

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
  }

  /**
   * Convert error to JSON response format
   */
  toJSON(): ErrorResponse {
    return {
      success: false,
      error: {
        kind: this.kind,
        code: this.code,
        message: this.message,
        ...(this.details.length > 0 && { details: this.details }),
        ...(this.suggestion && { suggestion: this.suggestion }),
        timestamp: this.timestamp,
        ...(process.env.NODE_ENV === 'development' && { stack: this.stack })
      }
    };
  }
}

/**
 * Error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    kind: ErrorKind;
    code: ErrorCode;
    message: string;
    details?: ErrorDetail[];
    suggestion?: string;
    timestamp: string;
    stack?: string;
  };
}

// =============================================================================
// TAXONOMY ERRORS
// =============================================================================

/**
 * 400 - Bad coordinates, stop count out of range, bad depot index, malformed body
 */
export class InvalidInputError extends AppError {
  constructor(
    message: string = ERROR_MESSAGES[ErrorCode.INVALID_INPUT],
    code: ErrorCode = ErrorCode.INVALID_INPUT,
    details: ErrorDetail[] = [],
    suggestion?: string
  ) {
    super(
      message,
      HTTP_STATUS.BAD_REQUEST,
      ErrorKind.INVALID_INPUT,
      code,
      details,
      suggestion ?? ERROR_SUGGESTIONS[code]
    );
  }

  /**
   * Map a zod failure to field-attributed details.
   * Paths are rendered as `stops[1].latitude`.
   */
  static fromZodError(zodError: { errors: Array<{ path: (string | number)[]; message: string }> }): InvalidInputError {
    const details = zodError.errors.map(err => ({
      field: formatIssuePath(err.path),
      message: err.message
    }));
    const summary = details.length === 1
      ? `Invalid input: ${details[0].message}`
      : `Invalid input: ${details.length} validation errors`;
    return new InvalidInputError(summary, ErrorCode.INVALID_INPUT, details);
  }
}

function formatIssuePath(path: (string | number)[]): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') return `${acc}[${segment}]`;
    return acc ? `${acc}.${segment}` : segment;
  }, '');
}

/**
 * 400 - One or more addresses could not be resolved
 */
export class GeocodingFailedError extends AppError {
  constructor(message: string, details: ErrorDetail[] = []) {
    super(
      message,
      HTTP_STATUS.BAD_REQUEST,
      ErrorKind.GEOCODING_FAILED,
      ErrorCode.GEOCODING_FAILED,
      details
    );
  }
}

/**
 * 503 - Routing service returned an error status or a malformed response
 */
export class RoutingServiceUnavailableError extends AppError {
  constructor(message: string = ERROR_MESSAGES[ErrorCode.ROUTING_SERVICE_ERROR], details: ErrorDetail[] = []) {
    super(
      message,
      HTTP_STATUS.SERVICE_UNAVAILABLE,
      ErrorKind.ROUTING_SERVICE_UNAVAILABLE,
      ErrorCode.ROUTING_SERVICE_ERROR,
      details
    );
  }
}

/**
 * 503 - Routing service did not answer within its timeout, retries exhausted
 */
export class RoutingServiceTimeoutError extends AppError {
  constructor(message: string = ERROR_MESSAGES[ErrorCode.ROUTING_SERVICE_TIMEOUT], details: ErrorDetail[] = []) {
    super(
      message,
      HTTP_STATUS.SERVICE_UNAVAILABLE,
      ErrorKind.ROUTING_SERVICE_TIMEOUT,
      ErrorCode.ROUTING_SERVICE_TIMEOUT,
      details
    );
  }
}

/**
 * 500 - Solver ran out of time without a feasible route
 */
export class SolverNoSolutionError extends AppError {
  constructor(message: string = ERROR_MESSAGES[ErrorCode.SOLVER_NO_SOLUTION], details: ErrorDetail[] = []) {
    super(
      message,
      HTTP_STATUS.INTERNAL_ERROR,
      ErrorKind.SOLVER_NO_SOLUTION,
      ErrorCode.SOLVER_NO_SOLUTION,
      details
    );
  }
}

/**
 * 500 - Unexpected failure inside the solving stage
 * 503 when the solver queue is saturated (SOLVER_BUSY)
 */
export class SolverFailedError extends AppError {
  constructor(
    message: string = ERROR_MESSAGES[ErrorCode.SOLVER_FAILED],
    code: ErrorCode.SOLVER_FAILED | ErrorCode.SOLVER_BUSY = ErrorCode.SOLVER_FAILED
  ) {
    super(
      message,
      code === ErrorCode.SOLVER_BUSY ? HTTP_STATUS.SERVICE_UNAVAILABLE : HTTP_STATUS.INTERNAL_ERROR,
      ErrorKind.SOLVER_FAILED,
      code
    );
  }
}

/**
 * 500 Internal Server Error - Unexpected error
 */
export class InternalError extends AppError {
  constructor(message: string = ERROR_MESSAGES[ErrorCode.INTERNAL_ERROR]) {
    super(
      message,
      HTTP_STATUS.INTERNAL_ERROR,
      ErrorKind.INTERNAL_ERROR,
      ErrorCode.INTERNAL_ERROR,
      [],
      undefined,
      false
    );
  }
}

/**
 * 404 Not Found - Unknown endpoint
 */
export class NotFoundError extends AppError {
  constructor(message: string = ERROR_MESSAGES[ErrorCode.NOT_FOUND]) {
    super(message, HTTP_STATUS.NOT_FOUND, ErrorKind.INTERNAL_ERROR, ErrorCode.NOT_FOUND);
  }
}

/**
 * 429 Too Many Requests - Rate limited
 */
export class RateLimitError extends AppError {
  public readonly retryAfter: number;

  constructor(
    message: string = ERROR_MESSAGES[ErrorCode.RATE_LIMIT_EXCEEDED],
    retryAfter: number = 60
  ) {
    super(
      message,
      HTTP_STATUS.TOO_MANY_REQUESTS,
      ErrorKind.INTERNAL_ERROR,
      ErrorCode.RATE_LIMIT_EXCEEDED,
      [{ field: 'retryAfter', message: `Retry after ${retryAfter} seconds`, value: retryAfter }]
    );
    this.retryAfter = retryAfter;
  }
}

/**
 * =============================================================================
 * ERROR HANDLING MIDDLEWARE
 * =============================================================================
 *
 * Centralized error handling for all routes.
 *
 * SECURITY:
 * - Stack traces never reach clients outside development
 * - Internal error messages are hidden in production
 * - All errors are logged server-side
 * =============================================================================
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../services/logger.service';
import {
  AppError,
  ErrorCode,
  InternalError,
  InvalidInputError,
  NotFoundError
} from '../../core';
import { config } from '../../config/environment';

/**
 * body-parser attaches a `type` to the errors it raises
 */
function bodyParserErrorType(error: Error): string | undefined {
  if ('type' in error && typeof error.type === 'string') {
    return error.type;
  }
  return undefined;
}

/**
 * Convert anything thrown by a handler into an AppError
 */
export function toAppError(error: Error): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const parserErrorType = bodyParserErrorType(error);
  if (parserErrorType === 'entity.parse.failed') {
    return new InvalidInputError('Request body is not valid JSON', ErrorCode.INVALID_INPUT, [
      { field: 'body', message: error.message }
    ]);
  }
  if (parserErrorType === 'entity.too.large') {
    return new InvalidInputError('Request body is too large', ErrorCode.INVALID_INPUT, [
      { field: 'body', message: error.message }
    ]);
  }

  return new InternalError(
    config.isProduction
      ? 'An unexpected error occurred. Please try again later.'
      : error.message
  );
}

/**
 * Global error handler middleware
 * Must be the last middleware in the chain
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const appError = toAppError(error);
  const logData = {
    kind: appError.kind,
    code: appError.code,
    error: error.message,
    path: req.path,
    method: req.method,
    requestId: res.getHeader('X-Request-ID')
  };

  // Stack traces only for failures nobody anticipated
  if (appError.statusCode >= 500) {
    logger.error('Request error', {
      ...logData,
      ...(!appError.isOperational && { stack: error.stack })
    });
  } else {
    logger.warn('Request rejected', logData);
  }

  res.status(appError.statusCode).json(appError.toJSON());
}

/**
 * Async route wrapper to catch async errors
 * Use this to wrap async route handlers
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Not found error handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  const error = new NotFoundError(`Cannot ${req.method} ${req.path}`);
  res.status(error.statusCode).json(error.toJSON());
}

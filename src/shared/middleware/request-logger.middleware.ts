/**
 * =============================================================================
 * REQUEST LOGGER MIDDLEWARE
 * =============================================================================
 *
 * Logs all incoming requests for debugging and audit purposes.
 *
 * SECURITY:
 * - Does not log request bodies (addresses are customer data)
 * - Does not log authorization headers
 * - Masks sensitive query parameters
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger, isSensitiveKey } from '../services/logger.service';

/**
 * Mask sensitive query parameters
 */
export function maskQueryParams(query: Record<string, unknown>): Record<string, unknown> {
  const masked: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(query)) {
    masked[key] = isSensitiveKey(key) ? '[MASKED]' : value;
  }

  return masked;
}

/**
 * Request logger middleware
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();

  // Log when response finishes
  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const logData = {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration: `${duration}ms`,
      requestId: res.getHeader('X-Request-ID'),
      ip: req.ip,
      userAgent: req.get('user-agent')?.substring(0, 100),
      ...(Object.keys(req.query).length > 0 && {
        query: maskQueryParams(req.query)
      })
    };

    // Log level based on status code
    if (res.statusCode >= 500) {
      logger.error('Request failed', logData);
    } else if (res.statusCode >= 400) {
      logger.warn('Request error', logData);
    } else {
      logger.info('Request completed', logData);
    }
  });

  next();
}

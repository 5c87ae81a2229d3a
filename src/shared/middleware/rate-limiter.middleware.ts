/**
 * =============================================================================
 * RATE LIMITER MIDDLEWARE
 * =============================================================================
 *
 * Prevents abuse by limiting request rates per client IP.
 *
 * Each optimization can fan out into dozens of geocoding calls and a matrix
 * fetch, so the API prefix is limited as a whole. In-memory store: limits
 * are per process.
 * =============================================================================
 */

import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { Request, Response } from 'express';
import { config } from '../../config/environment';
import { RateLimitError } from '../../core';
import { logger } from '../services/logger.service';

export interface RateLimiterOptions {
  windowMs: number;
  max: number;
  enabled: boolean;
}

export function createRateLimiter(options: RateLimiterOptions): RateLimitRequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    max: options.max,
    standardHeaders: true,
    legacyHeaders: false,
    skip: () => !options.enabled,
    handler: (req: Request, res: Response) => {
      const error = new RateLimitError(
        'Too many requests. Please try again later.',
        Math.ceil(options.windowMs / 1000)
      );
      logger.warn('[RateLimit] Limit exceeded', { ip: req.ip, path: req.path });
      res.status(error.statusCode).json(error.toJSON());
    }
  });
}

/**
 * Limiter applied to everything under the API prefix
 */
export const apiRateLimiter = createRateLimiter({
  windowMs: config.rateLimit.windowMs,
  max: config.rateLimit.maxRequests,
  enabled: config.security.enableRateLimiting
});

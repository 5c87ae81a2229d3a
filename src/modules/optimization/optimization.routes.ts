/**
 * =============================================================================
 * OPTIMIZATION ROUTES
 * =============================================================================
 *
 * API Endpoints:
 * - POST /api/v1/optimize - Optimize the visiting order of delivery stops
 *
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { ApiResponse, InvalidInputError } from '../../core';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { optimizeRequestSchema, toOptimizationRequest, toOptimizationResponse } from './optimization.schema';
import type { OptimizationService } from './optimization.service';

export function createOptimizationRouter(service: OptimizationService): Router {
  const router = Router();

  /**
   * POST /api/v1/optimize
   *
   * Body:
   * {
   *   "stops": [
   *     { "latitude": 40.7128, "longitude": -74.0060 },
   *     { "address": "350 5th Ave, New York, NY 10118" }
   *   ],
   *   "depot_index": 0
   * }
   */
  router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const parsed = optimizeRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw InvalidInputError.fromZodError(parsed.error);
    }

    const outcome = await service.optimize(toOptimizationRequest(parsed.data));
    ApiResponse.success(res, toOptimizationResponse(outcome), undefined, {
      requestId: res.getHeader('X-Request-ID')?.toString()
    });
  }));

  return router;
}

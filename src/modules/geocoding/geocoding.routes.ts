/**
 * =============================================================================
 * GEOCODING ROUTES
 * =============================================================================
 *
 * GET /api/v1/geocoding/cache/stats - address cache effectiveness
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { ApiResponse } from '../../core';
import type { GeocodingResolver } from './geocoding.service';

export function createGeocodingRouter(resolver: GeocodingResolver): Router {
  const router = Router();

  /**
   * GET /api/v1/geocoding/cache/stats
   *
   * Response (cache enabled):
   * { "enabled": true, "provider": "nominatim", "size": 12, "maxSize": 10000, "hits": 30, ... }
   */
  router.get('/cache/stats', (_req: Request, res: Response) => {
    const stats = resolver.cacheStats();
    ApiResponse.success(
      res,
      stats
        ? { enabled: true, provider: resolver.providerName, ...stats }
        : { enabled: false, provider: resolver.providerName }
    );
  });

  return router;
}

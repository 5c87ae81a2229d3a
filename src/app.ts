/**
 * =============================================================================
 * EXPRESS APPLICATION
 * =============================================================================
 *
 * Builds the HTTP application from already-constructed services, so tests
 * can mount it with their own instances and server.ts only has to listen.
 *
 * ROUTES:
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ GET  /                             service name and status              │
 * │ GET  /health, /health/*, /metrics  monitoring                           │
 * │ POST /api/v1/optimize              optimize a list of delivery stops    │
 * │ GET  /api/v1/geocoding/cache/stats address cache statistics             │
 * └─────────────────────────────────────────────────────────────────────────┘
 * =============================================================================
 */

import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import compression from 'compression';
import { config } from './config/environment';
import { API_PREFIX, SERVICE_NAME } from './core';
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { apiRateLimiter } from './shared/middleware/rate-limiter.middleware';
import { requestIdMiddleware, securityHeaders } from './shared/middleware/security.middleware';
import { metricsMiddleware } from './shared/monitoring/metrics.service';
import { createHealthRouter } from './shared/routes/health.routes';
import { createGeocodingRouter, GeocodingResolver } from './modules/geocoding';
import { createOptimizationRouter, OptimizationService } from './modules/optimization';
import { RouteSolverService } from './modules/solver';

export interface AppDependencies {
  optimizationService: OptimizationService;
  geocodingResolver: GeocodingResolver;
  solverService: RouteSolverService;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Behind one load balancer hop; needed for per-client rate limiting
  app.set('trust proxy', 1);

  // ===========================================================================
  // MIDDLEWARE - Security & Performance
  // ===========================================================================

  // Request ID for tracking (must be first)
  app.use(requestIdMiddleware);

  app.use(compression({
    level: 6,
    threshold: 1024,
    filter: (req, res) => {
      if (req.headers['x-no-compression']) return false;
      return compression.filter(req, res);
    }
  }));

  app.use(securityHeaders);

  app.use(cors({
    origin: config.isDevelopment ? '*' : config.cors.origin,
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    maxAge: 86400 // 24 hours preflight cache
  }));

  app.use(express.json({ limit: '1mb' }));

  if (config.security.enableRequestLogging) {
    app.use(requestLogger);
  }

  app.use(metricsMiddleware);

  app.use(API_PREFIX, apiRateLimiter);

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      service: SERVICE_NAME,
      version: config.version,
      status: 'running'
    });
  });

  app.use('/', createHealthRouter({
    solverQueue: () => deps.solverService.getQueueStats(),
    geocodingCache: () => deps.geocodingResolver.cacheStats()
  }));

  app.use(`${API_PREFIX}/optimize`, createOptimizationRouter(deps.optimizationService));
  app.use(`${API_PREFIX}/geocoding`, createGeocodingRouter(deps.geocodingResolver));

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

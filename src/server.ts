/**
 * =============================================================================
 * ROUTE OPTIMIZER BACKEND - MAIN SERVER
 * =============================================================================
 *
 * Process entry point: validates configuration, wires the services, starts
 * listening and shuts down gracefully.
 *
 * PIPELINE:
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ GEOCODING    │ addresses → coordinates (cached, rate limited)           │
 * │ ROUTING      │ coordinates → distance/duration matrix, route geometry   │
 * │ SOLVER       │ matrix → visiting order (bounded concurrency)            │
 * │ OPTIMIZATION │ orchestrates the above, computes savings vs. baseline    │
 * └─────────────────────────────────────────────────────────────────────────┘
 * =============================================================================
 */

import { createServer } from 'http';
import { validateAndLogEnvironment } from './core/config/env.validation';
import { config } from './config/environment';
import { logger } from './shared/services/logger.service';
import { createApp } from './app';
import { createGeocodingResolver } from './modules/geocoding';
import { createDistanceMatrixClient } from './modules/routing';
import { createRouteSolverService } from './modules/solver';
import { createOptimizationService } from './modules/optimization';

// =============================================================================
// ENVIRONMENT VALIDATION (Fail fast if config is invalid)
// =============================================================================
validateAndLogEnvironment();

// =============================================================================
// SERVICES & APP
// =============================================================================
const geocodingResolver = createGeocodingResolver();
const matrixClient = createDistanceMatrixClient();
const solverService = createRouteSolverService();
const optimizationService = createOptimizationService(geocodingResolver, matrixClient, solverService);

const app = createApp({ optimizationService, geocodingResolver, solverService });
const server = createServer(app);

// =============================================================================
// START SERVER
// =============================================================================

server.listen(config.port, config.host, () => {
  // A solve may take up to the solver budget on top of geocoding and routing
  server.timeout = config.solver.timeLimitMs + config.routing.timeoutMs + 30000;
  server.keepAliveTimeout = 65000;
  server.headersTimeout = 66000;

  logger.info(`Server started on http://${config.host}:${config.port}`, {
    environment: config.nodeEnv,
    geocodingProvider: config.geocoding.provider,
    routingService: config.routing.baseUrl
  });
});

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', {
    reason: reason instanceof Error ? reason.message : String(reason)
  });
  process.exit(1);
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const gracefulShutdown = (signal: string): void => {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  server.close(() => {
    logger.info('HTTP server closed');
    logger.info('Graceful shutdown complete');
    process.exit(0);
  });

  // Force shutdown after 30 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 30000).unref();
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

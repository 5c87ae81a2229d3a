/**
 * =============================================================================
 * HEALTH CHECK ROUTES - Production Monitoring Endpoints
 * =============================================================================
 *
 * Provides endpoints for:
 * - Load balancer health checks
 * - Kubernetes liveness/readiness probes
 * - Monitoring dashboards
 *
 * ENDPOINTS:
 * - GET /health          - Quick health check (for load balancers)
 * - GET /health/live     - Liveness probe (is the process running?)
 * - GET /health/ready    - Readiness probe (can it accept traffic?)
 * - GET /health/detailed - Full system status (internal use)
 * - GET /metrics         - Prometheus metrics
 * - GET /version         - Build information
 *
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import os from 'os';
import { config } from '../../config/environment';
import { metrics, metricsHandler } from '../monitoring/metrics.service';
import type { QueueStats } from '../resilience/request-queue';
import type { AddressCacheStats } from '../../modules/geocoding/address-cache';

/**
 * What the health endpoints need to know about the running services
 */
export interface HealthSources {
  solverQueue: () => QueueStats;
  geocodingCache: () => AddressCacheStats | null;
}

// Track server start time
const startTime = Date.now();

export function createHealthRouter(sources: HealthSources): Router {
  const router = Router();

  /**
   * Basic health check - for load balancers
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString()
    });
  });

  /**
   * Liveness probe - is the process alive?
   */
  router.get('/health/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      pid: process.pid,
      uptime: Math.floor((Date.now() - startTime) / 1000)
    });
  });

  /**
   * Readiness probe - can the service accept traffic?
   * Not ready while the solver's waiting line is full.
   */
  router.get('/health/ready', (_req: Request, res: Response) => {
    const queue = sources.solverQueue();
    const checks: Record<string, boolean> = {
      solverQueue: queue.queueSize < queue.maxQueueSize
    };
    const isReady = Object.values(checks).every(v => v);

    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString()
    });
  });

  /**
   * Detailed health - full system status
   */
  router.get('/health/detailed', (_req: Request, res: Response) => {
    const memUsage = process.memoryUsage();
    const cpuUsage = process.cpuUsage();
    const uptimeSeconds = Math.floor((Date.now() - startTime) / 1000);

    res.json({
      status: 'healthy',
      version: config.version,
      environment: config.nodeEnv,
      timestamp: new Date().toISOString(),

      server: {
        pid: process.pid,
        uptime: formatUptime(uptimeSeconds),
        uptimeSeconds,
        nodeVersion: process.version,
        platform: process.platform,
        arch: process.arch
      },

      system: {
        hostname: os.hostname(),
        cpuCores: os.cpus().length,
        totalMemory: formatBytes(os.totalmem()),
        freeMemory: formatBytes(os.freemem()),
        loadAverage: os.loadavg()
      },

      process: {
        memory: {
          heapUsed: formatBytes(memUsage.heapUsed),
          heapTotal: formatBytes(memUsage.heapTotal),
          external: formatBytes(memUsage.external),
          rss: formatBytes(memUsage.rss)
        },
        cpu: {
          user: cpuUsage.user,
          system: cpuUsage.system
        }
      },

      queues: { solver: sources.solverQueue() },
      geocoding: {
        provider: config.geocoding.provider,
        cache: sources.geocodingCache()
      },
      routing: {
        baseUrl: config.routing.baseUrl,
        profile: config.routing.profile
      },

      metrics: metrics.getMetricsJSON()
    });
  });

  /**
   * Prometheus metrics endpoint
   */
  router.get('/metrics', metricsHandler);

  /**
   * Version endpoint
   */
  router.get('/version', (_req: Request, res: Response) => {
    res.json({
      name: 'route-optimizer-backend',
      version: config.version,
      environment: config.nodeEnv,
      nodeVersion: process.version
    });
  });

  return router;
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let value = bytes;
  let unitIndex = 0;

  while (value >= 1024 && unitIndex < units.length - 1) {
    value /= 1024;
    unitIndex++;
  }

  return `${value.toFixed(2)} ${units[unitIndex]}`;
}

export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  parts.push(`${secs}s`);

  return parts.join(' ');
}

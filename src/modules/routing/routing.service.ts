/**
 * =============================================================================
 * ROUTING SERVICE - Distance Matrix & Route Geometry
 * =============================================================================
 *
 * Client for an OSRM-compatible routing service.
 *
 * ENDPOINTS:
 * ─────────────────────────────────────────────────────────────────────────────
 *   GET {base}/table/v1/{profile}/{lon,lat;lon,lat;...}?annotations=distance,duration
 *   GET {base}/route/v1/{profile}/{lon,lat;...}?overview=full&geometries=geojson
 *
 * FAILURE HANDLING:
 * ─────────────────────────────────────────────────────────────────────────────
 * - Timeouts and network errors: retried with exponential backoff
 * - HTTP error status, code != "Ok": service error, not retried
 * - Matrix not exactly N x N: service error, never truncated or padded
 * - Route geometry failures never propagate; the caller gets null
 *
 * =============================================================================
 */

import { z } from 'zod';
import { config } from '../../config/environment';
import { logger, redactUrl } from '../../shared/services/logger.service';
import { metrics } from '../../shared/monitoring/metrics.service';
import { retryWithBackoff } from '../../shared/resilience/retry';
import { fetchJson, HttpNetworkError, HttpTimeoutError, JsonResponse } from '../../shared/utils/http.utils';
import {
  CostMatrices,
  Matrix,
  osrmEnvelopeSchema,
  osrmRouteResponseSchema,
  osrmTableResponseSchema,
  RouteGeometry,
  RoutePoint,
} from './routing.schema';
import {
  isTransientRoutingError,
  RoutingInputError,
  RoutingNetworkError,
  RoutingServiceError,
  RoutingTimeoutError,
} from './routing.types';

export interface DistanceMatrixClientOptions {
  baseUrl: string;
  profile: string;
  timeoutMs: number;
  maxAttempts: number;
  retry: { baseDelayMs: number; maxDelayMs: number };
  sleep?: (ms: number) => Promise<void>;
}

type RoutingOperation = 'table' | 'route';

// =============================================================================
// MAIN SERVICE CLASS
// =============================================================================

export class DistanceMatrixClient {
  private readonly baseUrl: string;

  constructor(private readonly options: DistanceMatrixClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  /**
   * All-pairs distance and duration for the given points, in one round trip.
   *
   * @throws RoutingInputError fewer than 2 points
   * @throws RoutingTimeoutError retries exhausted on timeouts
   * @throws RoutingServiceError anything else
   */
  async computeMatrix(points: RoutePoint[]): Promise<CostMatrices> {
    if (points.length < 2) {
      throw new RoutingInputError('At least 2 locations required for distance matrix');
    }

    const n = points.length;
    const startTime = Date.now();
    logger.info(`Calculating distance matrix for ${n} locations`);

    const url =
      `${this.baseUrl}/table/v1/${this.options.profile}/${formatCoordinates(points)}` +
      '?annotations=distance,duration';

    const data = await this.request('table', url, osrmTableResponseSchema);

    if (!data.distances || !data.durations) {
      throw new RoutingServiceError('Invalid response: missing distance or duration data');
    }

    const distances = toSquareMatrix(data.distances, n, 'distance');
    const durations = toSquareMatrix(data.durations, n, 'duration');

    logger.info(`Calculated ${n}x${n} distance matrix`, { totalTimeMs: Date.now() - startTime });
    return { distances, durations };
  }

  /**
   * Road-following path through the points in the given order.
   * Returns null on any failure.
   */
  async computeRouteGeometry(points: RoutePoint[]): Promise<RouteGeometry | null> {
    if (points.length < 2) {
      return null;
    }

    const url =
      `${this.baseUrl}/route/v1/${this.options.profile}/${formatCoordinates(points)}` +
      '?overview=full&geometries=geojson';

    try {
      const data = await this.request('route', url, osrmRouteResponseSchema);
      const [route] = data.routes;
      if (!route) {
        logger.warn('Route geometry unavailable: response has no routes');
        return null;
      }
      return {
        type: 'LineString',
        coordinates: route.geometry.coordinates,
        ...(route.distance !== undefined && { distanceMeters: route.distance }),
        ...(route.duration !== undefined && { durationSeconds: route.duration }),
      };
    } catch (error) {
      logger.warn('Route geometry unavailable', {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  // ===========================================================================
  // PRIVATE: HTTP with retry
  // ===========================================================================

  private async request<T>(
    operation: RoutingOperation,
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    try {
      const data = await retryWithBackoff(() => this.attempt(url, schema), {
        attempts: this.options.maxAttempts,
        baseDelayMs: this.options.retry.baseDelayMs,
        maxDelayMs: this.options.retry.maxDelayMs,
        shouldRetry: isTransientRoutingError,
        sleep: this.options.sleep,
        onRetry: (error, attempt, delayMs) => {
          logger.warn(`Retrying routing ${operation} request`, {
            attempt,
            delayMs,
            reason: error instanceof Error ? error.message : String(error),
          });
        },
      });
      metrics.incrementCounter('routing_requests_total', { operation, outcome: 'success' });
      return data;
    } catch (error) {
      const outcome = error instanceof RoutingTimeoutError ? 'timeout' : 'error';
      metrics.incrementCounter('routing_requests_total', { operation, outcome });
      throw error;
    }
  }

  private async attempt<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    logger.debug('Requesting routing service', { url: redactUrl(url) });

    let response: JsonResponse;
    try {
      response = await fetchJson(url, { timeoutMs: this.options.timeoutMs });
    } catch (error) {
      if (error instanceof HttpTimeoutError) {
        logger.error(`Routing service timeout after ${this.options.timeoutMs}ms`);
        throw new RoutingTimeoutError(this.options.timeoutMs);
      }
      if (error instanceof HttpNetworkError) {
        logger.error(`Routing service network error: ${error.message}`);
        throw new RoutingNetworkError(error.message);
      }
      throw error;
    }

    if (!response.ok) {
      logger.error('Routing service HTTP error', {
        status: response.status,
        responseTimeMs: response.elapsedMs,
      });
      throw new RoutingServiceError(`HTTP error: ${response.status}`, response.status);
    }

    const envelope = osrmEnvelopeSchema.safeParse(response.body);
    if (!envelope.success) {
      throw new RoutingServiceError('Invalid response: missing status code');
    }
    if (envelope.data.code !== 'Ok') {
      const message = envelope.data.message ?? envelope.data.code;
      logger.error(`Routing service error: ${message}`, { responseTimeMs: response.elapsedMs });
      throw new RoutingServiceError(`Routing service error: ${message}`);
    }

    const parsed = schema.safeParse(response.body);
    if (!parsed.success) {
      throw new RoutingServiceError(
        `Invalid response: ${parsed.error.errors[0]?.message ?? 'unexpected shape'}`
      );
    }

    logger.info('Routing service request successful', {
      status: response.status,
      responseTimeMs: response.elapsedMs,
    });
    return parsed.data;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * `lon,lat;lon,lat;...` in request order
 */
export function formatCoordinates(points: RoutePoint[]): string {
  return points.map(point => `${point.longitude},${point.latitude}`).join(';');
}

function toSquareMatrix(rows: Array<Array<number | null>>, n: number, label: string): Matrix {
  const misSized = rows.length !== n || rows.some(row => row.length !== n);
  if (misSized) {
    const columns = rows.map(row => row.length).join(',');
    throw new RoutingServiceError(
      `Matrix dimension mismatch: expected ${n}x${n} ${label} matrix, got ${rows.length} rows (columns: ${columns})`
    );
  }
  return rows.map(row => row.map(cell => (cell === null ? Number.POSITIVE_INFINITY : cell)));
}

// =============================================================================
// DEFAULT INSTANCE
// =============================================================================

export function createDistanceMatrixClient(): DistanceMatrixClient {
  return new DistanceMatrixClient({
    baseUrl: config.routing.baseUrl,
    profile: config.routing.profile,
    timeoutMs: config.routing.timeoutMs,
    maxAttempts: config.routing.maxAttempts,
    retry: config.retry,
  });
}

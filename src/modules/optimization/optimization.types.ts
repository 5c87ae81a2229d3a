/**
 * Optimization pipeline types (internal, camelCase).
 * The wire format lives in optimization.schema.ts.
 */

import type { RouteGeometry } from '../routing/routing.schema';

export enum PipelineStage {
  VALIDATING = 'VALIDATING',
  GEOCODING = 'GEOCODING',
  MATRIX_FETCH = 'MATRIX_FETCH',
  SOLVING = 'SOLVING',
  METRICS_ASSEMBLY = 'METRICS_ASSEMBLY',
  DONE = 'DONE',
  FAILED = 'FAILED'
}

/**
 * A stop as submitted: coordinates, an address, or both
 */
export interface StopInput {
  latitude?: number;
  longitude?: number;
  address?: string;
}

export interface OptimizationRequest {
  stops: StopInput[];
  depotIndex: number;
}

/**
 * A stop once every coordinate is known
 */
export interface ResolvedStop {
  latitude: number;
  longitude: number;
  address?: string;
  /** Set when the coordinates came from geocoding */
  originalAddress?: string;
  geocoded: boolean;
  geocodingConfidence?: number;
}

/**
 * Totals along a route. null when some leg of the route has no road
 * connection in the matrix.
 */
export interface RouteMetrics {
  totalDistanceMeters: number | null;
  totalTimeSeconds: number | null;
}

export interface Savings {
  saved: number;
  percentage: number;
}

export interface OptimizationOutcome {
  /** Stops in visiting order, depot repeated at the end */
  route: ResolvedStop[];
  routeIndices: number[];
  optimizedMetrics: RouteMetrics;
  baselineMetrics: RouteMetrics;
  distanceSavings: Savings;
  timeSavings: Savings;
  routeGeometry: RouteGeometry | null;
}

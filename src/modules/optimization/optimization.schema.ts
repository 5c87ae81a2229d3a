/**
 * =============================================================================
 * OPTIMIZATION MODULE - SCHEMA
 * =============================================================================
 *
 * Wire contract for POST /api/v1/optimize (snake_case on the wire).
 *
 * The schema checks shape only: types, and that every stop carries either a
 * coordinate pair or an address. Stop counts, the depot range and coordinate
 * ranges are checked by the pipeline's validation stage, which attributes
 * each violation to its field.
 * =============================================================================
 */

import { z } from 'zod';
import type { RouteGeometry } from '../routing/routing.schema';
import type { OptimizationOutcome, OptimizationRequest, ResolvedStop } from './optimization.types';

// =============================================================================
// REQUEST SCHEMAS
// =============================================================================

const coordinateSchema = (label: string) =>
  z.number({ invalid_type_error: `${label} must be a number` }).finite(`${label} must be a finite number`).nullish();

export const stopSchema = z.object({
  latitude: coordinateSchema('Latitude'),
  longitude: coordinateSchema('Longitude'),
  address: z.string({ invalid_type_error: 'Address must be a string' })
    .max(500, 'Address cannot exceed 500 characters')
    .nullish()
}).refine(
  stop => (stop.latitude != null && stop.longitude != null) || (stop.address ?? '').trim().length > 0,
  { message: "Must provide either 'address' or both 'latitude' and 'longitude'" }
);

export const optimizeRequestSchema = z.object({
  stops: z.array(stopSchema, {
    required_error: 'Stops are required',
    invalid_type_error: 'Stops must be an array'
  }),
  depot_index: z.number({ invalid_type_error: 'Depot index must be a number' })
    .int('Depot index must be a whole number')
    .min(0, 'Depot index must be non-negative')
    .default(0)
});

export type OptimizeRequestBody = z.infer<typeof optimizeRequestSchema>;

// =============================================================================
// RESPONSE TYPES
// =============================================================================

export interface StopBody {
  latitude: number;
  longitude: number;
  address?: string;
  original_address?: string;
  geocoded: boolean;
  geocoding_confidence?: number;
}

export interface RouteMetricsBody {
  total_distance_meters: number | null;
  total_time_seconds: number | null;
}

export interface OptimizationResponseBody {
  optimized_route: StopBody[];
  optimized_route_indices: number[];
  optimized_metrics: RouteMetricsBody;
  baseline_metrics: RouteMetricsBody;
  distance_saved_meters: number;
  time_saved_seconds: number;
  distance_saved_percentage: number;
  time_saved_percentage: number;
  route_geometry: RouteGeometry | null;
}

// =============================================================================
// MAPPERS
// =============================================================================

export function toOptimizationRequest(body: OptimizeRequestBody): OptimizationRequest {
  return {
    stops: body.stops.map(stop => ({
      ...(stop.latitude != null && { latitude: stop.latitude }),
      ...(stop.longitude != null && { longitude: stop.longitude }),
      ...(stop.address != null && { address: stop.address })
    })),
    depotIndex: body.depot_index
  };
}

function toStopBody(stop: ResolvedStop): StopBody {
  return {
    latitude: stop.latitude,
    longitude: stop.longitude,
    ...(stop.address !== undefined && { address: stop.address }),
    ...(stop.originalAddress !== undefined && { original_address: stop.originalAddress }),
    geocoded: stop.geocoded,
    ...(stop.geocodingConfidence !== undefined && { geocoding_confidence: stop.geocodingConfidence })
  };
}

export function toOptimizationResponse(outcome: OptimizationOutcome): OptimizationResponseBody {
  return {
    optimized_route: outcome.route.map(toStopBody),
    optimized_route_indices: outcome.routeIndices,
    optimized_metrics: {
      total_distance_meters: outcome.optimizedMetrics.totalDistanceMeters,
      total_time_seconds: outcome.optimizedMetrics.totalTimeSeconds
    },
    baseline_metrics: {
      total_distance_meters: outcome.baselineMetrics.totalDistanceMeters,
      total_time_seconds: outcome.baselineMetrics.totalTimeSeconds
    },
    distance_saved_meters: outcome.distanceSavings.saved,
    time_saved_seconds: outcome.timeSavings.saved,
    distance_saved_percentage: outcome.distanceSavings.percentage,
    time_saved_percentage: outcome.timeSavings.percentage,
    route_geometry: outcome.routeGeometry
  };
}

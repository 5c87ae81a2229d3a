/**
 * =============================================================================
 * ROUTING MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * Response shapes of the OSRM-compatible routing service.
 *
 * KEY CONCEPTS:
 * - CostMatrices: all-pairs distances (meters) and durations (seconds),
 *   indexed in the same order as the requested points
 * - RouteGeometry: road-following path for an ordered list of points
 *
 * Unreachable pairs come back as `null` cells and are carried as Infinity.
 * =============================================================================
 */

import { z } from 'zod';

export type Matrix = number[][];

export interface CostMatrices {
  /** meters */
  distances: Matrix;
  /** seconds */
  durations: Matrix;
}

/** GeoJSON LineString, coordinates in [longitude, latitude] order */
export interface RouteGeometry {
  type: 'LineString';
  coordinates: Array<[number, number]>;
  distanceMeters?: number;
  durationSeconds?: number;
}

export interface RoutePoint {
  latitude: number;
  longitude: number;
}

// =============================================================================
// RESPONSE SCHEMAS
// =============================================================================

/** Every response carries a status code; anything but "Ok" is an error */
export const osrmEnvelopeSchema = z.object({
  code: z.string(),
  message: z.string().optional(),
});

const matrixSchema = z.array(z.array(z.number().nullable()));

export const osrmTableResponseSchema = z.object({
  code: z.literal('Ok'),
  distances: matrixSchema.optional(),
  durations: matrixSchema.optional(),
});

export const osrmRouteResponseSchema = z.object({
  code: z.literal('Ok'),
  routes: z.array(
    z.object({
      distance: z.number().optional(),
      duration: z.number().optional(),
      geometry: z.object({
        type: z.literal('LineString'),
        coordinates: z.array(z.tuple([z.number(), z.number()])),
      }),
    })
  ),
});


/**
 * =============================================================================
 * OPTIMIZATION SERVICE - Request Pipeline
 * =============================================================================
 *
 * One request, one pass through:
 *
 *   VALIDATING → GEOCODING → MATRIX_FETCH → SOLVING → METRICS_ASSEMBLY → DONE
 *        └────────────┴────────────┴───────────┴──────────────┴──→ FAILED
 *
 * STAGES:
 * ─────────────────────────────────────────────────────────────────────────────
 * VALIDATING        stop count, depot range, coordinate ranges; no I/O
 * GEOCODING         every stop without coordinates, concurrently; all
 *                   failures collected before reporting
 * MATRIX_FETCH      one distance/duration matrix for all stops
 * SOLVING           single vehicle from the chosen depot, baseline as hint
 * METRICS_ASSEMBLY  baseline, savings, best-effort route geometry
 *
 * Retries live in the clients that own the flaky calls. This service never
 * re-runs a stage; it maps component errors onto AppError kinds and stops.
 * =============================================================================
 */

import { config } from '../../config/environment';
import {
  AppError,
  ErrorCode,
  ErrorDetail,
  GeocodingFailedError,
  InternalError,
  InvalidInputError,
  OPTIMIZATION_LIMITS,
  COORDINATE_BOUNDS,
  RoutingServiceTimeoutError,
  RoutingServiceUnavailableError,
  SolverFailedError,
  SolverNoSolutionError
} from '../../core';
import { logger } from '../../shared/services/logger.service';
import { metrics } from '../../shared/monitoring/metrics.service';
import { QueueFullError, QueueTimeoutError } from '../../shared/resilience/request-queue';
import { GeocodingResolver } from '../geocoding/geocoding.service';
import { CostMatrices, Matrix } from '../routing/routing.schema';
import { DistanceMatrixClient } from '../routing/routing.service';
import { RoutingClientError, RoutingTimeoutError } from '../routing/routing.types';
import { RouteSolverService } from '../solver/solver.service';
import { SolveOutcome, SolveResult } from '../solver/solver.types';
import {
  OptimizationOutcome,
  OptimizationRequest,
  PipelineStage,
  ResolvedStop,
  RouteMetrics,
  Savings,
  StopInput
} from './optimization.types';

export interface OptimizationServiceOptions {
  solverTimeLimitMs: number;
}

type KnownCoordinates = StopInput & { latitude: number; longitude: number };

function hasCoordinates(stop: StopInput): stop is KnownCoordinates {
  return stop.latitude !== undefined && stop.longitude !== undefined;
}

function needsGeocoding(stop: StopInput): boolean {
  return !hasCoordinates(stop) && stop.address !== undefined;
}

// =============================================================================
// MAIN SERVICE CLASS
// =============================================================================

export class OptimizationService {
  constructor(
    private readonly geocoder: GeocodingResolver,
    private readonly matrixClient: DistanceMatrixClient,
    private readonly solver: RouteSolverService,
    private readonly options: OptimizationServiceOptions
  ) {}

  async optimize(request: OptimizationRequest): Promise<OptimizationOutcome> {
    const pipeline = new PipelineRun(request.stops.length);

    try {
      pipeline.enter(PipelineStage.VALIDATING);
      this.validate(request);

      pipeline.enter(PipelineStage.GEOCODING);
      const stops = await this.geocode(request.stops);

      pipeline.enter(PipelineStage.MATRIX_FETCH);
      const matrices = await this.fetchMatrix(stops);

      const baselineRoute = buildBaselineRoute(stops.length, request.depotIndex);

      pipeline.enter(PipelineStage.SOLVING);
      const solved = await this.solve(matrices.distances, request.depotIndex, baselineRoute);

      pipeline.enter(PipelineStage.METRICS_ASSEMBLY);
      const outcome = await this.assemble(stops, matrices, solved, baselineRoute);

      pipeline.enter(PipelineStage.DONE);
      metrics.incrementCounter('optimizations_total', { outcome: 'success' });
      logger.info('Optimization complete', {
        stops: stops.length,
        distanceSavedMeters: Math.round(outcome.distanceSavings.saved),
        distanceSavedPercentage: Number(outcome.distanceSavings.percentage.toFixed(1)),
        timeSavedSeconds: Math.round(outcome.timeSavings.saved),
        timeSavedPercentage: Number(outcome.timeSavings.percentage.toFixed(1)),
        totalTimeMs: pipeline.elapsedMs()
      });
      return outcome;
    } catch (error) {
      const appError = error instanceof AppError ? error : unexpected(error);
      pipeline.fail(appError);
      metrics.incrementCounter('optimizations_total', { outcome: appError.kind.toLowerCase() });
      throw appError;
    }
  }

  // ===========================================================================
  // STAGES
  // ===========================================================================

  private validate(request: OptimizationRequest): void {
    const { stops, depotIndex } = request;
    const count = stops.length;

    if (count < OPTIMIZATION_LIMITS.MIN_STOPS) {
      throw new InvalidInputError(
        `At least ${OPTIMIZATION_LIMITS.MIN_STOPS} stops are required, got ${count}`,
        ErrorCode.INSUFFICIENT_STOPS,
        [{ field: 'stops', message: `Received ${count} stops, minimum is ${OPTIMIZATION_LIMITS.MIN_STOPS}`, value: count }]
      );
    }

    if (count > OPTIMIZATION_LIMITS.MAX_STOPS) {
      throw new InvalidInputError(
        `Too many stops: ${count} provided, maximum is ${OPTIMIZATION_LIMITS.MAX_STOPS}`,
        ErrorCode.TOO_MANY_STOPS,
        [{ field: 'stops', message: `Received ${count} stops, but maximum allowed is ${OPTIMIZATION_LIMITS.MAX_STOPS}`, value: count }]
      );
    }

    if (!Number.isInteger(depotIndex) || depotIndex < 0 || depotIndex >= count) {
      throw new InvalidInputError(
        `Depot index ${depotIndex} is out of bounds for ${count} stops`,
        ErrorCode.INVALID_DEPOT_INDEX,
        [{
          field: 'depot_index',
          message: `Index ${depotIndex} is invalid for ${count} stops (valid range: 0-${count - 1})`,
          value: depotIndex
        }]
      );
    }

    // Any coordinate present is range-checked, even on a stop that will be geocoded
    stops.forEach((stop, i) => {
      const { LATITUDE, LONGITUDE } = COORDINATE_BOUNDS;
      if (stop.latitude !== undefined && !(stop.latitude >= LATITUDE.min && stop.latitude <= LATITUDE.max)) {
        throw new InvalidInputError(
          `Invalid latitude at stop ${i}: ${stop.latitude}`,
          ErrorCode.INVALID_COORDINATES,
          [{ field: `stops[${i}].latitude`, message: 'Latitude must be between -90 and 90', value: stop.latitude }]
        );
      }
      if (stop.longitude !== undefined && !(stop.longitude >= LONGITUDE.min && stop.longitude <= LONGITUDE.max)) {
        throw new InvalidInputError(
          `Invalid longitude at stop ${i}: ${stop.longitude}`,
          ErrorCode.INVALID_COORDINATES,
          [{ field: `stops[${i}].longitude`, message: 'Longitude must be between -180 and 180', value: stop.longitude }]
        );
      }
    });
  }

  private async geocode(input: StopInput[]): Promise<ResolvedStop[]> {
    const pending = input
      .map((stop, index) => ({ stop, index }))
      .filter(({ stop }) => needsGeocoding(stop));

    const resolved = new Map<number, ResolvedStop>();

    if (pending.length > 0) {
      logger.info(`Geocoding ${pending.length} addresses`);
      const settled = await this.geocoder.resolveBatchSettled(pending.map(({ stop }) => stop.address ?? ''));

      const failures: ErrorDetail[] = [];
      settled.forEach((result, k) => {
        const { stop, index } = pending[k];
        if (!result.ok) {
          logger.warn(`Failed to geocode stop ${index}`, { address: stop.address, error: result.error.message });
          failures.push({ field: `stops[${index}].address`, message: result.error.message, value: stop.address });
          return;
        }
        resolved.set(index, {
          latitude: result.value.latitude,
          longitude: result.value.longitude,
          address: stop.address,
          originalAddress: stop.address,
          geocoded: true,
          ...(result.value.confidence !== undefined && { geocodingConfidence: result.value.confidence })
        });
      });

      if (failures.length > 0) {
        throw new GeocodingFailedError(`Failed to geocode ${failures.length} address(es)`, failures);
      }
    }

    return input.map((stop, i) => {
      const geocoded = resolved.get(i);
      if (geocoded) return geocoded;
      if (!hasCoordinates(stop)) {
        throw new InvalidInputError(
          `Stop ${i} is missing coordinates after geocoding`,
          ErrorCode.INVALID_INPUT,
          [{ field: `stops[${i}]`, message: 'Location must have coordinates', value: stop }]
        );
      }
      return {
        latitude: stop.latitude,
        longitude: stop.longitude,
        ...(stop.address !== undefined && { address: stop.address }),
        geocoded: false
      };
    });
  }

  private async fetchMatrix(stops: ResolvedStop[]): Promise<CostMatrices> {
    try {
      return await this.matrixClient.computeMatrix(stops);
    } catch (error) {
      if (error instanceof RoutingTimeoutError) {
        throw new RoutingServiceTimeoutError(
          `Routing service request timed out after ${error.timeoutMs}ms`,
          [{ field: 'routing_timeout', message: `Timeout: ${error.timeoutMs}ms`, value: error.timeoutMs }]
        );
      }
      if (error instanceof RoutingClientError) {
        logger.error('Routing service error', { error: error.message });
        throw new RoutingServiceUnavailableError('Unable to calculate route distances', [
          { field: 'routing_service', message: error.message }
        ]);
      }
      throw error;
    }
  }

  private async solve(distances: Matrix, depotIndex: number, baselineRoute: number[]): Promise<SolveResult> {
    const timeLimitMs = this.options.solverTimeLimitMs;
    let outcome: SolveOutcome;
    try {
      outcome = await this.solver.solve(
        distances,
        OPTIMIZATION_LIMITS.VEHICLE_COUNT,
        depotIndex,
        timeLimitMs,
        { initialRoute: baselineRoute }
      );
    } catch (error) {
      if (error instanceof QueueFullError || error instanceof QueueTimeoutError) {
        throw new SolverFailedError(error.message, ErrorCode.SOLVER_BUSY);
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Route solver error', { error: message });
      throw new SolverFailedError('Optimization solver encountered an unexpected error');
    }

    if (outcome.status === 'NO_SOLUTION') {
      throw new SolverNoSolutionError(`Unable to find a route within the ${timeLimitMs}ms time limit`, [
        { field: 'solver_timeout', message: `Time limit: ${timeLimitMs}ms`, value: timeLimitMs }
      ]);
    }
    return outcome.result;
  }

  private async assemble(
    stops: ResolvedStop[],
    matrices: CostMatrices,
    solved: SolveResult,
    baselineRoute: number[]
  ): Promise<OptimizationOutcome> {
    const optimizedTime = calculateRouteTotal(solved.route, matrices.durations);
    const baselineDistance = calculateRouteTotal(baselineRoute, matrices.distances);
    const baselineTime = calculateRouteTotal(baselineRoute, matrices.durations);

    const optimizedMetrics: RouteMetrics = {
      totalDistanceMeters: solved.totalCost,
      totalTimeSeconds: reachableTotal(optimizedTime)
    };
    const baselineMetrics: RouteMetrics = {
      totalDistanceMeters: reachableTotal(baselineDistance),
      totalTimeSeconds: reachableTotal(baselineTime)
    };

    const route = solved.route.map(index => stops[index]);
    const routeGeometry = await this.matrixClient.computeRouteGeometry(route);

    return {
      route,
      routeIndices: solved.route,
      optimizedMetrics,
      baselineMetrics,
      distanceSavings: calculateSavings(baselineDistance, solved.totalCost),
      timeSavings: calculateSavings(baselineTime, optimizedTime),
      routeGeometry
    };
  }
}

// =============================================================================
// PIPELINE BOOKKEEPING
// =============================================================================

class PipelineRun {
  private stage: PipelineStage | null = null;
  private stopTimer: (() => number) | null = null;
  private readonly startedAt = Date.now();

  constructor(private readonly stopCount: number) {}

  enter(stage: PipelineStage): void {
    this.finishStage();
    this.stage = stage;
    if (stage !== PipelineStage.DONE) {
      this.stopTimer = metrics.startTimer('pipeline_stage_duration_ms', { stage: stage.toLowerCase() });
    }
    logger.debug('Optimization stage', { stage, stops: this.stopCount });
  }

  fail(error: AppError): void {
    const failedStage = this.stage;
    this.finishStage();
    this.stage = PipelineStage.FAILED;
    logger.warn('Optimization failed', {
      stage: failedStage,
      kind: error.kind,
      code: error.code,
      message: error.message,
      totalTimeMs: this.elapsedMs()
    });
  }

  elapsedMs(): number {
    return Date.now() - this.startedAt;
  }

  private finishStage(): void {
    if (this.stopTimer && this.stage) {
      const elapsed = this.stopTimer();
      logger.debug('Optimization stage finished', { stage: this.stage, elapsedMs: Math.round(elapsed) });
    }
    this.stopTimer = null;
  }
}

function unexpected(error: unknown): InternalError {
  logger.error('Unexpected error during optimization', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined
  });
  return new InternalError('An unexpected error occurred while processing your request');
}

// =============================================================================
// ROUTE ARITHMETIC
// =============================================================================

/**
 * Input-order tour from the chosen depot: depot, the other stops as
 * submitted, depot again
 */
export function buildBaselineRoute(stopCount: number, depotIndex: number): number[] {
  const others: number[] = [];
  for (let i = 0; i < stopCount; i++) {
    if (i !== depotIndex) others.push(i);
  }
  return [depotIndex, ...others, depotIndex];
}

/** Sum of consecutive arcs along the route */
export function calculateRouteTotal(route: number[], matrix: Matrix): number {
  let total = 0;
  for (let i = 0; i < route.length - 1; i++) {
    total += matrix[route[i]][route[i + 1]];
  }
  return total;
}

/** A total over a leg with no road route is reported as null */
export function reachableTotal(total: number): number | null {
  return Number.isFinite(total) ? total : null;
}

/**
 * Percentage is 0 when the baseline is 0. An unreachable baseline
 * (infinite total) reports no savings.
 */
export function calculateSavings(baseline: number, optimized: number): Savings {
  if (!Number.isFinite(baseline) || !Number.isFinite(optimized)) {
    return { saved: 0, percentage: 0 };
  }
  const saved = baseline - optimized;
  const percentage = baseline > 0 ? (saved / baseline) * 100 : 0;
  return { saved, percentage };
}

// =============================================================================
// DEFAULT INSTANCE
// =============================================================================

export function createOptimizationService(
  geocoder: GeocodingResolver,
  matrixClient: DistanceMatrixClient,
  solver: RouteSolverService
): OptimizationService {
  return new OptimizationService(geocoder, matrixClient, solver, {
    solverTimeLimitMs: config.solver.timeLimitMs
  });
}

/**
 * =============================================================================
 * SOLVER SERVICE - Route-Solver Adapter
 * =============================================================================
 *
 * Builds the engine's index space from the 0-based stop space, registers an
 * integer cost callback, runs the search with a wall-clock budget and reads
 * the tour back as stop indices.
 *
 * - Costs are truncated to integers at the callback boundary
 * - The reported cost is the engine's objective, not recomputed
 * - Solves run inside a bounded queue so a burst of large requests cannot
 *   starve the event loop
 * =============================================================================
 */

import { config } from '../../config/environment';
import { logger } from '../../shared/services/logger.service';
import { QueueStats, RequestQueue } from '../../shared/resilience/request-queue';
import { Matrix } from '../routing/routing.schema';
import { RoutingIndexManager, RoutingModel } from './routing-engine';
import {
  FirstSolutionStrategy,
  SolveOptions,
  SolveOutcome,
  SolverInputError,
} from './solver.types';

export class RouteSolverService {
  constructor(
    private readonly queue: RequestQueue,
    private readonly strategy: FirstSolutionStrategy = 'CHEAPEST_INSERTION'
  ) {}

  /**
   * @throws SolverInputError malformed matrix, vehicle count other than 1, bad depot
   * @throws QueueFullError / QueueTimeoutError when the solver is saturated
   */
  async solve(
    matrix: Matrix,
    vehicleCount: number,
    depotIndex: number,
    timeLimitMs: number,
    options: SolveOptions = {}
  ): Promise<SolveOutcome> {
    validateProblem(matrix, vehicleCount, depotIndex);
    return this.queue.run(() => this.search(matrix, depotIndex, timeLimitMs, options));
  }

  getQueueStats(): QueueStats {
    return this.queue.getStats();
  }

  private async search(
    matrix: Matrix,
    depotIndex: number,
    timeLimitMs: number,
    options: SolveOptions
  ): Promise<SolveOutcome> {
    const startTime = Date.now();
    const manager = new RoutingIndexManager(matrix.length, 1, depotIndex);
    const model = new RoutingModel(manager);

    const transitIndex = model.registerTransitCallback((fromIndex, toIndex) => {
      const from = manager.indexToNode(fromIndex);
      const to = manager.indexToNode(toIndex);
      return Math.trunc(matrix[from][to]);
    });
    model.setArcCostEvaluatorOfAllVehicles(transitIndex);

    const assignment = await model.solveWithParameters({
      firstSolutionStrategy: this.strategy,
      timeLimitMs,
      initialRoute: options.initialRoute,
    });

    if (!assignment) {
      logger.warn('Solver found no feasible route', {
        stops: matrix.length,
        solveTimeMs: Date.now() - startTime,
      });
      return { status: 'NO_SOLUTION' };
    }

    const route: number[] = [];
    let index = model.start(0);
    while (!model.isEnd(index)) {
      route.push(manager.indexToNode(index));
      index = assignment.next(index);
    }
    route.push(manager.indexToNode(index));

    const totalCost = assignment.objectiveValue();
    logger.info('Solver found route', {
      stops: matrix.length,
      totalCost,
      solveTimeMs: Date.now() - startTime,
    });
    return { status: 'SOLVED', result: { route, totalCost } };
  }
}

function validateProblem(matrix: Matrix, vehicleCount: number, depotIndex: number): void {
  const n = matrix.length;
  if (n === 0) {
    throw new SolverInputError('Cost matrix is empty');
  }
  if (matrix.some(row => row.length !== n)) {
    throw new SolverInputError(`Cost matrix must be square, got ${n} rows of uneven length`);
  }
  if (vehicleCount !== 1) {
    throw new SolverInputError(`Only a single vehicle is supported, got ${vehicleCount}`);
  }
  if (!Number.isInteger(depotIndex) || depotIndex < 0 || depotIndex >= n) {
    throw new SolverInputError(`Depot index ${depotIndex} is out of range for ${n} stops`);
  }
}

// =============================================================================
// DEFAULT INSTANCE
// =============================================================================

export function createRouteSolverService(): RouteSolverService {
  const queue = new RequestQueue({
    name: 'solver',
    maxConcurrent: config.solver.maxConcurrent,
    maxQueueSize: config.solver.maxQueueSize,
    queueTimeout: config.solver.queueTimeoutMs,
  });
  return new RouteSolverService(queue);
}

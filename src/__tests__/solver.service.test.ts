/**
 * =============================================================================
 * ROUTE SOLVER SERVICE - Unit Tests
 * =============================================================================
 */

import { RouteSolverService } from '../modules/solver/solver.service';
import { SolverInputError } from '../modules/solver/solver.types';
import { QueueFullError, RequestQueue } from '../shared/resilience/request-queue';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

function createSolver(queueOptions: { maxConcurrent?: number; maxQueueSize?: number } = {}) {
  return new RouteSolverService(new RequestQueue({ name: 'solver_test', ...queueOptions }));
}

/** Points on a line at the given offsets (meters), symmetric distances */
function lineMatrix(offsets: number[]): number[][] {
  return offsets.map(a => offsets.map(b => Math.abs(a - b)));
}

describe('RouteSolverService', () => {
  it('solves the two-stop round trip', async () => {
    const outcome = await createSolver().solve([[0, 2000], [2000, 0]], 1, 0, 1000);

    expect(outcome).toEqual({ status: 'SOLVED', result: { route: [0, 1, 0], totalCost: 4000 } });
  });

  it('truncates fractional costs before summing', async () => {
    const outcome = await createSolver().solve([[0, 10.9], [10.4, 0]], 1, 0, 1000);

    expect(outcome).toEqual({ status: 'SOLVED', result: { route: [0, 1, 0], totalCost: 20 } });
  });

  it('returns a closed tour from the depot that visits every stop once', async () => {
    const matrix = lineMatrix([0, 700, 150, 900, 300, 520]);

    const outcome = await createSolver().solve(matrix, 1, 3, 1000);

    if (outcome.status !== 'SOLVED') throw new Error(`expected a solution, got ${outcome.status}`);
    const { route, totalCost } = outcome.result;
    expect(route).toHaveLength(7);
    expect(route[0]).toBe(3);
    expect(route[6]).toBe(3);
    expect([...route.slice(1, -1)].sort((a, b) => a - b)).toEqual([0, 1, 2, 4, 5]);
    // Out to one end of the line and back
    expect(totalCost).toBe(1800);
  });

  it('never does worse than the hint it is given', async () => {
    const matrix = lineMatrix([0, 700, 150, 900, 300]);
    const hint = [0, 1, 2, 3, 4, 0];

    const outcome = await createSolver().solve(matrix, 1, 0, 1000, { initialRoute: hint });

    if (outcome.status !== 'SOLVED') throw new Error(`expected a solution, got ${outcome.status}`);
    expect(outcome.result.totalCost).toBeLessThanOrEqual(700 + 550 + 750 + 600 + 300);
    expect(outcome.result.totalCost).toBe(1800);
  });

  it('reports no solution when the depot cannot be left', async () => {
    const outcome = await createSolver().solve([[0, Infinity], [5, 0]], 1, 0, 100);

    expect(outcome).toEqual({ status: 'NO_SOLUTION' });
  });

  describe('input validation', () => {
    const solver = createSolver();

    it('rejects more than one vehicle', async () => {
      await expect(solver.solve([[0, 1], [1, 0]], 2, 0, 100)).rejects.toThrow(
        new SolverInputError('Only a single vehicle is supported, got 2')
      );
    });

    it('rejects a non-square matrix', async () => {
      await expect(solver.solve([[0, 1], [1]], 1, 0, 100)).rejects.toBeInstanceOf(SolverInputError);
    });

    it('rejects an empty matrix', async () => {
      await expect(solver.solve([], 1, 0, 100)).rejects.toThrow(new SolverInputError('Cost matrix is empty'));
    });

    it('rejects a depot outside the matrix', async () => {
      await expect(solver.solve([[0, 1], [1, 0]], 1, 2, 100)).rejects.toThrow(
        new SolverInputError('Depot index 2 is out of range for 2 stops')
      );
    });
  });

  it('rejects work beyond the queue capacity', async () => {
    const solver = createSolver({ maxConcurrent: 1, maxQueueSize: 0 });
    const matrix = [[0, 1], [1, 0]];

    const first = solver.solve(matrix, 1, 0, 100);
    const second = solver.solve(matrix, 1, 0, 100);

    await expect(second).rejects.toBeInstanceOf(QueueFullError);
    await expect(first).resolves.toMatchObject({ status: 'SOLVED' });
    expect(solver.getQueueStats()).toMatchObject({ name: 'solver_test', activeCount: 0, queueSize: 0 });
  });
});

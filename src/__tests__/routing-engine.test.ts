/**
 * =============================================================================
 * ROUTING ENGINE - Unit Tests
 * =============================================================================
 *
 * - Index token layout (nodes, start, end)
 * - Both construction strategies on a small square
 * - Asymmetric costs, forbidden arcs, hint validation
 * =============================================================================
 */

import { Assignment, RoutingIndexManager, RoutingModel } from '../modules/solver/routing-engine';
import { FirstSolutionStrategy } from '../modules/solver/solver.types';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

// Corners of a 10x10 square, visited 0 → 1 → 2 → 3 clockwise; diagonals cost 14
const square = [
  [0, 10, 14, 10],
  [10, 0, 10, 14],
  [14, 10, 0, 10],
  [10, 14, 10, 0],
];

function buildModel(matrix: number[][], depot = 0) {
  const manager = new RoutingIndexManager(matrix.length, 1, depot);
  const model = new RoutingModel(manager);
  const transit = model.registerTransitCallback(
    (from, to) => matrix[manager.indexToNode(from)][manager.indexToNode(to)]
  );
  model.setArcCostEvaluatorOfAllVehicles(transit);
  return { manager, model };
}

function readRoute(manager: RoutingIndexManager, model: RoutingModel, assignment: Assignment): number[] {
  const route: number[] = [];
  let index = model.start(0);
  while (!model.isEnd(index)) {
    route.push(manager.indexToNode(index));
    index = assignment.next(index);
  }
  route.push(manager.indexToNode(index));
  return route;
}

async function solve(
  matrix: number[][],
  options: { depot?: number; strategy?: FirstSolutionStrategy; initialRoute?: number[]; timeLimitMs?: number } = {}
) {
  const { manager, model } = buildModel(matrix, options.depot);
  const assignment = await model.solveWithParameters({
    firstSolutionStrategy: options.strategy ?? 'CHEAPEST_INSERTION',
    timeLimitMs: options.timeLimitMs ?? 1000,
    initialRoute: options.initialRoute,
  });
  return assignment ? { route: readRoute(manager, model, assignment), cost: assignment.objectiveValue() } : null;
}

describe('RoutingIndexManager', () => {
  const manager = new RoutingIndexManager(4, 1, 2);

  it('numbers non-depot nodes first, then the start and end tokens', () => {
    expect(manager.tokenCount).toBe(5);
    expect([0, 1, 2].map(i => manager.indexToNode(i))).toEqual([0, 1, 3]);
    expect(manager.startIndex(0)).toBe(3);
    expect(manager.endIndex(0)).toBe(4);
    expect(manager.indexToNode(3)).toBe(2);
    expect(manager.indexToNode(4)).toBe(2);
  });

  it('maps the depot node to the start token', () => {
    expect(manager.nodeToIndex(2)).toBe(3);
    expect(manager.nodeToIndex(3)).toBe(2);
  });

  it('rejects unknown tokens and vehicles', () => {
    expect(() => manager.indexToNode(5)).toThrow(new RangeError('Unknown index token 5'));
    expect(() => manager.startIndex(1)).toThrow(new RangeError('Unknown vehicle 1'));
  });

  it('rejects a depot outside the node range', () => {
    expect(() => new RoutingIndexManager(3, 1, 3)).toThrow(
      new RangeError('Depot 3 is not a node of a 3-node problem')
    );
  });
});

describe('RoutingModel.solveWithParameters', () => {
  it('builds the clockwise-reversed tour with cheapest insertion', async () => {
    await expect(solve(square)).resolves.toEqual({ route: [0, 3, 2, 1, 0], cost: 40 });
  });

  it('follows the nearest neighbour with path cheapest arc', async () => {
    await expect(solve(square, { strategy: 'PATH_CHEAPEST_ARC' })).resolves.toEqual({
      route: [0, 1, 2, 3, 0],
      cost: 40,
    });
  });

  it('starts and ends at a depot other than node 0', async () => {
    const result = await solve(square, { depot: 2 });

    expect(result?.route[0]).toBe(2);
    expect(result?.route[result.route.length - 1]).toBe(2);
    expect(result?.route.slice(1, -1).sort()).toEqual([0, 1, 3]);
    expect(result?.cost).toBe(40);
  });

  it('respects arc direction for asymmetric costs', async () => {
    const oneWay = [
      [0, 1, 100],
      [100, 0, 1],
      [1, 100, 0],
    ];

    await expect(solve(oneWay)).resolves.toEqual({ route: [0, 1, 2, 0], cost: 3 });
  });

  it('keeps the constructed tour when the hint costs more', async () => {
    // Crossing tour 0 → 2 → 1 → 3 → 0 costs 48
    const result = await solve(square, { strategy: 'PATH_CHEAPEST_ARC', initialRoute: [0, 2, 1, 3, 0] });

    expect(result).toEqual({ route: [0, 1, 2, 3, 0], cost: 40 });
  });

  it('starts from a hint that beats the constructed tour', async () => {
    // Nearest neighbour from 0 takes the 1-cost arc to 1 and is then forced
    // through two 50-cost arcs; the hint avoids both
    const trap = [
      [0, 1, 2, 50],
      [1, 0, 50, 50],
      [2, 50, 0, 2],
      [50, 2, 2, 0],
    ];

    const result = await solve(trap, { strategy: 'PATH_CHEAPEST_ARC', initialRoute: [0, 2, 3, 1, 0], timeLimitMs: 0 });

    expect(result).toEqual({ route: [0, 2, 3, 1, 0], cost: 7 });
  });

  it('returns a complete tour even with no search time', async () => {
    const result = await solve(square, { timeLimitMs: 0 });

    expect(result?.route).toHaveLength(5);
    expect(result?.route.slice(1, -1).sort()).toEqual([1, 2, 3]);
  });

  it('routes around forbidden arcs when a feasible tour exists', async () => {
    const matrix = [
      [0, 5, Infinity],
      [Infinity, 0, 5],
      [5, Infinity, 0],
    ];

    await expect(solve(matrix)).resolves.toEqual({ route: [0, 1, 2, 0], cost: 15 });
  });

  it('resolves to null when every tour needs a forbidden arc', async () => {
    await expect(solve([[0, Infinity], [5, 0]])).resolves.toBeNull();
  });

  it('rejects a hint that does not visit every node once', async () => {
    await expect(solve(square, { initialRoute: [0, 1, 1, 3, 0] })).rejects.toThrow(
      new RangeError('Initial route must start and end at the depot and visit every other node once')
    );
  });

  it('requires an arc cost evaluator', async () => {
    const model = new RoutingModel(new RoutingIndexManager(2, 1, 0));

    await expect(
      model.solveWithParameters({ firstSolutionStrategy: 'CHEAPEST_INSERTION', timeLimitMs: 10 })
    ).rejects.toThrow('No arc cost evaluator set');
  });

  it('supports a single vehicle only', async () => {
    const manager = new RoutingIndexManager(3, 2, 0);
    const model = new RoutingModel(manager);
    model.setArcCostEvaluatorOfAllVehicles(model.registerTransitCallback(() => 1));

    await expect(
      model.solveWithParameters({ firstSolutionStrategy: 'CHEAPEST_INSERTION', timeLimitMs: 10 })
    ).rejects.toThrow(new RangeError('Only single-vehicle routing is supported'));
  });
});

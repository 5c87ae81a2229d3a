/**
 * =============================================================================
 * ROUTING ENGINE - Single-Vehicle Tour Search
 * =============================================================================
 *
 * Index-manager / model / assignment API in the shape constraint-routing
 * libraries expose, solved in-process.
 *
 * INDEX TOKENS:
 * ─────────────────────────────────────────────────────────────────────────────
 *   0 .. n-2          non-depot nodes, in node order
 *   n-1 .. n-2+V      start token of each vehicle (maps to the depot)
 *   n-1+V .. n-2+2V   end token of each vehicle (maps to the depot)
 *
 * SEARCH:
 * ─────────────────────────────────────────────────────────────────────────────
 *   1. First solution: CHEAPEST_INSERTION or PATH_CHEAPEST_ARC
 *   2. Optional hint route, kept when strictly cheaper
 *   3. Local search: 2-opt, then single-node relocate, first improvement,
 *      until a local optimum or the deadline
 *
 * Arcs whose cost is not finite are forbidden. They are priced above any
 * feasible tour during search; a final tour that still uses one is
 * reported as no solution.
 * =============================================================================
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { logger } from '../../shared/services/logger.service';
import { FirstSolutionStrategy } from './solver.types';

export type TransitCallback = (fromIndex: number, toIndex: number) => number;

export interface SearchParameters {
  firstSolutionStrategy: FirstSolutionStrategy;
  timeLimitMs: number;
  /** Node sequence starting and ending at the depot */
  initialRoute?: number[];
}

const IMPROVEMENT_EPSILON = 1e-9;

// =============================================================================
// INDEX MANAGER
// =============================================================================

export class RoutingIndexManager {
  readonly depot: number;
  private readonly tokenToNode: number[];
  private readonly nodeToToken: Map<number, number>;

  constructor(
    readonly nodeCount: number,
    readonly vehicleCount: number,
    depot: number
  ) {
    if (!Number.isInteger(nodeCount) || nodeCount < 1) {
      throw new RangeError(`Node count must be a positive integer, got ${nodeCount}`);
    }
    if (!Number.isInteger(vehicleCount) || vehicleCount < 1) {
      throw new RangeError(`Vehicle count must be a positive integer, got ${vehicleCount}`);
    }
    if (!Number.isInteger(depot) || depot < 0 || depot >= nodeCount) {
      throw new RangeError(`Depot ${depot} is not a node of a ${nodeCount}-node problem`);
    }

    this.depot = depot;
    this.tokenToNode = [];
    this.nodeToToken = new Map();

    for (let node = 0; node < nodeCount; node++) {
      if (node === depot) continue;
      this.nodeToToken.set(node, this.tokenToNode.length);
      this.tokenToNode.push(node);
    }
    // Start tokens, then end tokens
    for (let i = 0; i < vehicleCount * 2; i++) {
      this.tokenToNode.push(depot);
    }
  }

  get tokenCount(): number {
    return this.tokenToNode.length;
  }

  startIndex(vehicle: number): number {
    this.assertVehicle(vehicle);
    return this.nodeCount - 1 + vehicle;
  }

  endIndex(vehicle: number): number {
    this.assertVehicle(vehicle);
    return this.nodeCount - 1 + this.vehicleCount + vehicle;
  }

  indexToNode(index: number): number {
    const node = this.tokenToNode[index];
    if (node === undefined) {
      throw new RangeError(`Unknown index token ${index}`);
    }
    return node;
  }

  /** The depot resolves to the first vehicle's start token */
  nodeToIndex(node: number): number {
    if (node === this.depot) {
      return this.startIndex(0);
    }
    const token = this.nodeToToken.get(node);
    if (token === undefined) {
      throw new RangeError(`Unknown node ${node}`);
    }
    return token;
  }

  private assertVehicle(vehicle: number): void {
    if (!Number.isInteger(vehicle) || vehicle < 0 || vehicle >= this.vehicleCount) {
      throw new RangeError(`Unknown vehicle ${vehicle}`);
    }
  }
}

// =============================================================================
// ASSIGNMENT
// =============================================================================

export class Assignment {
  constructor(
    private readonly successors: ReadonlyMap<number, number>,
    private readonly objective: number
  ) {}

  /** Successor token; end tokens have none */
  next(index: number): number {
    const successor = this.successors.get(index);
    if (successor === undefined) {
      throw new RangeError(`Index ${index} has no successor`);
    }
    return successor;
  }

  objectiveValue(): number {
    return this.objective;
  }
}

// =============================================================================
// MODEL
// =============================================================================

export class RoutingModel {
  private readonly callbacks: TransitCallback[] = [];
  private arcCostCallback: TransitCallback | null = null;

  constructor(private readonly manager: RoutingIndexManager) {}

  registerTransitCallback(callback: TransitCallback): number {
    this.callbacks.push(callback);
    return this.callbacks.length - 1;
  }

  setArcCostEvaluatorOfAllVehicles(callbackIndex: number): void {
    const callback = this.callbacks[callbackIndex];
    if (!callback) {
      throw new RangeError(`Unknown transit callback ${callbackIndex}`);
    }
    this.arcCostCallback = callback;
  }

  start(vehicle: number): number {
    return this.manager.startIndex(vehicle);
  }

  end(vehicle: number): number {
    return this.manager.endIndex(vehicle);
  }

  isEnd(index: number): boolean {
    const firstEnd = this.manager.endIndex(0);
    return index >= firstEnd && index < firstEnd + this.manager.vehicleCount;
  }

  /**
   * Search for the cheapest tour found before the deadline.
   * Resolves to null when every tour found uses a forbidden arc.
   */
  async solveWithParameters(parameters: SearchParameters): Promise<Assignment | null> {
    if (!this.arcCostCallback) {
      throw new Error('No arc cost evaluator set');
    }
    if (this.manager.vehicleCount !== 1) {
      throw new RangeError('Only single-vehicle routing is supported');
    }

    const deadline = Date.now() + Math.max(0, parameters.timeLimitMs);
    const costs = this.buildNodeCosts(this.arcCostCallback);
    const search = new TourSearch(costs, this.manager.depot);

    let tour = search.construct(parameters.firstSolutionStrategy);
    if (parameters.initialRoute) {
      const hint = this.hintToTour(parameters.initialRoute);
      if (search.penalizedCost(hint) < search.penalizedCost(tour)) {
        tour = hint;
      }
    }

    let passes = 0;
    while (Date.now() < deadline) {
      const improved = search.twoOptPass(tour) || search.relocatePass(tour);
      if (!improved) break;
      passes++;
      await yieldToEventLoop();
    }

    logger.debug('Tour search finished', {
      nodes: this.manager.nodeCount,
      strategy: parameters.firstSolutionStrategy,
      improvingPasses: passes,
      deadlineReached: Date.now() >= deadline,
    });

    if (search.usesForbiddenArc(tour)) {
      return null;
    }
    return this.toAssignment(tour, search.cost(tour));
  }

  /**
   * Node-indexed cost table. Leaving the depot is priced from the start
   * token, reaching it from the end token.
   */
  private buildNodeCosts(callback: TransitCallback): number[][] {
    const n = this.manager.nodeCount;
    const start = this.manager.startIndex(0);
    const end = this.manager.endIndex(0);
    const depot = this.manager.depot;

    const costs: number[][] = [];
    for (let from = 0; from < n; from++) {
      const row: number[] = [];
      const fromToken = from === depot ? start : this.manager.nodeToIndex(from);
      for (let to = 0; to < n; to++) {
        const toToken = to === depot ? end : this.manager.nodeToIndex(to);
        row.push(from === to && from !== depot ? 0 : callback(fromToken, toToken));
      }
      costs.push(row);
    }
    return costs;
  }

  private hintToTour(route: number[]): number[] {
    const depot = this.manager.depot;
    const n = this.manager.nodeCount;
    const inner = route.slice(1, -1);

    const closed = route.length >= 2 && route[0] === depot && route[route.length - 1] === depot;
    const seen = new Set(inner);
    const complete =
      inner.length === n - 1 &&
      seen.size === n - 1 &&
      inner.every(node => Number.isInteger(node) && node >= 0 && node < n && node !== depot);

    if (!closed || !complete) {
      throw new RangeError('Initial route must start and end at the depot and visit every other node once');
    }
    return inner;
  }

  private toAssignment(tour: number[], objective: number): Assignment {
    const successors = new Map<number, number>();
    let current = this.manager.startIndex(0);
    for (const node of tour) {
      const token = this.manager.nodeToIndex(node);
      successors.set(current, token);
      current = token;
    }
    successors.set(current, this.manager.endIndex(0));
    return new Assignment(successors, objective);
  }
}

// =============================================================================
// TOUR SEARCH
// =============================================================================

/**
 * A tour is the sequence of non-depot nodes; the depot closes it at both ends.
 */
class TourSearch {
  private readonly weights: number[][];

  constructor(private readonly costs: number[][], private readonly depot: number) {
    let largest = 0;
    for (const row of costs) {
      for (const value of row) {
        if (Number.isFinite(value)) largest = Math.max(largest, Math.abs(value));
      }
    }
    // Any tour with fewer forbidden arcs is cheaper than one with more
    const penalty = 2 * (costs.length + 1) * largest + 1;
    this.weights = costs.map(row => row.map(value => (Number.isFinite(value) ? value : penalty)));
  }

  construct(strategy: FirstSolutionStrategy): number[] {
    return strategy === 'PATH_CHEAPEST_ARC' ? this.pathCheapestArc() : this.cheapestInsertion();
  }

  cost(tour: number[]): number {
    return this.sumArcs(tour, this.costs);
  }

  penalizedCost(tour: number[]): number {
    return this.sumArcs(tour, this.weights);
  }

  usesForbiddenArc(tour: number[]): boolean {
    const sequence = this.closed(tour);
    for (let i = 0; i < sequence.length - 1; i++) {
      if (!Number.isFinite(this.costs[sequence[i]][sequence[i + 1]])) return true;
    }
    return false;
  }

  /**
   * Reverse one segment if that shortens the tour. Reversal flips the
   * direction of every arc inside the segment, which matters for
   * asymmetric costs, so both directions are tracked as prefix sums.
   */
  twoOptPass(tour: number[]): boolean {
    const w = this.weights;
    const s = this.closed(tour);
    const forward = [0];
    const backward = [0];
    for (let k = 0; k < s.length - 1; k++) {
      forward.push(forward[k] + w[s[k]][s[k + 1]]);
      backward.push(backward[k] + w[s[k + 1]][s[k]]);
    }

    const last = s.length - 2;
    for (let i = 1; i < last; i++) {
      for (let j = i + 1; j <= last; j++) {
        const before = w[s[i - 1]][s[i]] + (forward[j] - forward[i]) + w[s[j]][s[j + 1]];
        const after = w[s[i - 1]][s[j]] + (backward[j] - backward[i]) + w[s[i]][s[j + 1]];
        if (after - before < -IMPROVEMENT_EPSILON) {
          const reversed = tour.slice(i - 1, j).reverse();
          tour.splice(i - 1, j - i + 1, ...reversed);
          return true;
        }
      }
    }
    return false;
  }

  /** Move one node to another position if that shortens the tour */
  relocatePass(tour: number[]): boolean {
    const w = this.weights;
    for (let i = 0; i < tour.length; i++) {
      const node = tour[i];
      const prev = i === 0 ? this.depot : tour[i - 1];
      const next = i === tour.length - 1 ? this.depot : tour[i + 1];
      const removalGain = w[prev][node] + w[node][next] - w[prev][next];

      const rest = tour.slice(0, i).concat(tour.slice(i + 1));
      for (let position = 0; position <= rest.length; position++) {
        if (position === i) continue;
        const a = position === 0 ? this.depot : rest[position - 1];
        const b = position === rest.length ? this.depot : rest[position];
        const insertionCost = w[a][node] + w[node][b] - w[a][b];
        if (insertionCost - removalGain < -IMPROVEMENT_EPSILON) {
          rest.splice(position, 0, node);
          tour.splice(0, tour.length, ...rest);
          return true;
        }
      }
    }
    return false;
  }

  private pathCheapestArc(): number[] {
    const w = this.weights;
    const remaining = this.customers();
    const tour: number[] = [];
    let current = this.depot;

    while (remaining.length > 0) {
      let bestPosition = 0;
      for (let k = 1; k < remaining.length; k++) {
        if (w[current][remaining[k]] < w[current][remaining[bestPosition]]) bestPosition = k;
      }
      const [chosen] = remaining.splice(bestPosition, 1);
      tour.push(chosen);
      current = chosen;
    }
    return tour;
  }

  private cheapestInsertion(): number[] {
    const w = this.weights;
    const remaining = this.customers();
    const tour: number[] = [];

    while (remaining.length > 0) {
      let best = { candidate: 0, position: 0, delta: Number.POSITIVE_INFINITY };
      for (let k = 0; k < remaining.length; k++) {
        const node = remaining[k];
        for (let position = 0; position <= tour.length; position++) {
          const a = position === 0 ? this.depot : tour[position - 1];
          const b = position === tour.length ? this.depot : tour[position];
          const delta = w[a][node] + w[node][b] - w[a][b];
          if (delta < best.delta) best = { candidate: k, position, delta };
        }
      }
      const [chosen] = remaining.splice(best.candidate, 1);
      tour.splice(best.position, 0, chosen);
    }
    return tour;
  }

  private customers(): number[] {
    const nodes: number[] = [];
    for (let node = 0; node < this.costs.length; node++) {
      if (node !== this.depot) nodes.push(node);
    }
    return nodes;
  }

  private closed(tour: number[]): number[] {
    return [this.depot, ...tour, this.depot];
  }

  private sumArcs(tour: number[], table: number[][]): number {
    const sequence = this.closed(tour);
    let total = 0;
    for (let i = 0; i < sequence.length - 1; i++) {
      total += table[sequence[i]][sequence[i + 1]];
    }
    return total;
  }
}

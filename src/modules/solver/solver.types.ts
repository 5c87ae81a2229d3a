/**
 * =============================================================================
 * SOLVER MODULE - TYPES
 * =============================================================================
 *
 * The adapter's narrow contract: cost matrix in, closed visiting order and
 * total cost out. "No solution" is a result, not an error.
 * =============================================================================
 */

export type FirstSolutionStrategy = 'CHEAPEST_INSERTION' | 'PATH_CHEAPEST_ARC';

/**
 * Closed tour over stop indices: starts and ends at the depot and
 * visits every other index exactly once
 */
export interface SolveResult {
  route: number[];
  /** Integer cost units as reported by the engine */
  totalCost: number;
}

export type SolveOutcome =
  | { status: 'SOLVED'; result: SolveResult }
  | { status: 'NO_SOLUTION' };

export interface SolveOptions {
  /** Complete tour used as a starting point when it beats the constructed one */
  initialRoute?: number[];
}

/**
 * Malformed matrix, unsupported vehicle count, depot out of range
 */
export class SolverInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SolverInputError';
  }
}

/**
 * Solver module exports
 */

export * from './solver.types';
export * from './routing-engine';
export * from './solver.service';

/**
 * =============================================================================
 * ROUTING MODULE
 * =============================================================================
 *
 * Real-world road costs between stops:
 * - Distance/duration matrix (one round trip for N points)
 * - Route geometry for an ordered visit sequence
 * =============================================================================
 */

export * from './routing.types';
export * from './routing.schema';
export * from './routing.service';

/**
 * Optimization module exports
 */

export * from './optimization.types';
export * from './optimization.schema';
export * from './optimization.service';
export * from './optimization.routes';

/**
 * Geocoding module exports
 */

export * from './geocoding.types';
export * from './address-cache';
export * from './geocoding.providers';
export * from './geocoding.service';
export * from './geocoding.routes';

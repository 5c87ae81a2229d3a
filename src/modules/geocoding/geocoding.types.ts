/**
 * Geocoding types and component-level errors.
 *
 * These errors stay inside the geocoding module and the orchestrator;
 * the orchestrator maps them into AppError before anything reaches HTTP.
 */

import type { GeocodingProviderName } from '../../config/environment';

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface GeocodeResult extends Coordinates {
  /** Provider relevance score in [0, 1], when the provider reports one */
  confidence?: number;
  source: 'cache' | GeocodingProviderName;
}

export type GeocodeSettled =
  | { ok: true; value: GeocodeResult }
  | { ok: false; error: GeocodingError };

export class GeocodingError extends Error {
  constructor(message: string, public readonly address?: string) {
    super(message);
    this.name = 'GeocodingError';
  }
}

/** Definitive "no match" from the provider. Never retried. */
export class GeocodingNotFoundError extends GeocodingError {
  constructor(address: string) {
    super(`Address not found: ${address}`, address);
    this.name = 'GeocodingNotFoundError';
  }
}

export class GeocodingTimeoutError extends GeocodingError {
  constructor(address: string, public readonly timeoutMs: number) {
    super(`Geocoding timeout after ${timeoutMs}ms for address: ${address}`, address);
    this.name = 'GeocodingTimeoutError';
  }
}

export class GeocodingServiceError extends GeocodingError {
  public readonly statusCode?: number;
  /** Temporary unavailability (retryable) as opposed to a rejected request */
  public readonly transient: boolean;

  constructor(
    message: string,
    options: { address?: string; statusCode?: number; transient?: boolean } = {}
  ) {
    super(message, options.address);
    this.name = 'GeocodingServiceError';
    this.statusCode = options.statusCode;
    this.transient = options.transient ?? false;
  }
}

// HTTP statuses that mean "try again later"
export const TRANSIENT_HTTP_STATUSES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);

export function isTransientGeocodingError(error: unknown): boolean {
  if (error instanceof GeocodingTimeoutError) return true;
  return error instanceof GeocodingServiceError && error.transient;
}

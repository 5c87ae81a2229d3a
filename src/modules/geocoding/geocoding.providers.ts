/**
 * =============================================================================
 * GEOCODING PROVIDERS
 * =============================================================================
 *
 * One entry per backend: how to build the request and how to decode the
 * response. Dispatch is by provider name, picked once from configuration.
 *
 * | provider  | endpoint                                         | not found          |
 * |-----------|--------------------------------------------------|--------------------|
 * | nominatim | GET /search?q=&format=json&limit=1               | empty array        |
 * | google    | GET /maps/api/geocode/json?address=&key=         | ZERO_RESULTS       |
 * | mapbox    | GET /geocoding/v5/mapbox.places/{q}.json         | empty features     |
 *
 * Response bodies are validated with zod; a body that does not match is a
 * (non-retryable) service error.
 * =============================================================================
 */

import { z } from 'zod';
import type { GeocodingProviderName } from '../../config/environment';
import { GeocodingError, GeocodingServiceError } from './geocoding.types';

export interface ProviderSettings {
  apiUrl: string;
  apiKey: string;
  userAgent: string;
}

export interface ProviderRequest {
  url: string;
  headers: Record<string, string>;
}

export type ProviderMatch =
  | { found: true; latitude: number; longitude: number; confidence?: number }
  | { found: false };

export interface GeocodingProvider {
  name: GeocodingProviderName;
  buildRequest(address: string, settings: ProviderSettings): ProviderRequest;
  decode(body: unknown): ProviderMatch;
}

const latitudeSchema = z.coerce.number().min(-90).max(90);
const longitudeSchema = z.coerce.number().min(-180).max(180);

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, provider: GeocodingProviderName): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new GeocodingServiceError(
      `Unexpected response format from ${provider}: ${parsed.error.errors[0]?.message ?? 'invalid body'}`
    );
  }
  return parsed.data;
}

function requireApiKey(settings: ProviderSettings, provider: GeocodingProviderName): string {
  if (!settings.apiKey) {
    throw new GeocodingError(`${provider} geocoding requires an API key`);
  }
  return settings.apiKey;
}

// =============================================================================
// NOMINATIM (OpenStreetMap)
// =============================================================================

const nominatimResponseSchema = z.array(
  z.object({
    lat: latitudeSchema,
    lon: longitudeSchema,
    importance: z.number().optional(),
    display_name: z.string().optional(),
  })
);

const nominatim: GeocodingProvider = {
  name: 'nominatim',
  buildRequest(address, settings) {
    const params = new URLSearchParams({
      q: address,
      format: 'json',
      limit: '1',
      addressdetails: '1',
    });
    return {
      url: `${settings.apiUrl}/search?${params.toString()}`,
      // Nominatim's usage policy requires an identifying User-Agent
      headers: { 'User-Agent': settings.userAgent },
    };
  },
  decode(body) {
    const matches = parseBody(nominatimResponseSchema, body, 'nominatim');
    if (matches.length === 0) return { found: false };
    const [first] = matches;
    return { found: true, latitude: first.lat, longitude: first.lon, confidence: first.importance };
  },
};

// =============================================================================
// GOOGLE MAPS GEOCODING API
// =============================================================================

const googleResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z
    .array(
      z.object({
        formatted_address: z.string().optional(),
        geometry: z.object({
          location: z.object({ lat: latitudeSchema, lng: longitudeSchema }),
        }),
      })
    )
    .default([]),
});

const google: GeocodingProvider = {
  name: 'google',
  buildRequest(address, settings) {
    const params = new URLSearchParams({
      address,
      key: requireApiKey(settings, 'google'),
    });
    return {
      url: `${settings.apiUrl}/maps/api/geocode/json?${params.toString()}`,
      headers: {},
    };
  },
  decode(body) {
    const data = parseBody(googleResponseSchema, body, 'google');
    if (data.status === 'ZERO_RESULTS') return { found: false };
    if (data.status !== 'OK') {
      throw new GeocodingServiceError(
        `Google Maps API error: ${data.status}${data.error_message ? ` (${data.error_message})` : ''}`,
        // OVER_QUERY_LIMIT clears up by itself; REQUEST_DENIED and friends do not
        { transient: data.status === 'OVER_QUERY_LIMIT' || data.status === 'UNKNOWN_ERROR' }
      );
    }
    const [first] = data.results;
    if (!first) return { found: false };
    return { found: true, latitude: first.geometry.location.lat, longitude: first.geometry.location.lng };
  },
};

// =============================================================================
// MAPBOX GEOCODING API (v5)
// =============================================================================

const mapboxResponseSchema = z.object({
  features: z
    .array(
      z.object({
        relevance: z.number().optional(),
        geometry: z.object({
          // GeoJSON order: [longitude, latitude]
          coordinates: z.tuple([longitudeSchema, latitudeSchema]).rest(z.number()),
        }),
      })
    )
    .default([]),
});

const mapbox: GeocodingProvider = {
  name: 'mapbox',
  buildRequest(address, settings) {
    const params = new URLSearchParams({
      access_token: requireApiKey(settings, 'mapbox'),
      limit: '1',
    });
    return {
      url: `${settings.apiUrl}/geocoding/v5/mapbox.places/${encodeURIComponent(address)}.json?${params.toString()}`,
      headers: {},
    };
  },
  decode(body) {
    const data = parseBody(mapboxResponseSchema, body, 'mapbox');
    const [first] = data.features;
    if (!first) return { found: false };
    const [longitude, latitude] = first.geometry.coordinates;
    return { found: true, latitude, longitude, confidence: first.relevance };
  },
};

export const GEOCODING_PROVIDERS: Readonly<Record<GeocodingProviderName, GeocodingProvider>> = {
  nominatim,
  google,
  mapbox,
};

export function getGeocodingProvider(name: GeocodingProviderName): GeocodingProvider {
  return GEOCODING_PROVIDERS[name];
}

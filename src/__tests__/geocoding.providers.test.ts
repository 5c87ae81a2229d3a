/**
 * =============================================================================
 * GEOCODING PROVIDERS - Request Building & Response Decoding
 * =============================================================================
 */

import { getGeocodingProvider, ProviderSettings } from '../modules/geocoding/geocoding.providers';
import { GeocodingError, GeocodingServiceError } from '../modules/geocoding/geocoding.types';

const settings = (apiUrl: string, apiKey = 'test-key'): ProviderSettings => ({
  apiUrl,
  apiKey,
  userAgent: 'RouteOptimizerTests/1.0',
});

describe('nominatim provider', () => {
  const provider = getGeocodingProvider('nominatim');

  it('builds a search request with an identifying User-Agent', () => {
    const request = provider.buildRequest('10 Market St, Springfield', settings('https://geo.test'));

    expect(request).toEqual({
      url: 'https://geo.test/search?q=10+Market+St%2C+Springfield&format=json&limit=1&addressdetails=1',
      headers: { 'User-Agent': 'RouteOptimizerTests/1.0' },
    });
  });

  it('takes the first candidate and converts string coordinates', () => {
    const match = provider.decode([
      { lat: '39.7817', lon: '-89.6501', importance: 0.62, display_name: 'Springfield' },
      { lat: '1', lon: '2' },
    ]);

    expect(match).toEqual({ found: true, latitude: 39.7817, longitude: -89.6501, confidence: 0.62 });
  });

  it('reports an empty array as not found', () => {
    expect(provider.decode([])).toEqual({ found: false });
  });

  it('rejects a body of the wrong shape as a non-transient service error', () => {
    let caught: unknown;
    try {
      provider.decode({ error: 'Unable to geocode' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(GeocodingServiceError);
    expect(caught).toMatchObject({ transient: false });
    expect(String(caught)).toContain('Unexpected response format from nominatim');
  });
});

describe('google provider', () => {
  const provider = getGeocodingProvider('google');

  it('puts the address and key in the query string', () => {
    const request = provider.buildRequest('1 Main St', settings('https://maps.test'));

    expect(request).toEqual({
      url: 'https://maps.test/maps/api/geocode/json?address=1+Main+St&key=test-key',
      headers: {},
    });
  });

  it('refuses to build a request without an API key', () => {
    expect(() => provider.buildRequest('1 Main St', settings('https://maps.test', ''))).toThrow(
      new GeocodingError('google geocoding requires an API key')
    );
  });

  it('decodes the first result location', () => {
    const match = provider.decode({
      status: 'OK',
      results: [{ formatted_address: '1 Main St', geometry: { location: { lat: 40.1, lng: -75.2 } } }],
    });

    expect(match).toEqual({ found: true, latitude: 40.1, longitude: -75.2 });
  });

  it('treats ZERO_RESULTS as not found', () => {
    expect(provider.decode({ status: 'ZERO_RESULTS', results: [] })).toEqual({ found: false });
  });

  it('marks OVER_QUERY_LIMIT as transient and REQUEST_DENIED as final', () => {
    const decodeError = (body: unknown): GeocodingServiceError => {
      try {
        provider.decode(body);
      } catch (error) {
        if (error instanceof GeocodingServiceError) return error;
      }
      throw new Error('expected a GeocodingServiceError');
    };

    const overLimit = decodeError({ status: 'OVER_QUERY_LIMIT' });
    expect(overLimit.message).toBe('Google Maps API error: OVER_QUERY_LIMIT');
    expect(overLimit.transient).toBe(true);

    const denied = decodeError({ status: 'REQUEST_DENIED', error_message: 'The provided API key is invalid.' });
    expect(denied.message).toBe('Google Maps API error: REQUEST_DENIED (The provided API key is invalid.)');
    expect(denied.transient).toBe(false);
  });
});

describe('mapbox provider', () => {
  const provider = getGeocodingProvider('mapbox');

  it('encodes the address into the path', () => {
    const request = provider.buildRequest('5 Oak Rd #2', settings('https://mapbox.test'));

    expect(request.url).toBe(
      'https://mapbox.test/geocoding/v5/mapbox.places/5%20Oak%20Rd%20%232.json?access_token=test-key&limit=1'
    );
  });

  it('reads [longitude, latitude] coordinates and relevance', () => {
    const match = provider.decode({
      features: [{ relevance: 0.9, geometry: { coordinates: [-122.42, 37.77] } }],
    });

    expect(match).toEqual({ found: true, latitude: 37.77, longitude: -122.42, confidence: 0.9 });
  });

  it('treats an empty feature list as not found', () => {
    expect(provider.decode({ features: [] })).toEqual({ found: false });
  });
});

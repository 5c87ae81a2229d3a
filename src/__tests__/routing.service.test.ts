/**
 * =============================================================================
 * DISTANCE MATRIX CLIENT - Unit Tests
 * =============================================================================
 *
 * - Request URL shape (coordinate order, annotations)
 * - Retry only on timeouts and network failures
 * - Matrix shape validation, unreachable cells
 * - Route geometry degrades to null
 * =============================================================================
 */

import { DistanceMatrixClient, formatCoordinates } from '../modules/routing/routing.service';
import {
  RoutingInputError,
  RoutingNetworkError,
  RoutingServiceError,
  RoutingTimeoutError,
} from '../modules/routing/routing.types';

jest.mock('../shared/services/logger.service', () => ({
  ...jest.requireActual<typeof import('../shared/services/logger.service')>('../shared/services/logger.service'),
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

const points = [
  { latitude: 40.7128, longitude: -74.006 },
  { latitude: 40.7589, longitude: -73.9851 },
];

const tableBody = {
  code: 'Ok',
  distances: [[0, 2000.5], [1980.25, 0]],
  durations: [[0, 300], [290, 0]],
};

function createClient(overrides: Partial<ConstructorParameters<typeof DistanceMatrixClient>[0]> = {}) {
  return new DistanceMatrixClient({
    baseUrl: 'https://osrm.test/',
    profile: 'driving',
    timeoutMs: 1000,
    maxAttempts: 3,
    retry: { baseDelayMs: 0, maxDelayMs: 0 },
    sleep: async () => undefined,
    ...overrides,
  });
}

describe('formatCoordinates', () => {
  it('joins lon,lat pairs with semicolons', () => {
    expect(formatCoordinates(points)).toBe('-74.006,40.7128;-73.9851,40.7589');
  });
});

describe('DistanceMatrixClient', () => {
  let fetchMock: jest.SpyInstance<ReturnType<typeof fetch>, Parameters<typeof fetch>>;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('computeMatrix', () => {
    it('requests distance and duration annotations in one call', async () => {
      fetchMock.mockImplementation(async () => jsonResponse(tableBody));

      const matrices = await createClient().computeMatrix(points);

      expect(matrices).toEqual({
        distances: [[0, 2000.5], [1980.25, 0]],
        durations: [[0, 300], [290, 0]],
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock.mock.calls[0][0]).toBe(
        'https://osrm.test/table/v1/driving/-74.006,40.7128;-73.9851,40.7589?annotations=distance,duration'
      );
    });

    it('carries unreachable pairs as Infinity', async () => {
      fetchMock.mockImplementation(async () =>
        jsonResponse({ code: 'Ok', distances: [[0, null], [5, 0]], durations: [[0, null], [1, 0]] })
      );

      const matrices = await createClient().computeMatrix(points);

      expect(matrices.distances).toEqual([[0, Infinity], [5, 0]]);
      expect(matrices.durations).toEqual([[0, Infinity], [1, 0]]);
    });

    it('rejects fewer than two points without calling the service', async () => {
      await expect(createClient().computeMatrix([points[0]])).rejects.toThrow(
        new RoutingInputError('At least 2 locations required for distance matrix')
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('retries network failures and then succeeds', async () => {
      fetchMock
        .mockRejectedValueOnce(new TypeError('fetch failed'))
        .mockImplementationOnce(async () => jsonResponse(tableBody));

      await expect(createClient().computeMatrix(points)).resolves.toMatchObject({ durations: [[0, 300], [290, 0]] });
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('surfaces a network failure as a service error once retries run out', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      const error = await createClient().computeMatrix(points).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RoutingNetworkError);
      expect(error).toBeInstanceOf(RoutingServiceError);
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it('throws a timeout error after every attempt times out', async () => {
      fetchMock.mockImplementation(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
          })
      );

      await expect(createClient({ timeoutMs: 10, maxAttempts: 2 }).computeMatrix(points)).rejects.toThrow(
        new RoutingTimeoutError(10)
      );
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('does not retry an HTTP error status', async () => {
      fetchMock.mockImplementation(async () => jsonResponse({ code: 'Error' }, 502));

      const error = await createClient().computeMatrix(points).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RoutingServiceError);
      expect(error).toMatchObject({ message: 'HTTP error: 502', statusCode: 502 });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('reports a non-Ok response code with the service message', async () => {
      fetchMock.mockImplementation(async () =>
        jsonResponse({ code: 'NoTable', message: 'Could not build table' })
      );

      await expect(createClient().computeMatrix(points)).rejects.toThrow(
        new RoutingServiceError('Routing service error: Could not build table')
      );
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('rejects a response without matrices', async () => {
      fetchMock.mockImplementation(async () => jsonResponse({ code: 'Ok', durations: [[0, 1], [1, 0]] }));

      await expect(createClient().computeMatrix(points)).rejects.toThrow(
        new RoutingServiceError('Invalid response: missing distance or duration data')
      );
    });

    it('rejects a matrix that is not N x N', async () => {
      fetchMock.mockImplementation(async () =>
        jsonResponse({ code: 'Ok', distances: [[0, 1]], durations: [[0, 1], [1, 0]] })
      );

      await expect(createClient().computeMatrix(points)).rejects.toThrow(
        new RoutingServiceError(
          'Matrix dimension mismatch: expected 2x2 distance matrix, got 1 rows (columns: 2)'
        )
      );
    });
  });

  describe('computeRouteGeometry', () => {
    const route = [points[0], points[1], points[0]];

    it('returns the GeoJSON line of the first route', async () => {
      fetchMock.mockImplementation(async () =>
        jsonResponse({
          code: 'Ok',
          routes: [
            {
              distance: 4100.2,
              duration: 610.5,
              geometry: { type: 'LineString', coordinates: [[-74.006, 40.7128], [-73.9851, 40.7589]] },
            },
          ],
        })
      );

      const geometry = await createClient().computeRouteGeometry(route);

      expect(geometry).toEqual({
        type: 'LineString',
        coordinates: [[-74.006, 40.7128], [-73.9851, 40.7589]],
        distanceMeters: 4100.2,
        durationSeconds: 610.5,
      });
      expect(fetchMock.mock.calls[0][0]).toBe(
        'https://osrm.test/route/v1/driving/-74.006,40.7128;-73.9851,40.7589;-74.006,40.7128' +
          '?overview=full&geometries=geojson'
      );
    });

    it('returns null instead of throwing when the service fails', async () => {
      fetchMock.mockImplementation(async () => jsonResponse({ code: 'NoRoute', message: 'Impossible route' }));

      await expect(createClient().computeRouteGeometry(route)).resolves.toBeNull();
    });

    it('returns null when no routes come back', async () => {
      fetchMock.mockImplementation(async () => jsonResponse({ code: 'Ok', routes: [] }));

      await expect(createClient().computeRouteGeometry(route)).resolves.toBeNull();
    });
  });
});

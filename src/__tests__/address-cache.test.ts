/**
 * =============================================================================
 * ADDRESS CACHE - Unit Tests
 * =============================================================================
 *
 * - Address normalization (abbreviations, punctuation, idempotence)
 * - LRU eviction and recency refresh
 * - Lazy TTL expiry
 * - Hit/miss counters and stats
 * =============================================================================
 */

import { AddressCache, normalizeAddress } from '../modules/geocoding/address-cache';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const DAY_MS = 24 * 60 * 60 * 1000;

describe('normalizeAddress', () => {
  it('lowercases, strips commas and periods, and abbreviates street suffixes', () => {
    expect(normalizeAddress('123 Main Street, Springfield')).toBe('123 main st springfield');
    expect(normalizeAddress('123 MAIN ST. Springfield')).toBe('123 main st springfield');
  });

  it('strips the periods of an initialism', () => {
    expect(normalizeAddress('1 Main St, U.S.A.')).toBe('1 main st usa');
    expect(normalizeAddress('1 Main St, U.S.A.')).toBe(normalizeAddress('1 Main St, USA'));
  });

  it('keeps words joined by punctuation apart', () => {
    expect(normalizeAddress('123 Main St.Springfield')).toBe('123 main st springfield');
    expect(normalizeAddress('123 Main Street,Springfield')).toBe('123 main st springfield');
  });

  it('abbreviates directions and unit designators', () => {
    expect(normalizeAddress('742 North Evergreen Boulevard, Apartment 5')).toBe('742 n evergreen blvd apt 5');
    expect(normalizeAddress('10 West Lane Suite 300')).toBe('10 w ln ste 300');
  });

  it('collapses runs of whitespace and trims the ends', () => {
    expect(normalizeAddress('   5   Oak    Road \t ')).toBe('5 oak rd');
  });

  it('only abbreviates whole words', () => {
    expect(normalizeAddress('1 Westfield Drive')).toBe('1 westfield dr');
    expect(normalizeAddress('9 Broadway')).toBe('9 broadway');
  });

  it('is idempotent', () => {
    const samples = [
      '123 Main Street, Springfield',
      '742 North Evergreen Boulevard, Apartment 5',
      'South Court Place, East Avenue.',
      '  Suite 4,,  West   Road ',
      'Elm St.Springfield, U.S.A.',
    ];
    for (const sample of samples) {
      const once = normalizeAddress(sample);
      expect(normalizeAddress(once)).toBe(once);
    }
  });
});

describe('AddressCache', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1_000_000;
  });

  it('returns coordinates stored under an equivalent address', () => {
    const cache = new AddressCache({ maxSize: 10, ttlDays: 30, now: clock });
    cache.set('123 Main Street, Springfield', 39.78, -89.65);

    expect(cache.get('123 main st springfield')).toEqual({ latitude: 39.78, longitude: -89.65 });
    expect(cache.size).toBe(1);
  });

  it('treats a dotted initialism as the same address', () => {
    const cache = new AddressCache({ maxSize: 10, ttlDays: 30, now: clock });
    cache.set('1 Main St, USA', 40.1, -75.2);

    expect(cache.get('1 Main St, U.S.A.')).toEqual({ latitude: 40.1, longitude: -75.2 });
  });

  it('evicts the least recently used entry when full', () => {
    const cache = new AddressCache({ maxSize: 2, ttlDays: 30, now: clock });
    cache.set('1 First Street', 1, 1);
    cache.set('2 Second Street', 2, 2);

    // Touch the first entry so the second becomes the oldest
    expect(cache.get('1 First Street')).toEqual({ latitude: 1, longitude: 1 });
    cache.set('3 Third Street', 3, 3);

    expect(cache.size).toBe(2);
    expect(cache.has('1 First Street')).toBe(true);
    expect(cache.has('2 Second Street')).toBe(false);
    expect(cache.has('3 Third Street')).toBe(true);
  });

  it('overwrites an existing key without evicting anything', () => {
    const cache = new AddressCache({ maxSize: 2, ttlDays: 30, now: clock });
    cache.set('1 First Street', 1, 1);
    cache.set('2 Second Street', 2, 2);
    cache.set('1 first st', 10, 10);

    expect(cache.size).toBe(2);
    expect(cache.get('1 First Street')).toEqual({ latitude: 10, longitude: 10 });
    expect(cache.has('2 Second Street')).toBe(true);
  });

  it('expires entries ttlDays after insertion and drops them on lookup', () => {
    const cache = new AddressCache({ maxSize: 10, ttlDays: 1, now: clock });
    cache.set('5 Oak Road', 10, 20);

    now += DAY_MS - 1;
    expect(cache.get('5 Oak Road')).toEqual({ latitude: 10, longitude: 20 });

    now += 1;
    expect(cache.get('5 Oak Road')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('counts hits and misses and reports the hit rate as a percentage', () => {
    const cache = new AddressCache({ maxSize: 10, ttlDays: 30, now: clock });
    cache.set('5 Oak Road', 10, 20);

    cache.get('5 Oak Road');
    cache.get('6 Elm Road');
    cache.get('7 Pine Road');

    expect(cache.stats()).toEqual({
      size: 1,
      maxSize: 10,
      hits: 1,
      misses: 2,
      hitRate: 33.33,
      totalRequests: 3,
      ttlDays: 30,
    });
  });

  it('does not touch counters on has()', () => {
    const cache = new AddressCache({ maxSize: 10, ttlDays: 30, now: clock });
    cache.set('5 Oak Road', 10, 20);

    expect(cache.has('5 oak rd')).toBe(true);
    expect(cache.has('missing')).toBe(false);
    expect(cache.stats().totalRequests).toBe(0);
  });

  it('treats an empty address as a miss and never stores it', () => {
    const cache = new AddressCache({ maxSize: 10, ttlDays: 30, now: clock });
    cache.set('  , . ', 1, 1);

    expect(cache.size).toBe(0);
    expect(cache.get('')).toBeUndefined();
    expect(cache.stats().misses).toBe(1);
  });

  it('resets entries and counters on clear()', () => {
    const cache = new AddressCache({ maxSize: 10, ttlDays: 30, now: clock });
    cache.set('5 Oak Road', 10, 20);
    cache.get('5 Oak Road');
    cache.clear();

    expect(cache.stats()).toEqual({
      size: 0,
      maxSize: 10,
      hits: 0,
      misses: 0,
      hitRate: 0,
      totalRequests: 0,
      ttlDays: 30,
    });
  });
});

/**
 * =============================================================================
 * ADDRESS CACHE - LRU + TTL store for geocoded coordinates
 * =============================================================================
 *
 * Keys are normalized addresses, so "123 Main Street, Springfield" and
 * "123 main st springfield" share one entry.
 *
 * - Capacity bound: least-recently-used entry is evicted before an insert
 *   that would exceed maxSize
 * - Lifetime bound: entries expire ttlDays after insertion; an expired entry
 *   is dropped lazily on lookup and counts as a miss
 * - Hit/miss counters only reset on clear()
 *
 * Map iteration order is insertion order; a hit re-inserts the key so the
 * first key is always the least recently used.
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import type { Coordinates } from './geocoding.types';

const DAY_MS = 24 * 60 * 60 * 1000;

// Whole-word replacements applied after lowercasing
const ABBREVIATIONS: ReadonlyArray<[RegExp, string]> = [
  [/\bstreet\b/g, 'st'],
  [/\bavenue\b/g, 'ave'],
  [/\broad\b/g, 'rd'],
  [/\bdrive\b/g, 'dr'],
  [/\bboulevard\b/g, 'blvd'],
  [/\blane\b/g, 'ln'],
  [/\bcourt\b/g, 'ct'],
  [/\bplace\b/g, 'pl'],
  [/\bapartment\b/g, 'apt'],
  [/\bsuite\b/g, 'ste'],
  [/\bnorth\b/g, 'n'],
  [/\bsouth\b/g, 's'],
  [/\beast\b/g, 'e'],
  [/\bwest\b/g, 'w'],
];

/**
 * Canonical cache key for an address.
 *
 * Commas and periods are stripped before abbreviation, so "U.S.A." and
 * "USA" share a key. A comma, or a period joining two words
 * ("St.Springfield"), still separates them; a period after a single
 * letter is part of an initialism.
 * The result is a fixed point of this function.
 */
export function normalizeAddress(address: string): string {
  let normalized = address
    .toLowerCase()
    .replace(/,/g, ' ')
    .replace(/([a-z0-9]{2,})\.(?=[a-z0-9])/g, '$1 ')
    .replace(/\./g, '')
    .replace(/\s+/g, ' ')
    .trim();

  for (const [pattern, abbreviation] of ABBREVIATIONS) {
    normalized = normalized.replace(pattern, abbreviation);
  }

  return normalized;
}

interface CacheEntry {
  latitude: number;
  longitude: number;
  expiresAt: number;
}

export interface AddressCacheOptions {
  maxSize: number;
  ttlDays: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export interface AddressCacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  /** Percentage of lookups that hit, rounded to 2 decimals */
  hitRate: number;
  totalRequests: number;
  ttlDays: number;
}

export class AddressCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxSize: number;
  private readonly ttlDays: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(options: AddressCacheOptions) {
    this.maxSize = Math.max(1, options.maxSize);
    this.ttlDays = options.ttlDays;
    this.now = options.now ?? Date.now;

    logger.info(`Initialized AddressCache: maxSize=${this.maxSize}, ttl=${this.ttlDays} days`);
  }

  get(address: string): Coordinates | undefined {
    const key = normalizeAddress(address);
    const entry = key ? this.entries.get(key) : undefined;

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      this.misses++;
      logger.debug('Address cache entry expired', { key });
      return undefined;
    }

    // Refresh recency
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return { latitude: entry.latitude, longitude: entry.longitude };
  }

  set(address: string, latitude: number, longitude: number): void {
    const key = normalizeAddress(address);
    if (!key) {
      logger.warn('Cannot cache result for empty address');
      return;
    }

    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
        logger.debug('Address cache evicted least recently used entry', { key: oldest.value });
      }
    }

    this.entries.set(key, {
      latitude,
      longitude,
      expiresAt: this.now() + this.ttlDays * DAY_MS,
    });
  }

  /** Membership test that leaves counters and recency untouched */
  has(address: string): boolean {
    const entry = this.entries.get(normalizeAddress(address));
    return entry !== undefined && entry.expiresAt > this.now();
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    logger.info('Address cache cleared');
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): AddressCacheStats {
    const totalRequests = this.hits + this.misses;
    const hitRate = totalRequests > 0 ? Math.round((this.hits / totalRequests) * 10000) / 100 : 0;

    return {
      size: this.entries.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      hitRate,
      totalRequests,
      ttlDays: this.ttlDays,
    };
  }
}

/**
 * =============================================================================
 * GEOCODING RESOLVER
 * =============================================================================
 *
 * Turns free-text addresses into coordinates.
 *
 * FLOW (per address):
 *   trim → address cache → [spacer wait → provider request → decode] x retries → cache write
 *
 * - Cache hits return immediately: no spacing wait, no network
 * - Every outbound attempt (retries included) waits on the shared RequestSpacer
 * - Retries: timeouts and temporary HTTP statuses only; "not found" is final
 * - Batch lookups never reject; each slot carries its own outcome
 * =============================================================================
 */

import { config, GeocodingProviderName } from '../../config/environment';
import { logger, redactUrl } from '../../shared/services/logger.service';
import { metrics } from '../../shared/monitoring/metrics.service';
import { retryWithBackoff } from '../../shared/resilience/retry';
import { RequestSpacer } from '../../shared/resilience/request-spacer';
import { fetchJson, HttpNetworkError, HttpTimeoutError, JsonResponse } from '../../shared/utils/http.utils';
import { AddressCache, AddressCacheStats } from './address-cache';
import { getGeocodingProvider, GeocodingProvider, ProviderSettings } from './geocoding.providers';
import {
  GeocodeResult,
  GeocodeSettled,
  GeocodingError,
  GeocodingNotFoundError,
  GeocodingServiceError,
  GeocodingTimeoutError,
  isTransientGeocodingError,
  TRANSIENT_HTTP_STATUSES
} from './geocoding.types';

export interface GeocodingResolverOptions {
  provider: GeocodingProviderName;
  apiUrl: string;
  apiKey: string;
  userAgent: string;
  timeoutMs: number;
  maxAttempts: number;
  retry: { baseDelayMs: number; maxDelayMs: number };
  /** null disables caching */
  cache: AddressCache | null;
  /** Owned spacing timer; built from rateLimitMs when not supplied */
  spacer?: RequestSpacer;
  rateLimitMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export class GeocodingResolver {
  private readonly provider: GeocodingProvider;
  private readonly settings: ProviderSettings;
  private readonly spacer: RequestSpacer;
  private readonly cache: AddressCache | null;

  constructor(private readonly options: GeocodingResolverOptions) {
    this.provider = getGeocodingProvider(options.provider);
    this.settings = {
      apiUrl: options.apiUrl,
      apiKey: options.apiKey,
      userAgent: options.userAgent
    };
    this.spacer = options.spacer ?? new RequestSpacer({ minIntervalMs: options.rateLimitMs ?? 0 });
    this.cache = options.cache;

    logger.info('Initialized GeocodingResolver', {
      provider: options.provider,
      url: options.apiUrl,
      timeoutMs: options.timeoutMs,
      maxAttempts: options.maxAttempts,
      cacheEnabled: this.cache !== null
    });
  }

  get providerName(): GeocodingProviderName {
    return this.provider.name;
  }

  /**
   * Resolve one address. Rejects with a GeocodingError subclass.
   */
  async resolveAddress(address: string): Promise<GeocodeResult> {
    const trimmed = address.trim();
    if (!trimmed) {
      throw new GeocodingError('Address cannot be empty', address);
    }

    if (this.cache) {
      const cached = this.cache.get(trimmed);
      if (cached) {
        metrics.incrementCounter('geocoding_cache_hits_total');
        logger.debug('Geocoding cache hit', { address: trimmed });
        return { ...cached, source: 'cache' };
      }
      metrics.incrementCounter('geocoding_cache_misses_total');
    }

    logger.info('Geocoding address', { address: trimmed, provider: this.provider.name });

    try {
      const result = await retryWithBackoff(() => this.lookup(trimmed), {
        attempts: this.options.maxAttempts,
        baseDelayMs: this.options.retry.baseDelayMs,
        maxDelayMs: this.options.retry.maxDelayMs,
        shouldRetry: isTransientGeocodingError,
        sleep: this.options.sleep,
        onRetry: (error, attempt, delayMs) => {
          logger.warn('Retrying geocoding request', {
            address: trimmed,
            attempt,
            delayMs,
            reason: error instanceof Error ? error.message : String(error)
          });
        }
      });

      this.cache?.set(trimmed, result.latitude, result.longitude);
      metrics.incrementCounter('geocoding_requests_total', { provider: this.provider.name, outcome: 'success' });
      logger.info('Geocoded address', {
        address: trimmed,
        latitude: result.latitude,
        longitude: result.longitude
      });
      return result;
    } catch (error) {
      const geocodingError = toGeocodingError(error, trimmed);
      const outcome = geocodingError instanceof GeocodingNotFoundError ? 'not_found' : 'error';
      metrics.incrementCounter('geocoding_requests_total', { provider: this.provider.name, outcome });
      if (outcome === 'not_found') {
        logger.warn('Address not found', { address: trimmed });
      } else {
        logger.error('Geocoding failed', { address: trimmed, error: geocodingError.message });
      }
      throw geocodingError;
    }
  }

  /**
   * One outbound attempt: wait for the spacer, call the provider, decode
   */
  private async lookup(address: string): Promise<GeocodeResult> {
    const request = this.provider.buildRequest(address, this.settings);

    await this.spacer.wait();

    let response: JsonResponse;
    try {
      response = await fetchJson(request.url, {
        timeoutMs: this.options.timeoutMs,
        headers: request.headers
      });
    } catch (error) {
      if (error instanceof HttpTimeoutError) {
        throw new GeocodingTimeoutError(address, this.options.timeoutMs);
      }
      if (error instanceof HttpNetworkError) {
        throw new GeocodingServiceError(error.message, { address, transient: true });
      }
      throw error;
    }

    logger.debug('Geocoding API request completed', {
      provider: this.provider.name,
      url: redactUrl(request.url),
      status: response.status,
      responseTimeMs: response.elapsedMs
    });

    if (!response.ok) {
      throw new GeocodingServiceError(`Geocoding API returned error: ${response.status}`, {
        address,
        statusCode: response.status,
        transient: TRANSIENT_HTTP_STATUSES.has(response.status)
      });
    }

    const match = this.provider.decode(response.body);
    if (!match.found) {
      throw new GeocodingNotFoundError(address);
    }

    return {
      latitude: match.latitude,
      longitude: match.longitude,
      ...(match.confidence !== undefined && { confidence: match.confidence }),
      source: this.provider.name
    };
  }

  /**
   * Resolve many addresses concurrently. One slot per input, in input order;
   * a failed lookup never affects its siblings.
   */
  async resolveBatchSettled(addresses: string[]): Promise<GeocodeSettled[]> {
    if (addresses.length === 0) return [];

    logger.info(`Batch geocoding ${addresses.length} addresses`);

    const results = await Promise.all(
      addresses.map(address =>
        this.resolveAddress(address).then(
          (value): GeocodeSettled => ({ ok: true, value }),
          (error: unknown): GeocodeSettled => ({ ok: false, error: toGeocodingError(error, address) })
        )
      )
    );

    const successful = results.filter(result => result.ok).length;
    logger.info(`Batch geocoding complete: ${successful}/${addresses.length} successful`);
    return results;
  }

  /**
   * Same as resolveBatchSettled, with failures reported as null
   */
  async resolveBatch(addresses: string[]): Promise<Array<GeocodeResult | null>> {
    const settled = await this.resolveBatchSettled(addresses);
    return settled.map(result => (result.ok ? result.value : null));
  }

  cacheStats(): AddressCacheStats | null {
    return this.cache ? this.cache.stats() : null;
  }
}

function toGeocodingError(error: unknown, address: string): GeocodingError {
  if (error instanceof GeocodingError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new GeocodingServiceError(`Failed to geocode address: ${message}`, { address });
}

// =============================================================================
// DEFAULT INSTANCE
// =============================================================================

export function createGeocodingResolver(): GeocodingResolver {
  const geocoding = config.geocoding;
  return new GeocodingResolver({
    provider: geocoding.provider,
    apiUrl: geocoding.apiUrl,
    apiKey: geocoding.apiKey,
    userAgent: geocoding.userAgent,
    timeoutMs: geocoding.timeoutMs,
    maxAttempts: geocoding.maxAttempts,
    rateLimitMs: geocoding.rateLimitMs,
    retry: config.retry,
    cache: geocoding.cache.enabled
      ? new AddressCache({ maxSize: geocoding.cache.maxSize, ttlDays: geocoding.cache.ttlDays })
      : null
  });
}

/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * SECTIONS:
 * - Server (port, host, CORS, logging)
 * - Routing service (distance matrix + route geometry)
 * - Solver (time budget, concurrency)
 * - Geocoding (provider, credentials, rate limit, retries)
 * - Address cache (capacity, entry lifetime)
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getOptional()/getNumber()/getBoolean() with a sensible default
 * - Validation of the values lives in core/config/env.validation.ts
 * =============================================================================
 */

import dotenv from 'dotenv';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

export type GeocodingProviderName = 'nominatim' | 'google' | 'mapbox';

const GEOCODING_PROVIDERS: readonly GeocodingProviderName[] = ['nominatim', 'google', 'mapbox'];

function parseGeocodingProvider(value: string): GeocodingProviderName {
  const provider = GEOCODING_PROVIDERS.find(p => p === value.toLowerCase());
  // Unknown names fall back to nominatim here; env.validation reports them
  return provider ?? 'nominatim';
}

const DEFAULT_GEOCODING_URLS: Record<GeocodingProviderName, string> = {
  nominatim: 'https://nominatim.openstreetmap.org',
  google: 'https://maps.googleapis.com',
  mapbox: 'https://api.mapbox.com',
};

const nodeEnv = getOptional('NODE_ENV', 'development');
const geocodingProvider = parseGeocodingProvider(getOptional('GEOCODING_PROVIDER', 'nominatim'));

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

/**
 * Application configuration object
 * All configuration is validated at startup
 */
export const config = {
  // Server
  nodeEnv,
  port: getNumber('PORT', 8000),
  host: getOptional('HOST', '0.0.0.0'),
  version: getOptional('npm_package_version', '1.0.0'),

  // Routing service (OSRM-compatible table + route API)
  routing: {
    baseUrl: getOptional('ROUTING_BASE_URL', 'http://router.project-osrm.org').replace(/\/+$/, ''),
    profile: getOptional('ROUTING_PROFILE', 'driving'),
    timeoutMs: getNumber('ROUTING_TIMEOUT_MS', 30000),
    maxAttempts: getNumber('ROUTING_MAX_ATTEMPTS', 3),
  },

  // Route solver
  solver: {
    timeLimitMs: getNumber('SOLVER_TIME_LIMIT_MS', 30000),
    maxConcurrent: getNumber('SOLVER_MAX_CONCURRENT', 2),
    maxQueueSize: getNumber('SOLVER_QUEUE_SIZE', 50),
    queueTimeoutMs: getNumber('SOLVER_QUEUE_TIMEOUT_MS', 60000),
  },

  // Geocoding provider
  geocoding: {
    provider: geocodingProvider,
    apiUrl: getOptional('GEOCODING_API_URL', DEFAULT_GEOCODING_URLS[geocodingProvider]).replace(/\/+$/, ''),
    apiKey: getOptional('GEOCODING_API_KEY', ''),
    timeoutMs: getNumber('GEOCODING_TIMEOUT_MS', 10000),
    maxAttempts: getNumber('GEOCODING_MAX_ATTEMPTS', 3),
    rateLimitMs: getNumber('GEOCODING_RATE_LIMIT_MS', 1000),
    userAgent: getOptional('GEOCODING_USER_AGENT', 'RouteOptimizer/1.0 (delivery route planning)'),
    cache: {
      enabled: getBoolean('GEOCODING_CACHE_ENABLED', true),
      maxSize: getNumber('GEOCODING_CACHE_SIZE', 10000),
      ttlDays: getNumber('GEOCODING_CACHE_TTL_DAYS', 30),
    },
  },

  // Backoff shared by every outbound client
  retry: {
    baseDelayMs: getNumber('RETRY_BASE_DELAY_MS', 2000),
    maxDelayMs: getNumber('RETRY_MAX_DELAY_MS', 10000),
  },

  // Rate Limiting (inbound API)
  rateLimit: {
    windowMs: getNumber('RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000), // 15 minutes
    maxRequests: getNumber('RATE_LIMIT_MAX_REQUESTS', 100),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'info'),

  // CORS - Parsed into array for production
  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', 'http://localhost:3000,http://localhost:5173')),
  },

  // Helpers
  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',

  // Security Features
  security: {
    enableRateLimiting: getBoolean('ENABLE_RATE_LIMITING', true),
    enableRequestLogging: getBoolean('ENABLE_REQUEST_LOGGING', true),
  },
} as const;

export type AppConfig = typeof config;

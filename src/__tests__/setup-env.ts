/**
 * Jest setup: runs before every suite, ahead of any module import.
 * Keeps configuration independent of a developer's local .env.
 */

process.env.NODE_ENV = 'test';
process.env.ENABLE_REQUEST_LOGGING = 'false';
process.env.GEOCODING_PROVIDER = 'nominatim';
process.env.GEOCODING_CACHE_ENABLED = 'true';

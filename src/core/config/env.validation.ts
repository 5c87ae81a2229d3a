/**
 * =============================================================================
 * ENVIRONMENT VALIDATION
 * =============================================================================
 *
 * Validates all environment variables at startup.
 * Fails fast in production if configuration is invalid.
 *
 * USAGE:
 * ```typescript
 * // At application startup (server.ts)
 * import { validateAndLogEnvironment } from './core';
 * validateAndLogEnvironment();
 * ```
 *
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';

/**
 * Environment variable definition
 */
interface EnvVar {
  name: string;
  required: boolean;
  default?: string;
  validator?: (value: string) => boolean;
  description: string;
}

const isPositiveInt = (v: string): boolean => /^\d+$/.test(v) && parseInt(v, 10) > 0;
const isNonNegativeInt = (v: string): boolean => /^\d+$/.test(v);
const isBooleanString = (v: string): boolean => ['true', 'false'].includes(v.toLowerCase());
const isHttpUrl = (v: string): boolean => /^https?:\/\/[^\s]+$/.test(v);

/**
 * All environment variables with their requirements
 */
const ENV_VARS: EnvVar[] = [
  // ==========================================================================
  // SERVER
  // ==========================================================================
  {
    name: 'NODE_ENV',
    required: false,
    default: 'development',
    validator: (v) => ['development', 'staging', 'production', 'test'].includes(v),
    description: 'Application environment'
  },
  {
    name: 'PORT',
    required: false,
    default: '8000',
    validator: (v) => isPositiveInt(v) && parseInt(v, 10) < 65536,
    description: 'Server port number'
  },
  {
    name: 'HOST',
    required: false,
    default: '0.0.0.0',
    description: 'Server host address'
  },

  // ==========================================================================
  // ROUTING SERVICE
  // ==========================================================================
  {
    name: 'ROUTING_BASE_URL',
    required: false,
    default: 'http://router.project-osrm.org',
    validator: isHttpUrl,
    description: 'Base URL of the OSRM-compatible routing service'
  },
  {
    name: 'ROUTING_PROFILE',
    required: false,
    default: 'driving',
    validator: (v) => /^[a-z-]+$/.test(v),
    description: 'Routing profile (driving, cycling, walking)'
  },
  {
    name: 'ROUTING_TIMEOUT_MS',
    required: false,
    default: '30000',
    validator: isPositiveInt,
    description: 'Routing request timeout in milliseconds'
  },
  {
    name: 'ROUTING_MAX_ATTEMPTS',
    required: false,
    default: '3',
    validator: isPositiveInt,
    description: 'Attempts per routing request (including the first)'
  },

  // ==========================================================================
  // SOLVER
  // ==========================================================================
  {
    name: 'SOLVER_TIME_LIMIT_MS',
    required: false,
    default: '30000',
    validator: isPositiveInt,
    description: 'Wall-clock budget per solve in milliseconds'
  },
  {
    name: 'SOLVER_MAX_CONCURRENT',
    required: false,
    default: '2',
    validator: isPositiveInt,
    description: 'Maximum solves running at the same time'
  },
  {
    name: 'SOLVER_QUEUE_SIZE',
    required: false,
    default: '50',
    validator: isNonNegativeInt,
    description: 'Maximum solves waiting for a slot'
  },
  {
    name: 'SOLVER_QUEUE_TIMEOUT_MS',
    required: false,
    default: '60000',
    validator: isPositiveInt,
    description: 'Maximum wait for a solver slot in milliseconds'
  },

  // ==========================================================================
  // GEOCODING
  // ==========================================================================
  {
    name: 'GEOCODING_PROVIDER',
    required: false,
    default: 'nominatim',
    validator: (v) => ['nominatim', 'google', 'mapbox'].includes(v.toLowerCase()),
    description: 'Geocoding provider'
  },
  {
    name: 'GEOCODING_API_URL',
    required: false,
    validator: isHttpUrl,
    description: 'Geocoding provider base URL (defaults per provider)'
  },
  {
    name: 'GEOCODING_API_KEY',
    required: false,
    description: 'Geocoding API key (required for google and mapbox)'
  },
  {
    name: 'GEOCODING_TIMEOUT_MS',
    required: false,
    default: '10000',
    validator: isPositiveInt,
    description: 'Geocoding request timeout in milliseconds'
  },
  {
    name: 'GEOCODING_MAX_ATTEMPTS',
    required: false,
    default: '3',
    validator: isPositiveInt,
    description: 'Attempts per geocoding request (including the first)'
  },
  {
    name: 'GEOCODING_RATE_LIMIT_MS',
    required: false,
    default: '1000',
    validator: isNonNegativeInt,
    description: 'Minimum interval between geocoding requests in milliseconds'
  },
  {
    name: 'GEOCODING_CACHE_ENABLED',
    required: false,
    default: 'true',
    validator: isBooleanString,
    description: 'Enable the address cache'
  },
  {
    name: 'GEOCODING_CACHE_SIZE',
    required: false,
    default: '10000',
    validator: isPositiveInt,
    description: 'Maximum cached addresses'
  },
  {
    name: 'GEOCODING_CACHE_TTL_DAYS',
    required: false,
    default: '30',
    validator: isPositiveInt,
    description: 'Days a cached address stays valid'
  },

  // ==========================================================================
  // RETRY POLICY
  // ==========================================================================
  {
    name: 'RETRY_BASE_DELAY_MS',
    required: false,
    default: '2000',
    validator: isNonNegativeInt,
    description: 'First backoff delay in milliseconds'
  },
  {
    name: 'RETRY_MAX_DELAY_MS',
    required: false,
    default: '10000',
    validator: isNonNegativeInt,
    description: 'Backoff delay cap in milliseconds'
  },

  // ==========================================================================
  // RATE LIMITING
  // ==========================================================================
  {
    name: 'RATE_LIMIT_WINDOW_MS',
    required: false,
    default: '900000',
    validator: isPositiveInt,
    description: 'Rate limit window in milliseconds'
  },
  {
    name: 'RATE_LIMIT_MAX_REQUESTS',
    required: false,
    default: '100',
    validator: isPositiveInt,
    description: 'Maximum requests per window'
  },

  // ==========================================================================
  // CORS
  // ==========================================================================
  {
    name: 'CORS_ORIGIN',
    required: false,
    default: 'http://localhost:3000,http://localhost:5173',
    description: 'Allowed CORS origins (comma-separated)'
  },

  // ==========================================================================
  // LOGGING
  // ==========================================================================
  {
    name: 'LOG_LEVEL',
    required: false,
    default: 'info',
    validator: (v) => ['error', 'warn', 'info', 'http', 'debug'].includes(v),
    description: 'Logging level'
  }
];

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  loaded: Record<string, string>;
}

/**
 * Validate all environment variables
 */
export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const result: ValidationResult = {
    valid: true,
    errors: [],
    warnings: [],
    loaded: {}
  };

  const isProduction = env.NODE_ENV === 'production';

  for (const envVar of ENV_VARS) {
    const value = env[envVar.name];

    if (envVar.required && !value) {
      result.valid = false;
      result.errors.push(`Missing required environment variable: ${envVar.name} - ${envVar.description}`);
      continue;
    }

    const finalValue = value || envVar.default;
    if (finalValue) {
      if (envVar.validator && !envVar.validator(finalValue)) {
        result.valid = false;
        result.errors.push(`Invalid value for ${envVar.name}: "${finalValue}" - ${envVar.description}`);
        continue;
      }
      result.loaded[envVar.name] = finalValue;
    }
  }

  // Provider-specific validation
  const provider = (env.GEOCODING_PROVIDER || 'nominatim').toLowerCase();
  if ((provider === 'google' || provider === 'mapbox') && !env.GEOCODING_API_KEY) {
    result.errors.push(`GEOCODING_API_KEY is required when GEOCODING_PROVIDER=${provider}`);
    result.valid = false;
  }

  if (provider === 'nominatim' && isProduction && !env.GEOCODING_USER_AGENT) {
    result.warnings.push('GEOCODING_USER_AGENT should identify this deployment when using the public Nominatim service');
  }

  const baseDelay = parseInt(result.loaded.RETRY_BASE_DELAY_MS ?? '2000', 10);
  const maxDelay = parseInt(result.loaded.RETRY_MAX_DELAY_MS ?? '10000', 10);
  if (baseDelay > maxDelay) {
    result.warnings.push('RETRY_BASE_DELAY_MS is larger than RETRY_MAX_DELAY_MS; every retry will wait the maximum');
  }

  return result;
}

/**
 * Validate and log results at startup
 * Exits process if validation fails in production
 */
export function validateAndLogEnvironment(): ValidationResult {
  const result = validateEnvironment();
  const isProduction = process.env.NODE_ENV === 'production';

  result.errors.forEach(error => {
    logger.error(`Environment validation error: ${error}`);
  });

  result.warnings.forEach(warning => {
    logger.warn(`Environment validation warning: ${warning}`);
  });

  if (result.valid) {
    logger.info('Environment validation passed', {
      mode: result.loaded.NODE_ENV,
      port: result.loaded.PORT,
      geocodingProvider: result.loaded.GEOCODING_PROVIDER,
      routingBaseUrl: result.loaded.ROUTING_BASE_URL
    });
  }

  if (!result.valid && isProduction) {
    logger.error('Environment validation failed in production. Exiting.');
    process.exit(1);
  }

  return result;
}

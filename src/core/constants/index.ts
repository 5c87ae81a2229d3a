/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 *
 * BENEFITS:
 * - No magic strings/numbers scattered in code
 * - Easy to find and modify values
 * - Type safety with enums
 *
 * =============================================================================
 */

// =============================================================================
// API CONFIGURATION
// =============================================================================

/**
 * API versioning
 */
export const API_VERSION = 'v1';
export const API_PREFIX = `/api/${API_VERSION}`;

export const SERVICE_NAME = 'Route Optimizer API';

// =============================================================================
// OPTIMIZATION LIMITS
// =============================================================================

export const OPTIMIZATION_LIMITS = {
  MIN_STOPS: 2,
  MAX_STOPS: 100,
  /** The pipeline always plans a single vehicle */
  VEHICLE_COUNT: 1,
} as const;

export const COORDINATE_BOUNDS = {
  LATITUDE: { min: -90, max: 90 },
  LONGITUDE: { min: -180, max: 180 },
} as const;

// =============================================================================
// HTTP STATUS CODES (for consistency)
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_ERROR: 500,
  SERVICE_UNAVAILABLE: 503
} as const;

// =============================================================================
// ERROR TAXONOMY
// =============================================================================

/**
 * Stable failure kinds surfaced to API clients.
 * Every AppError belongs to exactly one kind.
 */
export enum ErrorKind {
  INVALID_INPUT = 'INVALID_INPUT',
  GEOCODING_FAILED = 'GEOCODING_FAILED',
  ROUTING_SERVICE_UNAVAILABLE = 'ROUTING_SERVICE_UNAVAILABLE',
  ROUTING_SERVICE_TIMEOUT = 'ROUTING_SERVICE_TIMEOUT',
  SOLVER_NO_SOLUTION = 'SOLVER_NO_SOLUTION',
  SOLVER_FAILED = 'SOLVER_FAILED',
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

/**
 * Finer-grained, machine-readable error codes.
 *
 * - Client errors (4xx): input validation, geocoding
 * - Server errors (5xx): solver, unexpected failures
 * - Service errors (503): routing service degraded, solver saturated
 */
export enum ErrorCode {
  // Client errors
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_COORDINATES = 'INVALID_COORDINATES',
  INVALID_DEPOT_INDEX = 'INVALID_DEPOT_INDEX',
  INSUFFICIENT_STOPS = 'INSUFFICIENT_STOPS',
  TOO_MANY_STOPS = 'TOO_MANY_STOPS',

  // Geocoding
  GEOCODING_FAILED = 'GEOCODING_FAILED',

  // Routing service
  ROUTING_SERVICE_ERROR = 'ROUTING_SERVICE_ERROR',
  ROUTING_SERVICE_TIMEOUT = 'ROUTING_SERVICE_TIMEOUT',

  // Solver
  SOLVER_NO_SOLUTION = 'SOLVER_NO_SOLUTION',
  SOLVER_FAILED = 'SOLVER_FAILED',
  SOLVER_BUSY = 'SOLVER_BUSY',

  // System
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED'
}

/**
 * Default messages, used when a throw site does not supply its own
 */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.INVALID_INPUT]: 'The request contains invalid input data',
  [ErrorCode.INVALID_COORDINATES]: 'One or more coordinates are invalid',
  [ErrorCode.INVALID_DEPOT_INDEX]: 'The specified depot index is out of bounds',
  [ErrorCode.INSUFFICIENT_STOPS]: 'At least 2 stops are required for route optimization',
  [ErrorCode.TOO_MANY_STOPS]: 'Too many stops provided - maximum limit exceeded',
  [ErrorCode.GEOCODING_FAILED]: 'Failed to geocode one or more addresses',
  [ErrorCode.ROUTING_SERVICE_ERROR]: 'The routing service returned an error',
  [ErrorCode.ROUTING_SERVICE_TIMEOUT]: 'The routing service request timed out',
  [ErrorCode.SOLVER_NO_SOLUTION]: 'The optimization solver could not find a valid solution',
  [ErrorCode.SOLVER_FAILED]: 'The optimization solver encountered an error',
  [ErrorCode.SOLVER_BUSY]: 'The optimization solver is at capacity',
  [ErrorCode.INTERNAL_ERROR]: 'An unexpected internal error occurred',
  [ErrorCode.NOT_FOUND]: 'Endpoint not found',
  [ErrorCode.RATE_LIMIT_EXCEEDED]: 'Too many requests'
};

/**
 * Remediation hints returned alongside errors
 */
export const ERROR_SUGGESTIONS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.INVALID_COORDINATES]: 'Ensure latitude is between -90 and 90, longitude is between -180 and 180',
  [ErrorCode.INVALID_DEPOT_INDEX]: 'Ensure depot_index is between 0 and the number of stops minus 1',
  [ErrorCode.INSUFFICIENT_STOPS]: "Provide at least 2 stops in the 'stops' array",
  [ErrorCode.TOO_MANY_STOPS]: 'Reduce the number of stops or split the route into several requests',
  [ErrorCode.GEOCODING_FAILED]: 'Provide more specific addresses with street, city, state, and ZIP code, or use coordinates directly',
  [ErrorCode.ROUTING_SERVICE_ERROR]: 'Try again in a few moments. If the issue persists, the routing service may be down',
  [ErrorCode.ROUTING_SERVICE_TIMEOUT]: 'Try again with fewer stops or check your network connection',
  [ErrorCode.SOLVER_NO_SOLUTION]: 'Check that all stops are reachable by road and coordinates are valid',
  [ErrorCode.SOLVER_BUSY]: 'Try again in a few moments',
  [ErrorCode.RATE_LIMIT_EXCEEDED]: 'Wait before sending more optimization requests'
};

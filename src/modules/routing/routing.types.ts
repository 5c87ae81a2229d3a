/**
 * Routing client errors.
 *
 * Timeouts and network failures are retried inside the client; everything
 * else is final. The orchestrator maps these onto the public error kinds.
 */

export class RoutingClientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RoutingClientError';
  }
}

/** Fewer than two points, or a point without coordinates. Never retried. */
export class RoutingInputError extends RoutingClientError {
  constructor(message: string) {
    super(message);
    this.name = 'RoutingInputError';
  }
}

export class RoutingTimeoutError extends RoutingClientError {
  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'RoutingTimeoutError';
  }
}

/**
 * HTTP error status, non-"Ok" response code, malformed or mis-sized body,
 * or a network failure that outlived its retries
 */
export class RoutingServiceError extends RoutingClientError {
  constructor(message: string, public readonly statusCode?: number) {
    super(message);
    this.name = 'RoutingServiceError';
  }
}

/** Connection-level failure; retried, then surfaced as a service error */
export class RoutingNetworkError extends RoutingServiceError {
  constructor(message: string) {
    super(message);
    this.name = 'RoutingNetworkError';
  }
}

export function isTransientRoutingError(error: unknown): boolean {
  return error instanceof RoutingTimeoutError || error instanceof RoutingNetworkError;
}

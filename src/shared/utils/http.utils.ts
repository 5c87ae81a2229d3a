/**
 * =============================================================================
 * HTTP UTILITIES - Outbound JSON requests with a hard timeout
 * =============================================================================
 *
 * Thin wrapper over the global fetch used by the geocoding and routing clients.
 * Failures are split into two classes callers care about:
 * - HttpTimeoutError: no response within the deadline
 * - HttpNetworkError: connection refused, DNS failure, reset...
 *
 * HTTP error statuses are NOT thrown; the caller decides what a 4xx/5xx means.
 * =============================================================================
 */

export class HttpTimeoutError extends Error {
  constructor(public readonly url: string, public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'HttpTimeoutError';
  }
}

export class HttpNetworkError extends Error {
  constructor(public readonly url: string, cause: unknown) {
    super(`Network error: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'HttpNetworkError';
  }
}

export interface JsonResponse {
  status: number;
  ok: boolean;
  /** Parsed body, or undefined when the body was not JSON */
  body: unknown;
  elapsedMs: number;
}

export interface FetchJsonOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

function parseJson(text: string): unknown {
  if (text.trim() === '') return undefined;
  try {
    return JSON.parse(text);
  } catch {
    // Callers validate the shape, so a non-JSON body surfaces as a format error there
    return undefined;
  }
}

/**
 * GET a URL and parse its JSON body, aborting after `timeoutMs`
 */
export async function fetchJson(url: string, options: FetchJsonOptions): Promise<JsonResponse> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);
  const startTime = Date.now();

  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: { Accept: 'application/json', ...options.headers },
      signal: controller.signal
    });
    const text = await response.text();
    return {
      status: response.status,
      ok: response.ok,
      body: parseJson(text),
      elapsedMs: Date.now() - startTime
    };
  } catch (error) {
    if (isAbortError(error) || controller.signal.aborted) {
      throw new HttpTimeoutError(url, options.timeoutMs);
    }
    throw new HttpNetworkError(url, error);
  } finally {
    clearTimeout(timer);
  }
}

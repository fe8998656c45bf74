/**
 * HTTP Utilities
 *
 * Typed fetch wrapper with a request timeout, plus helpers that turn
 * HTTP and network failures into Result errors.
 */

import type { Result } from './types'

/**
 * Check if running in CI environment.
 */
function isCI(): boolean {
  return process.env.CI === 'true'
}

/**
 * Check if running tests.
 */
function isTestMode(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true'
}

/**
 * Error thrown when a real HTTP request is attempted by tests running in CI.
 */
export class BlockedHttpRequestError extends Error {
  constructor(url: string) {
    super(
      `HTTP request to ${url} blocked: running tests in CI. ` +
        'Mock httpFetch in the test instead of calling the real service.'
    )
    this.name = 'BlockedHttpRequestError'
  }
}

/**
 * Standard HTTP response interface for API calls.
 */
export interface HttpResponse {
  ok: boolean
  status: number
  headers: {
    get(name: string): string | null
  }
  text(): Promise<string>
  json(): Promise<unknown>
}

export interface HttpFetchOptions {
  readonly headers?: Record<string, string> | undefined
  /** Abort the request after this many milliseconds */
  readonly timeoutMs?: number | undefined
}

/**
 * Perform a GET request and return a typed response.
 *
 * @throws BlockedHttpRequestError when tests run in CI
 * @throws TimeoutError (DOMException) when `timeoutMs` elapses
 */
export async function httpFetch(url: string, options: HttpFetchOptions = {}): Promise<HttpResponse> {
  if (isCI() && isTestMode()) {
    throw new BlockedHttpRequestError(url)
  }
  const init: RequestInit = {}
  if (options.headers) {
    init.headers = options.headers
  }
  if (options.timeoutMs !== undefined) {
    init.signal = AbortSignal.timeout(options.timeoutMs)
  }
  return fetch(url, init)
}

/**
 * Handle HTTP error responses uniformly across all API modules.
 */
export async function handleHttpError(response: HttpResponse): Promise<Result<never>> {
  const errorText = await response.text()

  if (response.status === 429) {
    const retryAfter = response.headers.get('retry-after')
    return {
      ok: false,
      error: {
        type: 'rate_limit',
        message: `Rate limited: ${errorText}`,
        retryAfter: retryAfter ? Number.parseInt(retryAfter, 10) : undefined
      }
    }
  }

  if (response.status === 401 || response.status === 403) {
    return { ok: false, error: { type: 'auth', message: `Access denied: ${errorText}` } }
  }

  if (response.status === 400) {
    return { ok: false, error: { type: 'invalid_request', message: `Bad request: ${errorText}` } }
  }

  return {
    ok: false,
    error: { type: 'network', message: `API error ${response.status}: ${errorText}` }
  }
}

/**
 * Handle network errors uniformly across all API modules.
 * Aborted and timed-out requests become `timeout` errors.
 */
export function handleNetworkError(error: unknown): Result<never> {
  const message = error instanceof Error ? error.message : String(error)
  const name = error instanceof Error ? error.name : undefined
  if (name === 'TimeoutError' || name === 'AbortError') {
    return { ok: false, error: { type: 'timeout', message: `Request timed out: ${message}` } }
  }
  return { ok: false, error: { type: 'network', message: `Network error: ${message}` } }
}

/**
 * Create an error result for empty or malformed API responses.
 */
export function emptyResponseError(detail = 'Empty response from API'): Result<never> {
  return { ok: false, error: { type: 'invalid_response', message: detail } }
}

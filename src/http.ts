/**
 * HTTP Utilities
 *
 * Guarded fetch plus uniform error mapping for the summarizer client.
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
 * HTTP requests are blocked when running tests in CI: every call must be mocked.
 */
function shouldBlockHttpRequests(): boolean {
  return isCI() && isTestMode()
}

/**
 * Error thrown when an unmocked HTTP request is made from a CI test run.
 */
class BlockedHttpRequestError extends Error {
  constructor(url: string) {
    super(`HTTP request to ${url} blocked: running tests in CI. Mock httpFetch instead.`)
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

/**
 * Perform a fetch request and return a typed response.
 *
 * @throws BlockedHttpRequestError when HTTP requests are blocked (CI tests)
 */
export async function httpFetch(url: string, init?: RequestInit): Promise<HttpResponse> {
  if (shouldBlockHttpRequests()) {
    throw new BlockedHttpRequestError(url)
  }
  return fetch(url, init)
}

// Gemini reports a bad key as 400 INVALID_ARGUMENT, so the body is checked too
const INVALID_KEY_PATTERN = /API key not valid|API_KEY_INVALID/i
const UNKNOWN_MODEL_PATTERN = /is not found for API version|is not supported for generateContent/i

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

  if (response.status === 401 || response.status === 403 || INVALID_KEY_PATTERN.test(errorText)) {
    return { ok: false, error: { type: 'auth', message: `Authentication failed: ${errorText}` } }
  }

  if (response.status === 404 || UNKNOWN_MODEL_PATTERN.test(errorText)) {
    return {
      ok: false,
      error: { type: 'unsupported_model', message: `Model not available: ${errorText}` }
    }
  }

  return {
    ok: false,
    error: { type: 'network', message: `API error ${response.status}: ${errorText}` }
  }
}

/**
 * Handle network errors uniformly across all API modules.
 * Aborts raised by an `AbortSignal.timeout()` signal map to `timeout`.
 */
export function handleNetworkError(error: unknown): Result<never> {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return { ok: false, error: { type: 'timeout', message: 'Request timed out' } }
  }
  const message = error instanceof Error ? error.message : String(error)
  return { ok: false, error: { type: 'network', message: `Network error: ${message}` } }
}

/**
 * Create an error result for empty API responses.
 */
export function emptyResponseError(): Result<never> {
  return { ok: false, error: { type: 'invalid_response', message: 'Empty response from API' } }
}

/**
 * Common Types
 *
 * Shared types used across multiple modules: Result, API errors.
 */

export type ApiErrorType =
  | 'rate_limit'
  | 'auth'
  | 'unsupported_model'
  | 'timeout'
  | 'network'
  | 'invalid_response'
  | 'invalid_request'

export interface ApiError {
  readonly type: ApiErrorType
  readonly message: string
  readonly retryAfter?: number | undefined
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ApiError }

// Shared API utilities for the Gmail client.
// Retry with exponential backoff for transient failures, plus the typed
// error values the client returns instead of throwing.
//
// Errors follow the errore pattern (errors as values):
// - Client methods return AuthError / ApiError / NotFoundError instead of throwing
// - Callers narrow with instanceof, no try/catch or string matching needed

import * as errore from 'errore'

// ---------------------------------------------------------------------------
// Error values
// ---------------------------------------------------------------------------

/** Returned when authentication fails (expired token, revoked access, missing credentials).
 *  Fatal for a run: the session cannot do anything useful after this. */
export class AuthError extends errore.createTaggedError({
  name: 'AuthError',
  message: 'Authentication failed for $email: $reason',
}) {}

/** Returned when a non-auth API call fails after retries. */
export class ApiError extends errore.createTaggedError({
  name: 'ApiError',
  message: 'API call failed: $reason',
}) {}

/** Returned when a requested resource doesn't exist (thread deleted between list and get). */
export class NotFoundError extends errore.createTaggedError({
  name: 'NotFoundError',
  message: '$resource not found',
}) {}

/** Thrown by the thread enumerator when a page cannot be fetched. Stops the run. */
export class EnumerationError extends errore.createTaggedError({
  name: 'EnumerationError',
  message: 'Failed to list threads for label $labelId: $reason',
}) {}

/** Returned when user input or a config file fails validation. */
export class ConfigError extends errore.createTaggedError({
  name: 'ConfigError',
  message: 'Invalid $field: $reason',
}) {}

// ---------------------------------------------------------------------------
// Structured error readers (googleapis GaxiosError, node system errors)
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

export function extractHttpStatus(err: unknown): number | undefined {
  if (!isRecord(err)) return undefined
  for (const key of ['status', 'code']) {
    const value = err[key]
    if (typeof value === 'number') return value
    if (typeof value === 'string' && /^\d{3}$/.test(value)) return Number(value)
  }
  const response = err.response
  if (isRecord(response) && typeof response.status === 'number') return response.status
  return undefined
}

function extractSystemCode(err: unknown): string | undefined {
  if (!isRecord(err)) return undefined
  const code = err.code
  return typeof code === 'string' ? code.toUpperCase() : undefined
}

/** Reasons from Gmail's error payload, e.g. `rateLimitExceeded`. */
function extractReasons(err: unknown): string[] {
  if (!isRecord(err)) return []
  let errors: unknown = err.errors
  if (!Array.isArray(errors)) {
    const response = err.response
    const data = isRecord(response) ? response.data : undefined
    const inner = isRecord(data) ? data.error : undefined
    errors = isRecord(inner) ? inner.errors : undefined
  }
  if (!Array.isArray(errors)) return []
  return errors.flatMap((e) => (isRecord(e) && typeof e.reason === 'string' ? [e.reason] : []))
}

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

const RATE_LIMIT_REASONS = new Set([
  'userRateLimitExceeded',
  'rateLimitExceeded',
  'quotaExceeded',
  'dailyLimitExceeded',
  'limitExceeded',
  'backendError',
])

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EPIPE',
])

export function isRateLimitError(err: unknown): boolean {
  const status = extractHttpStatus(err)
  if (status === 429) return true
  if (status === 403) {
    return extractReasons(err).some((reason) => RATE_LIMIT_REASONS.has(reason))
  }
  return false
}

/** Rate limits, timeouts, 5xx and dropped connections: worth another attempt. */
export function isTransientError(err: unknown): boolean {
  if (isRateLimitError(err)) return true
  const status = extractHttpStatus(err)
  if (status === 408 || (status !== undefined && status >= 500 && status < 600)) return true
  const code = extractSystemCode(err)
  return code !== undefined && TRANSIENT_NETWORK_CODES.has(code)
}

/** Detect auth-like errors from googleapis structured errors and OAuth refresh failures.
 *  This is the boundary layer that converts untyped library exceptions into AuthError values. */
export function isAuthLikeError(err: unknown): boolean {
  const status = extractHttpStatus(err)
  if (status === 401) return true
  if (status === 403 && !isRateLimitError(err)) return true
  const msg = String(err)
  return msg.includes('Invalid Credentials') || msg.includes('Unauthorized') || msg.includes('invalid_grant')
}

export function isNotFoundError(err: unknown): boolean {
  return extractHttpStatus(err) === 404
}

// ---------------------------------------------------------------------------
// Retry
// ---------------------------------------------------------------------------

export interface RetryOptions {
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
  /** Called before each backoff sleep; attempt is the one that just failed. */
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void
  sleep?: (ms: number) => Promise<void>
}

export const DEFAULT_RETRY: RetryOptions = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export function backoffDelay(attempt: number, { baseDelayMs, maxDelayMs }: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs'>): number {
  return Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt - 1))
}

/** Retry transient failures with exponential backoff.
 *  Non-transient errors and the last failed attempt are rethrown as-is. */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = DEFAULT_RETRY): Promise<T> {
  const wait = options.sleep ?? sleep
  const maxAttempts = Math.max(1, options.maxAttempts)

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn()
    } catch (err) {
      if (!isTransientError(err) || attempt >= maxAttempts) throw err
      const delayMs = backoffDelay(attempt, options)
      options.onRetry?.({ attempt, delayMs, error: err })
      await wait(delayMs)
    }
  }
}

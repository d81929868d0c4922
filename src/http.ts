/**
 * HTTP Utilities
 *
 * Typed fetch wrapper and uniform mapping of HTTP and network failures onto
 * remote failure kinds.
 */

import type { RemoteFailureKind, Result } from './types'

/** Default per-request timeout */
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000

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
  /** Caller cancellation */
  readonly signal?: AbortSignal | undefined
  /** Abort the request after this many milliseconds */
  readonly timeoutMs?: number | undefined
}

/**
 * Perform a fetch request with a timeout and optional caller cancellation.
 * `read` consumes the response while both still apply, so a body that
 * stalls after the headers still times out.
 */
export async function httpFetch<T>(
  url: string,
  init: RequestInit,
  read: (response: HttpResponse) => Promise<T>,
  options: HttpFetchOptions = {}
): Promise<T> {
  const controller = new AbortController()
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
  const aborted = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
      once: true
    })
  })
  const timer = setTimeout(() => {
    const error = new Error(`Request timed out after ${timeoutMs}ms`)
    error.name = 'TimeoutError'
    controller.abort(error)
  }, timeoutMs)
  const onAbort = () => controller.abort(options.signal?.reason)
  if (options.signal?.aborted) {
    onAbort()
  } else {
    options.signal?.addEventListener('abort', onAbort, { once: true })
  }

  try {
    const exchange = fetch(url, { ...init, signal: controller.signal }).then(read)
    return await Promise.race([exchange, aborted])
  } finally {
    clearTimeout(timer)
    options.signal?.removeEventListener('abort', onAbort)
  }
}

/**
 * Map an HTTP status to a failure kind.
 */
export function classifyStatus(status: number): RemoteFailureKind {
  if (status === 429) return 'rate_limit'
  if (status === 401 || status === 403) return 'auth'
  if (status === 408 || status === 504) return 'timeout'
  if (status === 400 || status === 404 || status === 413 || status === 422) {
    return 'invalid_request'
  }
  if (status >= 500) return 'network'
  return 'unknown'
}

function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined
  const seconds = Number.parseInt(value, 10)
  return Number.isNaN(seconds) ? undefined : seconds
}

/**
 * Handle HTTP error responses uniformly across all providers.
 */
export async function handleHttpError(response: HttpResponse): Promise<Result<never>> {
  const errorText = await response.text()
  const type = classifyStatus(response.status)

  switch (type) {
    case 'rate_limit':
      return {
        ok: false,
        error: {
          type,
          message: `Rate limited: ${errorText}`,
          retryAfter: parseRetryAfter(response.headers.get('retry-after'))
        }
      }
    case 'auth':
      return { ok: false, error: { type, message: `Authentication failed: ${errorText}` } }
    case 'invalid_request':
      return {
        ok: false,
        error: { type, message: `Bad request (${response.status}): ${errorText}` }
      }
    default:
      return { ok: false, error: { type, message: `API error ${response.status}: ${errorText}` } }
  }
}

/**
 * Handle network errors uniformly across all providers.
 * An abort caused by the caller's signal is a cancellation; any other abort
 * is the request timeout.
 */
export function handleNetworkError(error: unknown, signal?: AbortSignal): Result<never> {
  if (signal?.aborted) {
    return { ok: false, error: { type: 'cancelled', message: 'Request cancelled' } }
  }
  const message = error instanceof Error ? error.message : String(error)
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return { ok: false, error: { type: 'timeout', message: `Request timed out: ${message}` } }
  }
  return { ok: false, error: { type: 'network', message: `Network error: ${message}` } }
}

/**
 * Create an error result for empty API responses.
 */
export function emptyResponseError(): Result<never> {
  return { ok: false, error: { type: 'invalid_response', message: 'Empty response from API' } }
}

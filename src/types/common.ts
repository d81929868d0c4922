/**
 * Common Types
 *
 * Shared types used across modules: Result, remote failures, operations.
 */

// Result Types

/**
 * Failure classification for a remote model call.
 *
 * The retry policy branches on this discriminator rather than on
 * exception classes.
 */
export type RemoteFailureKind =
  | 'rate_limit'
  | 'timeout'
  | 'network'
  | 'auth'
  | 'invalid_request'
  | 'invalid_response'
  | 'cancelled'
  | 'unknown'

export interface ApiError {
  readonly type: RemoteFailureKind
  readonly message: string
  /** Seconds the service asked us to wait (HTTP Retry-After) */
  readonly retryAfter?: number | undefined
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ApiError }

// Operation Types

export type OperationKind = 'summarize' | 'ask' | 'extract_entities'

export interface ExtractedEntities {
  readonly people: readonly string[]
  readonly dates: readonly string[]
  readonly locations: readonly string[]
}

export interface ExecutorStats {
  readonly hits: number
  readonly misses: number
  readonly remoteCalls: number
  readonly cacheErrors: number
}

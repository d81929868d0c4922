/**
 * Error Types
 *
 * Errors surfaced at the public API boundary. Below that boundary, remote
 * failures travel as Result values with a `type` discriminator.
 */

import type { RemoteFailureKind } from './types'

/**
 * The remote model call failed: either a terminal failure kind was hit
 * or every retry attempt was used up.
 */
export class RemoteCallFailed extends Error {
  readonly kind: RemoteFailureKind
  readonly attempts: number
  readonly retryAfter: number | undefined

  constructor(
    kind: RemoteFailureKind,
    message: string,
    attempts: number,
    retryAfter?: number | undefined
  ) {
    const plural = attempts === 1 ? 'attempt' : 'attempts'
    super(`Remote call failed after ${attempts} ${plural}: ${message}`)
    this.name = 'RemoteCallFailed'
    this.kind = kind
    this.attempts = attempts
    this.retryAfter = retryAfter
  }

  get isRateLimited(): boolean {
    return this.kind === 'rate_limit'
  }
}

export type CacheOperation = 'read' | 'write' | 'clear'

/**
 * The cache's backing medium failed (disk full, permission denied, ...).
 */
export class CacheBackendError extends Error {
  readonly operation: CacheOperation
  override readonly cause: unknown

  constructor(operation: CacheOperation, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`Cache ${operation} failed: ${detail}`)
    this.name = 'CacheBackendError'
    this.operation = operation
    this.cause = cause
  }
}

/**
 * Model output could not be decoded into the entity record.
 */
export class MalformedExtractionResponse extends Error {
  readonly raw: string
  readonly reason: string

  constructor(raw: string, reason: string) {
    super(`Malformed extraction response: ${reason}`)
    this.name = 'MalformedExtractionResponse'
    this.raw = raw
    this.reason = reason
  }
}

/**
 * Invalid configuration. Raised while resolving config, never mid-request.
 */
export class ConfigurationError extends Error {
  readonly issues: readonly string[]

  constructor(issues: readonly string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`)
    this.name = 'ConfigurationError'
    this.issues = issues
  }
}

/**
 * Caller passed input an operation cannot work with (e.g. blank text).
 */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidInputError'
  }
}

/**
 * Retry Policy
 *
 * Bounded exponential backoff with jitter around a single remote call.
 * Calls report failures as Result values; the policy branches on the
 * failure's `type` to decide between retrying and giving up.
 */

import type { ApiError, RemoteFailureKind, Result } from '../types'

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>

export interface RetryPolicy {
  /** Total attempts including the first one */
  readonly maxAttempts: number
  /** Delay before the second attempt */
  readonly baseDelayMs: number
  /** Growth factor applied per attempt */
  readonly multiplier: number
  /** Extra random delay, as a fraction of the computed delay */
  readonly jitterFraction: number
  /** Upper bound for any single wait */
  readonly maxDelayMs: number
}

export interface RetryOptions extends Partial<RetryPolicy> {
  readonly signal?: AbortSignal | undefined
  readonly sleep?: SleepFn | undefined
  /** Uniform random source in [0, 1) */
  readonly random?: (() => number) | undefined
  /** Called before each wait */
  readonly onRetry?: ((attempt: RetryAttempt) => void) | undefined
}

/**
 * One failed attempt. Only lives for the duration of a withRetry() call.
 */
export interface RetryAttempt {
  readonly attempt: number
  readonly kind: RemoteFailureKind
  readonly message: string
  readonly retryable: boolean
  /** Wait before the next attempt (0 when there is none) */
  readonly delayMs: number
}

export type RetryOutcome<T> =
  | { readonly ok: true; readonly value: T; readonly attempts: number }
  | {
      readonly ok: false
      readonly error: ApiError
      readonly attempts: number
      readonly history: readonly RetryAttempt[]
    }

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  multiplier: 2,
  jitterFraction: 0.1,
  maxDelayMs: 30_000
}

const RETRYABLE_KINDS: ReadonlySet<RemoteFailureKind> = new Set([
  'rate_limit',
  'timeout',
  'network',
  'invalid_response',
  'unknown'
])

/**
 * Transient failures are worth another attempt. Auth and malformed requests
 * fail the same way every time, and a cancelled call must stop.
 */
export function isRetryable(kind: RemoteFailureKind): boolean {
  return RETRYABLE_KINDS.has(kind)
}

/**
 * Wait before attempt `attempt + 1`.
 *
 * base × multiplier^(attempt−1), capped, plus jitter in [0, jitterFraction × delay].
 * A Retry-After hint from the service raises the wait to at least that long.
 */
export function computeDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
  retryAfterSeconds?: number | undefined
): number {
  const exponential = policy.baseDelayMs * policy.multiplier ** (attempt - 1)
  const capped = Math.min(policy.maxDelayMs, exponential)
  const jittered = capped + random() * policy.jitterFraction * capped
  const floor = retryAfterSeconds !== undefined ? retryAfterSeconds * 1000 : 0
  return Math.min(policy.maxDelayMs, Math.max(jittered, floor))
}

/**
 * Timer-based sleep that ends early when the signal aborts.
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })

function cancelledError(): ApiError {
  return { type: 'cancelled', message: 'Operation cancelled' }
}

async function attemptCall<T>(
  call: (attempt: number) => Promise<Result<T>>,
  attempt: number
): Promise<Result<T>> {
  try {
    return await call(attempt)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    return { ok: false, error: { type: 'unknown', message } }
  }
}

/**
 * Run `call` until it succeeds, hits a terminal failure, runs out of
 * attempts, or the signal aborts.
 *
 * @example
 * ```ts
 * const outcome = await withRetry(() => model.invoke(prompt), { maxAttempts: 5 })
 * if (!outcome.ok) console.error(outcome.error.type, outcome.attempts)
 * ```
 */
export async function withRetry<T>(
  call: (attempt: number) => Promise<Result<T>>,
  options: RetryOptions = {}
): Promise<RetryOutcome<T>> {
  const policy: RetryPolicy = {
    maxAttempts: options.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    multiplier: options.multiplier ?? DEFAULT_RETRY_POLICY.multiplier,
    jitterFraction: options.jitterFraction ?? DEFAULT_RETRY_POLICY.jitterFraction,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs
  }
  const wait = options.sleep ?? sleep
  const random = options.random ?? Math.random
  const { signal } = options
  const history: RetryAttempt[] = []

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      return { ok: false, error: cancelledError(), attempts: attempt - 1, history }
    }

    const result = await attemptCall(call, attempt)
    if (result.ok) {
      return { ok: true, value: result.value, attempts: attempt }
    }

    const retryable = isRetryable(result.error.type)
    const exhausted = attempt >= policy.maxAttempts
    if (!retryable || exhausted) {
      history.push({
        attempt,
        kind: result.error.type,
        message: result.error.message,
        retryable,
        delayMs: 0
      })
      return { ok: false, error: result.error, attempts: attempt, history }
    }

    const delayMs = computeDelay(attempt, policy, random, result.error.retryAfter)
    const record: RetryAttempt = {
      attempt,
      kind: result.error.type,
      message: result.error.message,
      retryable,
      delayMs
    }
    history.push(record)
    options.onRetry?.(record)

    await wait(delayMs, signal)
  }
}

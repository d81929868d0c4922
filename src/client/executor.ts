/**
 * Request Executor
 *
 * Cache → call → store around a remote model. Every remote call runs under
 * the retry policy; only successful results are cached.
 */

import { generateFingerprint } from '../cache/key'
import type { CacheEntry, CacheStore } from '../cache/types'
import { CacheBackendError, RemoteCallFailed } from '../errors'
import { type Logger, silentLogger } from '../logger'
import { DEFAULT_RETRY_POLICY, type RetryOptions, withRetry } from '../retry'
import type { ExecutorStats, LanguageModel, OperationKind } from '../types'

export interface CacheEventInfo {
  readonly operation: OperationKind
  readonly fingerprint: string
}

export interface RequestExecutorOptions {
  readonly model: LanguageModel
  readonly cache: CacheStore<string>
  /** Backoff policy plus injectable sleep/random; signal comes per call */
  readonly retry?: Omit<RetryOptions, 'signal' | 'onRetry'> | undefined
  readonly logger?: Logger | undefined
  /** Share one remote call between concurrent identical requests (default true) */
  readonly coalesce?: boolean | undefined
  readonly now?: (() => number) | undefined
  readonly onCacheHit?: ((info: CacheEventInfo) => void) | undefined
  readonly onCacheMiss?: ((info: CacheEventInfo) => void) | undefined
}

export interface ExecuteOptions {
  /** Skip the cache lookup; the fresh result still replaces the cached one */
  readonly noCache?: boolean | undefined
  /** Abort the call, including any backoff wait */
  readonly signal?: AbortSignal | undefined
  /** Ask the service for a JSON response */
  readonly json?: boolean | undefined
}

interface SharedCall {
  readonly promise: Promise<string>
  readonly controller: AbortController
  waiters: number
}

export class RequestExecutor {
  private readonly model: LanguageModel
  private readonly cache: CacheStore<string>
  private readonly retry: Omit<RetryOptions, 'signal' | 'onRetry'>
  private readonly logger: Logger
  private readonly coalesce: boolean
  private readonly now: () => number
  private readonly onCacheHit: ((info: CacheEventInfo) => void) | undefined
  private readonly onCacheMiss: ((info: CacheEventInfo) => void) | undefined
  private readonly inFlight = new Map<string, SharedCall>()
  private hits = 0
  private misses = 0
  private remoteCalls = 0
  private cacheErrors = 0

  constructor(options: RequestExecutorOptions) {
    this.model = options.model
    this.cache = options.cache
    this.retry = options.retry ?? {}
    this.logger = options.logger ?? silentLogger
    this.coalesce = options.coalesce ?? true
    this.now = options.now ?? Date.now
    this.onCacheHit = options.onCacheHit
    this.onCacheMiss = options.onCacheMiss
  }

  /**
   * Fingerprint for an operation and its normalized payload under this
   * executor's model.
   */
  fingerprint(operation: OperationKind, payload: unknown): string {
    return generateFingerprint({ operation, model: this.model.model, payload })
  }

  /**
   * Resolve a request from the cache, or from the remote model on a miss.
   *
   * @throws RemoteCallFailed when the retry policy gives up
   */
  async execute(
    operation: OperationKind,
    payload: unknown,
    prompt: string,
    options: ExecuteOptions = {}
  ): Promise<string> {
    const fingerprint = this.fingerprint(operation, payload)
    const info: CacheEventInfo = { operation, fingerprint }

    if (!options.noCache) {
      const cached = await this.readCache(fingerprint)
      if (cached) {
        this.hits++
        this.logger.verbose(`Cache HIT for ${operation}`)
        this.onCacheHit?.(info)
        return cached.data
      }
      this.misses++
      this.logger.verbose(`Cache MISS for ${operation} - calling API`)
      this.onCacheMiss?.(info)

      if (this.coalesce) {
        const shared = this.inFlight.get(fingerprint)
        if (shared) {
          this.logger.verbose(`Joining in-flight request for ${operation}`)
          return this.join(shared, options.signal)
        }
      }
    }

    if (!this.coalesce || options.noCache) {
      return this.callAndStore(operation, fingerprint, prompt, options)
    }

    if (options.signal?.aborted) {
      throw new RemoteCallFailed('cancelled', 'Request cancelled', 0)
    }

    // The shared call is aborted only once every waiter has gone
    const controller = new AbortController()
    const shared: SharedCall = {
      promise: this.callAndStore(operation, fingerprint, prompt, {
        json: options.json,
        signal: controller.signal
      }).finally(() => {
        if (this.inFlight.get(fingerprint) === shared) {
          this.inFlight.delete(fingerprint)
        }
      }),
      controller,
      waiters: 0
    }
    this.inFlight.set(fingerprint, shared)
    return this.join(shared, options.signal)
  }

  /**
   * Wait on a shared call. A waiter's signal cancels only that waiter.
   */
  private join(shared: SharedCall, signal: AbortSignal | undefined): Promise<string> {
    shared.waiters++
    const leave = () => {
      shared.waiters--
      if (shared.waiters === 0) {
        shared.controller.abort()
      }
    }

    return new Promise<string>((resolve, reject) => {
      const onAbort = () => {
        leave()
        reject(new RemoteCallFailed('cancelled', 'Request cancelled', 0))
      }
      if (signal?.aborted) {
        onAbort()
      } else {
        signal?.addEventListener('abort', onAbort, { once: true })
      }

      shared.promise.then(
        (value) => {
          signal?.removeEventListener('abort', onAbort)
          resolve(value)
        },
        (error: unknown) => {
          signal?.removeEventListener('abort', onAbort)
          reject(error)
        }
      )
    })
  }

  /**
   * Empty the cache.
   * @throws CacheBackendError when the backing medium fails
   */
  async clear(): Promise<void> {
    await this.cache.clear()
    this.logger.verbose('Cache cleared')
  }

  getStats(): ExecutorStats {
    return {
      hits: this.hits,
      misses: this.misses,
      remoteCalls: this.remoteCalls,
      cacheErrors: this.cacheErrors
    }
  }

  private async callAndStore(
    operation: OperationKind,
    fingerprint: string,
    prompt: string,
    options: ExecuteOptions
  ): Promise<string> {
    const maxAttempts = this.retry.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts
    const outcome = await withRetry(
      () => {
        this.remoteCalls++
        return this.model.invoke(prompt, { signal: options.signal, json: options.json })
      },
      {
        ...this.retry,
        signal: options.signal,
        onRetry: (attempt) => {
          const seconds = (attempt.delayMs / 1000).toFixed(1)
          this.logger.warn(
            `API call failed (attempt ${attempt.attempt}/${maxAttempts}). ` +
              `Retrying in ${seconds}s... Error: ${attempt.message}`
          )
        }
      }
    )

    if (!outcome.ok) {
      this.logger.error(`API call for ${operation} failed: ${outcome.error.message}`)
      throw new RemoteCallFailed(
        outcome.error.type,
        outcome.error.message,
        outcome.attempts,
        outcome.error.retryAfter
      )
    }

    await this.writeCache(fingerprint, { data: outcome.value, cachedAt: this.now() })
    return outcome.value
  }

  private async readCache(fingerprint: string): Promise<CacheEntry<string> | null> {
    try {
      return await this.cache.get(fingerprint)
    } catch (error) {
      this.reportCacheError(error, 'read')
      return null
    }
  }

  /**
   * Best effort: a failed write means this result is not cached, nothing more.
   */
  private async writeCache(fingerprint: string, entry: CacheEntry<string>): Promise<void> {
    try {
      await this.cache.put(fingerprint, entry)
    } catch (error) {
      this.reportCacheError(error, 'write')
    }
  }

  private reportCacheError(error: unknown, operation: 'read' | 'write'): void {
    this.cacheErrors++
    const backendError =
      error instanceof CacheBackendError ? error : new CacheBackendError(operation, error)
    this.logger.warn(`${backendError.message} (continuing without cache)`)
  }
}

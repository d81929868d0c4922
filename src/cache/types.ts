/**
 * Response Cache Types
 *
 * Pluggable cache interface for preventing duplicate remote model calls.
 * Implementations: MemoryCache (process lifetime), FileCache (JSON on disk).
 */

import type { CacheBackendError } from '../errors'

/**
 * Cached response wrapper with metadata
 */
export interface CacheEntry<T = string> {
  readonly data: T
  /** Epoch milliseconds when the entry was stored */
  readonly cachedAt: number
}

/**
 * Pluggable cache interface for model responses, keyed by request fingerprint.
 */
export interface CacheStore<T = string> {
  /**
   * Look up an entry. Never rejects: backend failures are reported through
   * the store's error hook and read as a miss.
   * @returns Cached entry or null if not found/expired
   */
  get(fingerprint: string): Promise<CacheEntry<T> | null>

  /**
   * Store an entry, overwriting any entry under the same fingerprint.
   * @throws CacheBackendError when the backing medium fails
   */
  put(fingerprint: string, entry: CacheEntry<T>): Promise<void>

  /**
   * Remove every entry.
   * @throws CacheBackendError when the backing medium fails
   */
  clear(): Promise<void>

  /** Number of live entries */
  size(): Promise<number>
}

export type CachePersistence = 'memory' | 'disk'

/**
 * Eviction and lifetime policy. Everything unset means an unbounded
 * in-memory map with no expiry.
 */
export interface CachePolicy {
  /** Evict the oldest-inserted entry once the store grows past this */
  readonly maxEntries?: number | undefined
  /** Entries older than this read as absent */
  readonly ttlSeconds?: number | undefined
  readonly persistence?: CachePersistence | undefined
  /** Directory for the disk-backed store */
  readonly cacheDir?: string | undefined
}

export interface CacheStoreOptions {
  /** Clock override, for tests */
  readonly now?: (() => number) | undefined
  /** Called when the backend fails in a way the store absorbs */
  readonly onError?: ((error: CacheBackendError) => void) | undefined
}

/**
 * Cache key components for generating a deterministic fingerprint
 */
export interface FingerprintComponents {
  /** Operation name: 'summarize', 'ask', 'extract_entities' */
  readonly operation: string
  /** Model identifier, so answers from one model are never served for another */
  readonly model: string
  /** Normalized request payload (will be JSON stringified with sorted keys) */
  readonly payload: unknown
}

/** Default directory for the disk-backed cache */
export const DEFAULT_CACHE_DIR = '.cache'

/** File name of the disk-backed cache inside the cache directory */
export const CACHE_FILE_NAME = 'llm_cache.json'

/**
 * Cache Module
 *
 * Fingerprint-keyed response caching to prevent duplicate remote calls.
 */

import { FileCache, type FileCacheOptions } from './filesystem'
import { MemoryCache } from './memory'
import { type CachePolicy, type CacheStore, DEFAULT_CACHE_DIR } from './types'

export { FileCache, type FileCacheOptions } from './filesystem'
export { generateFingerprint, normalizeText } from './key'
export { type FileLockOptions, withFileLock } from './lock'
export { MemoryCache } from './memory'
export type {
  CacheEntry,
  CachePersistence,
  CachePolicy,
  CacheStore,
  CacheStoreOptions,
  FingerprintComponents
} from './types'
export { CACHE_FILE_NAME, DEFAULT_CACHE_DIR } from './types'

/**
 * Build the store a policy asks for. Defaults to an unbounded in-memory map.
 */
export function createCacheStore(
  policy: CachePolicy = {},
  options: FileCacheOptions = {}
): CacheStore<string> {
  if (policy.persistence === 'disk') {
    return new FileCache(policy.cacheDir ?? DEFAULT_CACHE_DIR, policy, options)
  }
  return new MemoryCache<string>(policy, options)
}

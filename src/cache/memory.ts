/**
 * In-memory Response Cache
 *
 * Map-backed store that lives as long as the process. Insertion order of the
 * Map doubles as the eviction queue.
 */

import type { CacheEntry, CachePolicy, CacheStore, CacheStoreOptions } from './types'

export class MemoryCache<T = string> implements CacheStore<T> {
  private readonly entries = new Map<string, CacheEntry<T>>()
  private readonly maxEntries: number | undefined
  private readonly ttlMs: number | undefined
  private readonly now: () => number

  constructor(policy: CachePolicy = {}, options: CacheStoreOptions = {}) {
    this.maxEntries = policy.maxEntries
    this.ttlMs = policy.ttlSeconds === undefined ? undefined : policy.ttlSeconds * 1000
    this.now = options.now ?? Date.now
  }

  async get(fingerprint: string): Promise<CacheEntry<T> | null> {
    return this.lookup(fingerprint)
  }

  async put(fingerprint: string, entry: CacheEntry<T>): Promise<void> {
    this.insert(fingerprint, entry)
  }

  async clear(): Promise<void> {
    this.entries.clear()
  }

  async size(): Promise<number> {
    this.pruneExpired()
    return this.entries.size
  }

  /**
   * Synchronous lookup. Expired entries are dropped on the way.
   */
  lookup(fingerprint: string): CacheEntry<T> | null {
    const entry = this.entries.get(fingerprint)
    if (!entry) {
      return null
    }
    if (this.isExpired(entry)) {
      this.entries.delete(fingerprint)
      return null
    }
    return entry
  }

  /**
   * Synchronous insert. Overwriting moves the entry to the back of the
   * eviction queue.
   */
  insert(fingerprint: string, entry: CacheEntry<T>): void {
    this.entries.delete(fingerprint)
    this.entries.set(fingerprint, entry)
    this.evictOverflow()
  }

  /** Snapshot of live entries in insertion order */
  snapshot(): Array<[string, CacheEntry<T>]> {
    this.pruneExpired()
    return [...this.entries]
  }

  /** Replace all entries, keeping the given order */
  restore(entries: Iterable<[string, CacheEntry<T>]>): void {
    this.entries.clear()
    for (const [fingerprint, entry] of entries) {
      this.entries.set(fingerprint, entry)
    }
    this.pruneExpired()
    this.evictOverflow()
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return this.ttlMs !== undefined && this.now() - entry.cachedAt > this.ttlMs
  }

  private pruneExpired(): void {
    if (this.ttlMs === undefined) return
    for (const [fingerprint, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(fingerprint)
      }
    }
  }

  private evictOverflow(): void {
    if (this.maxEntries === undefined) return
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next()
      if (oldest.done) break
      this.entries.delete(oldest.value)
    }
  }
}

import { describe, expect, it } from 'vitest'
import { MemoryCache } from './memory'

describe('MemoryCache', () => {
  it('returns null for a missing fingerprint', async () => {
    const cache = new MemoryCache()
    expect(await cache.get('missing')).toBeNull()
  })

  it('returns what was put', async () => {
    const cache = new MemoryCache()
    await cache.put('abc', { data: 'summary', cachedAt: 1 })
    expect(await cache.get('abc')).toEqual({ data: 'summary', cachedAt: 1 })
    expect(await cache.size()).toBe(1)
  })

  it('overwrites an existing fingerprint', async () => {
    const cache = new MemoryCache()
    await cache.put('abc', { data: 'old', cachedAt: 1 })
    await cache.put('abc', { data: 'new', cachedAt: 2 })
    expect((await cache.get('abc'))?.data).toBe('new')
    expect(await cache.size()).toBe(1)
  })

  it('clears all entries', async () => {
    const cache = new MemoryCache()
    await cache.put('a', { data: '1', cachedAt: 1 })
    await cache.put('b', { data: '2', cachedAt: 1 })
    await cache.clear()
    expect(await cache.size()).toBe(0)
    expect(await cache.get('a')).toBeNull()
  })

  describe('maxEntries', () => {
    it('evicts the oldest insertion first', async () => {
      const cache = new MemoryCache({ maxEntries: 2 })
      await cache.put('a', { data: '1', cachedAt: 1 })
      await cache.put('b', { data: '2', cachedAt: 2 })
      await cache.put('c', { data: '3', cachedAt: 3 })

      expect(await cache.get('a')).toBeNull()
      expect((await cache.get('b'))?.data).toBe('2')
      expect((await cache.get('c'))?.data).toBe('3')
    })

    it('treats an overwrite as the newest entry', async () => {
      const cache = new MemoryCache({ maxEntries: 2 })
      await cache.put('a', { data: '1', cachedAt: 1 })
      await cache.put('b', { data: '2', cachedAt: 2 })
      await cache.put('a', { data: '1b', cachedAt: 3 })
      await cache.put('c', { data: '3', cachedAt: 4 })

      expect(await cache.get('b')).toBeNull()
      expect((await cache.get('a'))?.data).toBe('1b')
    })
  })

  describe('ttlSeconds', () => {
    it('expires entries once they are older than the TTL', async () => {
      let now = 10_000
      const cache = new MemoryCache({ ttlSeconds: 60 }, { now: () => now })
      await cache.put('a', { data: '1', cachedAt: now })

      now += 60_000
      expect((await cache.get('a'))?.data).toBe('1')

      now += 1
      expect(await cache.get('a')).toBeNull()
      expect(await cache.size()).toBe(0)
    })

    it('serves a zero TTL entry only within the millisecond it was stored', async () => {
      let now = 5_000
      const cache = new MemoryCache({ ttlSeconds: 0 }, { now: () => now })
      await cache.put('a', { data: '1', cachedAt: now })

      expect((await cache.get('a'))?.data).toBe('1')

      now += 1
      expect(await cache.get('a')).toBeNull()
    })

    it('keeps entries forever without a TTL', async () => {
      let now = 0
      const cache = new MemoryCache({}, { now: () => now })
      await cache.put('a', { data: '1', cachedAt: 0 })
      now = Number.MAX_SAFE_INTEGER
      expect((await cache.get('a'))?.data).toBe('1')
    })
  })

  it('restores a snapshot in order', () => {
    const cache = new MemoryCache({ maxEntries: 2 })
    cache.restore([
      ['a', { data: '1', cachedAt: 1 }],
      ['b', { data: '2', cachedAt: 2 }],
      ['c', { data: '3', cachedAt: 3 }]
    ])
    expect(cache.snapshot().map(([key]) => key)).toEqual(['b', 'c'])
  })
})

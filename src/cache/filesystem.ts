/**
 * Filesystem-based Response Cache
 *
 * Persists cached model responses in a single JSON document so they survive
 * restarts. Lifetime and size policy are enforced by an in-memory mirror.
 *
 * Layout:
 * ```
 * .cache/
 * ├── llm_cache.json        { "version": 1, "entries": { "<fingerprint>": { data, cachedAt } } }
 * └── llm_cache.json.lock   (present only while a write is in progress)
 * ```
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'
import { CacheBackendError, type CacheOperation } from '../errors'
import { type FileLockOptions, withFileLock } from './lock'
import { MemoryCache } from './memory'
import {
  CACHE_FILE_NAME,
  type CacheEntry,
  type CachePolicy,
  type CacheStore,
  type CacheStoreOptions
} from './types'

const CACHE_FILE_VERSION = 1

const cacheDocumentSchema = z.object({
  version: z.literal(CACHE_FILE_VERSION),
  entries: z.record(
    z.string(),
    z.object({
      data: z.string(),
      cachedAt: z.number()
    })
  )
})

type CacheDocument = z.infer<typeof cacheDocumentSchema>

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export interface FileCacheOptions extends CacheStoreOptions {
  readonly lock?: FileLockOptions | undefined
}

export class FileCache implements CacheStore<string> {
  readonly filePath: string
  private readonly memory: MemoryCache<string>
  private readonly onError: ((error: CacheBackendError) => void) | undefined
  private readonly lockOptions: FileLockOptions | undefined
  private loading: Promise<void> | null = null
  private writeChain: Promise<void> = Promise.resolve()

  constructor(
    private readonly cacheDir: string,
    policy: CachePolicy = {},
    options: FileCacheOptions = {}
  ) {
    this.filePath = join(cacheDir, CACHE_FILE_NAME)
    this.memory = new MemoryCache<string>(policy, options)
    this.onError = options.onError
    this.lockOptions = options.lock
  }

  async get(fingerprint: string): Promise<CacheEntry<string> | null> {
    await this.ensureLoaded()
    return this.memory.lookup(fingerprint)
  }

  async put(fingerprint: string, entry: CacheEntry<string>): Promise<void> {
    await this.ensureLoaded()
    this.memory.insert(fingerprint, entry)
    await this.persist('write')
  }

  async clear(): Promise<void> {
    await this.ensureLoaded()
    this.memory.restore([])
    await this.persist('clear')
  }

  async size(): Promise<number> {
    await this.ensureLoaded()
    return this.memory.size()
  }

  private ensureLoaded(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load()
    }
    return this.loading
  }

  /**
   * Read the document from disk. A missing file is an empty cache; an
   * unreadable or unexpected one is reported and also read as empty.
   */
  private async load(): Promise<void> {
    let raw: string
    try {
      raw = await readFile(this.filePath, 'utf-8')
    } catch (error) {
      if (!isMissingFile(error)) {
        this.onError?.(new CacheBackendError('read', error))
      }
      return
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (error) {
      this.onError?.(new CacheBackendError('read', error))
      return
    }

    const parsed = cacheDocumentSchema.safeParse(json)
    if (!parsed.success) {
      this.onError?.(
        new CacheBackendError('read', new Error(`unexpected cache file shape in ${this.filePath}`))
      )
      return
    }
    this.memory.restore(Object.entries(parsed.data.entries))
  }

  /**
   * Rewrite the document. Writes are serialized; each one snapshots the
   * mirror inside the lock, so the last write carries every change.
   */
  private persist(operation: CacheOperation): Promise<void> {
    const run = this.writeChain.then(() => this.writeDocument(operation))
    // The caller observes failures through `run`; the chain itself moves on.
    this.writeChain = run.catch(() => undefined)
    return run
  }

  private async writeDocument(operation: CacheOperation): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`
    try {
      await mkdir(this.cacheDir, { recursive: true })
      await withFileLock(
        `${this.filePath}.lock`,
        async () => {
          const document: CacheDocument = {
            version: CACHE_FILE_VERSION,
            entries: Object.fromEntries(this.memory.snapshot())
          }
          try {
            await writeFile(tempPath, JSON.stringify(document, null, 2))
            await rename(tempPath, this.filePath)
          } finally {
            await rm(tempPath, { force: true })
          }
        },
        this.lockOptions
      )
    } catch (error) {
      throw new CacheBackendError(operation, error)
    }
  }
}

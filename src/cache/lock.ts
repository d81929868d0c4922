/**
 * Cache File Lock
 *
 * Exclusive lock file guarding rewrites of the on-disk cache. The lock is a
 * sibling file created with O_EXCL; it is released on every exit path.
 */

import { open, stat, unlink } from 'node:fs/promises'

export interface FileLockOptions {
  /** Locks older than this are considered abandoned and broken */
  readonly staleMs?: number | undefined
  /** Delay between acquisition attempts */
  readonly pollMs?: number | undefined
  /** Give up after this long */
  readonly timeoutMs?: number | undefined
}

const DEFAULT_STALE_MS = 30_000
const DEFAULT_POLL_MS = 25
const DEFAULT_TIMEOUT_MS = 5_000

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}

async function breakIfStale(lockPath: string, staleMs: number): Promise<void> {
  try {
    const stats = await stat(lockPath)
    if (Date.now() - stats.mtimeMs > staleMs) {
      await unlink(lockPath)
    }
  } catch (error) {
    // Released between our open() and stat(): try again
    if (!isErrnoCode(error, 'ENOENT')) throw error
  }
}

/**
 * Run `fn` while holding the lock at `lockPath`.
 */
export async function withFileLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options: FileLockOptions = {}
): Promise<T> {
  const staleMs = options.staleMs ?? DEFAULT_STALE_MS
  const pollMs = options.pollMs ?? DEFAULT_POLL_MS
  const deadline = Date.now() + (options.timeoutMs ?? DEFAULT_TIMEOUT_MS)

  for (;;) {
    let handle: Awaited<ReturnType<typeof open>>
    try {
      handle = await open(lockPath, 'wx')
    } catch (error) {
      if (!isErrnoCode(error, 'EEXIST')) throw error
      if (Date.now() >= deadline) {
        throw new Error(`Timed out waiting for cache lock ${lockPath}`)
      }
      await breakIfStale(lockPath, staleMs)
      await new Promise((resolve) => setTimeout(resolve, pollMs))
      continue
    }

    try {
      await handle.writeFile(String(process.pid))
      return await fn()
    } finally {
      try {
        await handle.close()
      } finally {
        await unlink(lockPath).catch((error: unknown) => {
          if (!isErrnoCode(error, 'ENOENT')) throw error
        })
      }
    }
  }
}

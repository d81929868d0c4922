/**
 * Test Support Module
 *
 * In-process stand-ins for the remote model and the logger.
 */

import type { Logger } from '../logger'
import type { ApiError, InvokeOptions, LanguageModel, Result } from '../types'

export interface FakeModelCall {
  readonly prompt: string
  readonly options: InvokeOptions
}

export interface FakeModel extends LanguageModel {
  readonly calls: FakeModelCall[]
}

type FakeReply = string | ApiError | ((prompt: string) => string | ApiError)

function toResult(reply: string | ApiError): Result<string> {
  return typeof reply === 'string' ? { ok: true, value: reply } : { ok: false, error: reply }
}

/**
 * A LanguageModel that answers from a script. Replies are used in order;
 * the last one repeats once the script runs out.
 */
export function createFakeModel(replies: FakeReply | FakeReply[], model = 'fake-model'): FakeModel {
  const script = Array.isArray(replies) ? replies : [replies]
  const calls: FakeModelCall[] = []

  return {
    provider: 'fake',
    model,
    calls,
    invoke: async (prompt, options = {}) => {
      calls.push({ prompt, options })
      const reply = script[Math.min(calls.length, script.length) - 1] ?? ''
      return toResult(typeof reply === 'function' ? reply(prompt) : reply)
    }
  }
}

export interface HeldModel extends FakeModel {
  /** Settle every call still waiting */
  release(reply: string | ApiError): void
}

/**
 * A LanguageModel whose calls stay pending until released. A call whose
 * signal aborts settles at once as cancelled.
 */
export function createHeldModel(model = 'held-model'): HeldModel {
  const calls: FakeModelCall[] = []
  let waiting: ((reply: string | ApiError) => void)[] = []

  return {
    provider: 'fake',
    model,
    calls,
    invoke: (prompt, options = {}) => {
      calls.push({ prompt, options })
      return new Promise((resolve) => {
        const settle = (reply: string | ApiError) => resolve(toResult(reply))
        waiting.push(settle)
        options.signal?.addEventListener(
          'abort',
          () => settle({ type: 'cancelled', message: 'Request cancelled' }),
          { once: true }
        )
      })
    },
    release: (reply) => {
      const settling = waiting
      waiting = []
      for (const settle of settling) settle(reply)
    }
  }
}

export interface RecordingLogger extends Logger {
  readonly lines: { level: keyof Logger; msg: string }[]
}

/**
 * Logger that keeps every line for assertions.
 */
export function createRecordingLogger(): RecordingLogger {
  const lines: { level: keyof Logger; msg: string }[] = []
  const record = (level: keyof Logger) => (msg: string) => {
    lines.push({ level, msg })
  }
  return {
    lines,
    log: record('log'),
    verbose: record('verbose'),
    success: record('success'),
    warn: record('warn'),
    error: record('error')
  }
}

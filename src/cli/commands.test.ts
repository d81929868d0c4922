import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Readable } from 'node:stream'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { MemoryCache } from '../cache/memory'
import { SmartQAClient } from '../client'
import { resolveClientConfig } from '../config'
import {
  CacheBackendError,
  ConfigurationError,
  InvalidInputError,
  MalformedExtractionResponse,
  RemoteCallFailed
} from '../errors'
import { createFakeModel, createRecordingLogger } from '../test-support'
import type { CLIArgs } from './args'
import {
  type CommandContext,
  describeError,
  EXIT_CONFIG,
  EXIT_FAILURE,
  EXIT_RATE_LIMITED,
  exitCodeFor,
  frame,
  runCommand
} from './commands'

const RULE = '='.repeat(60)

function cliArgs(overrides: Partial<CLIArgs>): CLIArgs {
  return {
    command: 'help',
    file: undefined,
    question: undefined,
    save: undefined,
    strict: false,
    clearCache: false,
    noCache: false,
    cacheDir: undefined,
    configFile: undefined,
    quiet: false,
    verbose: false,
    ...overrides
  }
}

describe('CLI commands', () => {
  let tempDir: string
  let output: string[]

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'smart-qa-commands-test-'))
    output = []
  })

  afterEach(() => {
    if (existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true })
    }
  })

  function setup(replies: Parameters<typeof createFakeModel>[0], stdin = '') {
    const model = createFakeModel(replies)
    const cache = new MemoryCache<string>()
    const logger = createRecordingLogger()
    const client = new SmartQAClient(resolveClientConfig({ apiKey: 'test-key' }), {
      model,
      cache,
      logger,
      sleep: async () => {}
    })
    const ctx: CommandContext = {
      client,
      logger,
      write: (text) => output.push(text),
      stdin: Readable.from([stdin])
    }
    return { ctx, model, cache, logger }
  }

  function inputFile(content: string): string {
    const path = join(tempDir, 'input.txt')
    writeFileSync(path, content)
    return path
  }

  describe('frame', () => {
    it('frames a result between rules', () => {
      expect(frame('SUMMARY:', 'Short.')).toBe(`\n${RULE}\nSUMMARY:\n${RULE}\nShort.\n${RULE}\n`)
    })
  })

  describe('summarize', () => {
    it('prints the summary of a file', async () => {
      const { ctx } = setup('Short.')

      await runCommand(cliArgs({ command: 'summarize', file: inputFile('Long text.') }), ctx)

      expect(output).toEqual([frame('SUMMARY:', 'Short.')])
    })

    it('reads stdin when no file is given', async () => {
      const { ctx, model } = setup('Short.', 'Piped text.')

      await runCommand(cliArgs({ command: 'summarize' }), ctx)

      expect(model.calls[0]?.prompt).toBe(
        'Provide a concise summary of the following text:\n\nPiped text.'
      )
    })

    it('saves the summary', async () => {
      const { ctx } = setup('Short.')
      const save = join(tempDir, 'out', 'summary.txt')

      await runCommand(cliArgs({ command: 'summarize', file: inputFile('Long.'), save }), ctx)

      expect(readFileSync(save, 'utf-8')).toBe('Short.')
    })
  })

  describe('ask', () => {
    it('prints and saves the answer with its question', async () => {
      const { ctx } = setup('Blue.')
      const save = join(tempDir, 'answer.txt')

      await runCommand(
        cliArgs({
          command: 'ask',
          file: inputFile('The sky is blue.'),
          question: 'What color is the sky?',
          save
        }),
        ctx
      )

      expect(output).toEqual([frame('QUESTION: What color is the sky?', 'Blue.')])
      expect(readFileSync(save, 'utf-8')).toBe('Question: What color is the sky?\n\nAnswer: Blue.')
    })
  })

  describe('extract', () => {
    const raw = '{"people": ["John"], "dates": [], "locations": ["Paris"]}'
    const json = JSON.stringify({ people: ['John'], dates: [], locations: ['Paris'] }, null, 2)

    it('prints and saves the entities as JSON', async () => {
      const { ctx } = setup(raw)
      const save = join(tempDir, 'entities.json')

      await runCommand(
        cliArgs({ command: 'extract', file: inputFile('John lives in Paris.'), save }),
        ctx
      )

      expect(output).toEqual([frame('EXTRACTED ENTITIES:', json)])
      expect(readFileSync(save, 'utf-8')).toBe(json)
    })

    it('prints empty lists for malformed output', async () => {
      const { ctx } = setup('not json')

      await runCommand(cliArgs({ command: 'extract', file: inputFile('Text.') }), ctx)

      const empty = JSON.stringify({ people: [], dates: [], locations: [] }, null, 2)
      expect(output).toEqual([frame('EXTRACTED ENTITIES:', empty)])
    })

    it('fails on malformed output with --strict', async () => {
      const { ctx } = setup('not json')

      await expect(
        runCommand(cliArgs({ command: 'extract', file: inputFile('Text.'), strict: true }), ctx)
      ).rejects.toBeInstanceOf(MalformedExtractionResponse)
      expect(output).toEqual([])
    })
  })

  describe('clear-cache', () => {
    it('clears the cache on its own', async () => {
      const { ctx, cache, logger } = setup('unused')
      await cache.put('k', { data: 'v', cachedAt: 1 })

      await runCommand(cliArgs({ command: 'clear-cache' }), ctx)

      expect(await cache.size()).toBe(0)
      expect(logger.lines).toContainEqual({ level: 'success', msg: 'Cache cleared!' })
      expect(output).toEqual([])
    })

    it('clears the cache before running a command', async () => {
      const { ctx, model } = setup(['first', 'second'])
      const file = inputFile('Same text.')

      await runCommand(cliArgs({ command: 'summarize', file }), ctx)
      await runCommand(cliArgs({ command: 'summarize', file, clearCache: true }), ctx)

      expect(model.calls).toHaveLength(2)
      expect(output[1]).toBe(frame('SUMMARY:', 'second'))
    })
  })

  it('does not call the model for a missing file', async () => {
    const { ctx, model } = setup('unused')

    await expect(
      runCommand(cliArgs({ command: 'summarize', file: join(tempDir, 'nope.txt') }), ctx)
    ).rejects.toBeInstanceOf(InvalidInputError)
    expect(model.calls).toHaveLength(0)
  })
})

describe('exitCodeFor', () => {
  it('maps configuration errors to 2', () => {
    expect(exitCodeFor(new ConfigurationError(['apiKey: missing']))).toBe(EXIT_CONFIG)
  })

  it('maps rate limiting to 3', () => {
    expect(exitCodeFor(new RemoteCallFailed('rate_limit', 'slow down', 3))).toBe(EXIT_RATE_LIMITED)
  })

  it('maps other failures to 1', () => {
    expect(exitCodeFor(new RemoteCallFailed('auth', 'bad key', 1))).toBe(EXIT_FAILURE)
    expect(exitCodeFor(new Error('boom'))).toBe(EXIT_FAILURE)
  })
})

describe('describeError', () => {
  it('explains rate limiting with the retry hint', () => {
    expect(describeError(new RemoteCallFailed('rate_limit', 'slow down', 3, 20))).toBe(
      'Rate limited by the API after 3 attempt(s). Retry after 20s. Please wait and try again.'
    )
  })

  it('prefixes API failures', () => {
    expect(describeError(new RemoteCallFailed('auth', 'bad key', 1))).toBe(
      'API Error: Remote call failed after 1 attempt: bad key'
    )
  })

  it('prefixes input and cache failures', () => {
    expect(describeError(new InvalidInputError('Text cannot be empty'))).toBe(
      'Validation Error: Text cannot be empty'
    )
    expect(describeError(new CacheBackendError('clear', new Error('EACCES')))).toBe(
      'Cache Error: Cache clear failed: EACCES'
    )
  })

  it('passes other errors through', () => {
    expect(describeError('plain')).toBe('plain')
  })
})

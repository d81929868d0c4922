import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Readable } from 'node:stream'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { InvalidInputError } from '../errors'
import { readInputFile, readStream, writeOutputFile } from './io'

describe('CLI I/O', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'smart-qa-io-test-'))
  })

  afterEach(() => {
    if (existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true })
    }
  })

  describe('readInputFile', () => {
    it('reads the file content', async () => {
      const path = join(tempDir, 'input.txt')
      writeFileSync(path, 'Some text.\n')
      expect(await readInputFile(path)).toBe('Some text.\n')
    })

    it('rejects a missing file', async () => {
      const path = join(tempDir, 'missing.txt')
      await expect(readInputFile(path)).rejects.toThrow(`File '${path}' not found`)
    })

    it('rejects a blank file', async () => {
      const path = join(tempDir, 'blank.txt')
      writeFileSync(path, '  \n\n')
      await expect(readInputFile(path)).rejects.toBeInstanceOf(InvalidInputError)
      await expect(readInputFile(path)).rejects.toThrow(`File '${path}' is empty`)
    })
  })

  describe('readStream', () => {
    it('joins string and byte chunks', async () => {
      const stream = Readable.from(['Hello, ', Buffer.from('world')])
      expect(await readStream(stream)).toBe('Hello, world')
    })
  })

  describe('writeOutputFile', () => {
    it('creates parent directories', async () => {
      const path = join(tempDir, 'nested', 'dir', 'out.txt')
      await writeOutputFile(path, 'result')
      expect(readFileSync(path, 'utf-8')).toBe('result')
    })
  })
})

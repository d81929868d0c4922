/**
 * CLI File I/O
 *
 * Input reading (file or stdin) and result writing for the CLI.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { InvalidInputError } from '../errors'

/**
 * Read all of a stream as UTF-8 text.
 */
export async function readStream(stream: AsyncIterable<string | Uint8Array>): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk))
  }
  return Buffer.concat(chunks).toString('utf-8')
}

/**
 * Read an input file. Missing and blank files are rejected.
 */
export async function readInputFile(path: string): Promise<string> {
  if (!existsSync(path)) {
    throw new InvalidInputError(`File '${path}' not found`)
  }
  const content = await readFile(path, 'utf-8')
  if (!content.trim()) {
    throw new InvalidInputError(`File '${path}' is empty`)
  }
  return content
}

/**
 * Write a result file, creating parent directories as needed.
 */
export async function writeOutputFile(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, content, 'utf-8')
}

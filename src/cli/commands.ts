/**
 * CLI Commands
 *
 * One handler per subcommand. Handlers print the framed result, optionally
 * save it, and let errors propagate to the entry point for exit-code mapping.
 */

import type { SmartQAClient } from '../client'
import {
  CacheBackendError,
  ConfigurationError,
  InvalidInputError,
  MalformedExtractionResponse,
  RemoteCallFailed
} from '../errors'
import type { Logger } from '../logger'
import type { ExtractedEntities } from '../types'
import type { CLIArgs } from './args'
import { readInputFile, readStream, writeOutputFile } from './io'

const RULE = '='.repeat(60)

export interface CommandContext {
  readonly client: SmartQAClient
  readonly logger: Logger
  /** Result output (stdout) */
  readonly write: (text: string) => void
  readonly stdin: AsyncIterable<string | Uint8Array>
}

/**
 * Format a result block framed by rules.
 */
export function frame(title: string, body: string): string {
  return `\n${RULE}\n${title}\n${RULE}\n${body}\n${RULE}\n`
}

async function readInput(args: CLIArgs, ctx: CommandContext, what: string): Promise<string> {
  if (args.file) {
    return readInputFile(args.file)
  }
  ctx.logger.log(`Enter ${what} (press Ctrl+D when done):`)
  return readStream(ctx.stdin)
}

async function save(path: string | undefined, content: string, ctx: CommandContext): Promise<void> {
  if (!path) return
  await writeOutputFile(path, content)
  ctx.logger.success(`Saved to: ${path}`)
}

export async function cmdSummarize(args: CLIArgs, ctx: CommandContext): Promise<void> {
  ctx.logger.log('📝 Summarizing text...')
  const text = await readInput(args, ctx, 'text to summarize')

  const summary = await ctx.client.summarize(text, { noCache: args.noCache })

  ctx.write(frame('SUMMARY:', summary))
  await save(args.save, summary, ctx)
}

export async function cmdAsk(args: CLIArgs, ctx: CommandContext): Promise<void> {
  const question = args.question ?? ''
  ctx.logger.log('❓ Answering question...')
  const context = await readInput(args, ctx, 'context')

  const answer = await ctx.client.ask(context, question, { noCache: args.noCache })

  ctx.write(frame(`QUESTION: ${question}`, answer))
  await save(args.save, `Question: ${question}\n\nAnswer: ${answer}`, ctx)
}

export async function cmdExtract(args: CLIArgs, ctx: CommandContext): Promise<void> {
  ctx.logger.log('🔍 Extracting entities...')
  const text = await readInput(args, ctx, 'text to extract entities from')

  let entities: ExtractedEntities
  if (args.strict) {
    const decoded = await ctx.client.extractEntitiesStrict(text, { noCache: args.noCache })
    if (!decoded.ok) throw decoded.error
    entities = decoded.entities
  } else {
    entities = await ctx.client.extractEntities(text, { noCache: args.noCache })
  }

  const json = JSON.stringify(entities, null, 2)
  ctx.write(frame('EXTRACTED ENTITIES:', json))
  await save(args.save, json, ctx)
}

export async function cmdClearCache(ctx: CommandContext): Promise<void> {
  ctx.logger.log('🧹 Clearing cache...')
  await ctx.client.clearCache()
  ctx.logger.success('Cache cleared!')
}

/**
 * Dispatch a parsed command line.
 */
export async function runCommand(args: CLIArgs, ctx: CommandContext): Promise<void> {
  // --clear-cache runs before the command (or alone)
  if (args.clearCache || args.command === 'clear-cache') {
    await cmdClearCache(ctx)
  }

  switch (args.command) {
    case 'summarize':
      await cmdSummarize(args, ctx)
      break
    case 'ask':
      await cmdAsk(args, ctx)
      break
    case 'extract':
      await cmdExtract(args, ctx)
      break
    case 'clear-cache':
    case 'help':
      break
  }
}

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_CONFIG = 2
export const EXIT_RATE_LIMITED = 3

/**
 * Map a failure to the process exit code.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigurationError) return EXIT_CONFIG
  if (error instanceof RemoteCallFailed && error.isRateLimited) return EXIT_RATE_LIMITED
  return EXIT_FAILURE
}

/**
 * User-facing message for a failure.
 */
export function describeError(error: unknown): string {
  if (error instanceof RemoteCallFailed && error.isRateLimited) {
    const wait = error.retryAfter !== undefined ? ` Retry after ${error.retryAfter}s.` : ''
    return `Rate limited by the API after ${error.attempts} attempt(s).${wait} Please wait and try again.`
  }
  if (error instanceof RemoteCallFailed) return `API Error: ${error.message}`
  if (error instanceof InvalidInputError) return `Validation Error: ${error.message}`
  if (error instanceof MalformedExtractionResponse) return `Extraction Error: ${error.message}`
  if (error instanceof CacheBackendError) return `Cache Error: ${error.message}`
  return error instanceof Error ? error.message : String(error)
}

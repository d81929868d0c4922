/**
 * Smart Q&A Client
 *
 * Summarize, ask and extract on top of the request executor. Each operation
 * validates its input, builds a prompt and a normalized payload, and shapes
 * the raw model text into its return type.
 */

import { createCacheStore } from '../cache'
import { normalizeText } from '../cache/key'
import type { CacheStore } from '../cache/types'
import type { ClientConfig } from '../config'
import { InvalidInputError, type MalformedExtractionResponse } from '../errors'
import { type Logger, silentLogger } from '../logger'
import { createLanguageModel } from '../providers'
import type { SleepFn } from '../retry'
import type { ExecutorStats, ExtractedEntities, LanguageModel } from '../types'
import { type CacheEventInfo, type ExecuteOptions, RequestExecutor } from './executor'
import { buildAskPrompt, buildExtractionPrompt, buildSummarizePrompt } from './prompts'
import { emptyEntities, type ExtractionDecodeResult, parseExtractionResponse } from './response-parser'

export { type CacheEventInfo, type ExecuteOptions, RequestExecutor } from './executor'
export { buildAskPrompt, buildExtractionPrompt, buildSummarizePrompt, NO_ANSWER_REPLY } from './prompts'
export {
  emptyEntities,
  type ExtractionDecodeResult,
  extractJsonFromResponse,
  parseExtractionResponse
} from './response-parser'

/**
 * Collaborators that may be swapped out, mostly for tests.
 */
export interface ClientDependencies {
  /** Remote model; built from the config's provider settings when omitted */
  readonly model?: LanguageModel | undefined
  /** Cache store; built from the config's cache policy when omitted */
  readonly cache?: CacheStore<string> | undefined
  readonly logger?: Logger | undefined
  readonly sleep?: SleepFn | undefined
  readonly random?: (() => number) | undefined
  readonly now?: (() => number) | undefined
  readonly onCacheHit?: ((info: CacheEventInfo) => void) | undefined
  /** Called when extraction output could not be decoded */
  readonly onWarning?: ((error: MalformedExtractionResponse) => void) | undefined
}

export type OperationOptions = Omit<ExecuteOptions, 'json'>

function requireText(value: string, message: string): void {
  if (!value || !value.trim()) {
    throw new InvalidInputError(message)
  }
}

export class SmartQAClient {
  private readonly executor: RequestExecutor
  private readonly logger: Logger
  private readonly onWarning: ((error: MalformedExtractionResponse) => void) | undefined

  constructor(config: ClientConfig, deps: ClientDependencies = {}) {
    this.logger = deps.logger ?? silentLogger
    this.onWarning = deps.onWarning

    const model =
      deps.model ??
      createLanguageModel({
        provider: config.provider,
        apiKey: config.apiKey,
        model: config.model,
        maxOutputTokens: config.maxOutputTokens,
        temperature: config.temperature,
        requestTimeoutMs: config.requestTimeoutMs
      })
    const cache =
      deps.cache ??
      createCacheStore(config.cache, {
        now: deps.now,
        onError: (error) => this.logger.warn(`${error.message}, starting fresh`)
      })

    this.executor = new RequestExecutor({
      model,
      cache,
      retry: { ...config.retry, sleep: deps.sleep, random: deps.random },
      logger: this.logger,
      coalesce: config.coalesce,
      now: deps.now,
      onCacheHit: deps.onCacheHit
    })
    this.logger.verbose(`Client ready (${model.provider}/${model.model})`)
  }

  /**
   * Summarize the given text.
   */
  async summarize(text: string, options: OperationOptions = {}): Promise<string> {
    requireText(text, 'Text cannot be empty')
    return this.executor.execute(
      'summarize',
      { text: normalizeText(text) },
      buildSummarizePrompt(text.trim()),
      options
    )
  }

  /**
   * Answer a question based only on the provided context. Both the context
   * and the question are part of the fingerprint.
   */
  async ask(context: string, question: string, options: OperationOptions = {}): Promise<string> {
    requireText(context, 'Context cannot be empty')
    requireText(question, 'Question cannot be empty')
    return this.executor.execute(
      'ask',
      { context: normalizeText(context), question: normalizeText(question) },
      buildAskPrompt(context.trim(), question.trim()),
      options
    )
  }

  /**
   * Extract people, dates and locations. Undecodable model output degrades to
   * empty lists plus a warning.
   */
  async extractEntities(text: string, options: OperationOptions = {}): Promise<ExtractedEntities> {
    const decoded = await this.extractEntitiesStrict(text, options)
    if (decoded.ok) {
      return decoded.entities
    }
    this.logger.warn(`${decoded.error.message}; returning empty entities`)
    this.onWarning?.(decoded.error)
    return emptyEntities()
  }

  /**
   * Extract entities, returning the decode failure instead of recovering.
   * The raw model text is what gets cached, so a cache hit decodes the same way.
   */
  async extractEntitiesStrict(
    text: string,
    options: OperationOptions = {}
  ): Promise<ExtractionDecodeResult> {
    requireText(text, 'Text cannot be empty')
    const raw = await this.executor.execute(
      'extract_entities',
      { text: normalizeText(text) },
      buildExtractionPrompt(text.trim()),
      { ...options, json: true }
    )
    return parseExtractionResponse(raw)
  }

  /**
   * Clear all cached results.
   * @throws CacheBackendError when the cache cannot be cleared
   */
  async clearCache(): Promise<void> {
    await this.executor.clear()
  }

  getStats(): ExecutorStats {
    return this.executor.getStats()
  }
}

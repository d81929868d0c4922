/**
 * Provider Types
 *
 * The contract between the client and a remote model service.
 */

import type { Result } from './common'

export type LlmProvider = 'google' | 'openai' | 'anthropic'

export interface ProviderConfig {
  readonly provider: LlmProvider
  readonly apiKey: string
  /** API model name; defaults per provider */
  readonly model?: string | undefined
  readonly maxOutputTokens?: number | undefined
  readonly temperature?: number | undefined
  readonly requestTimeoutMs?: number | undefined
}

export interface InvokeOptions {
  readonly signal?: AbortSignal | undefined
  /** Ask the service for a JSON response where it supports that */
  readonly json?: boolean | undefined
}

/**
 * A remote model: one prompt in, text or a classified failure out.
 */
export interface LanguageModel {
  readonly provider: string
  readonly model: string
  invoke(prompt: string, options?: InvokeOptions): Promise<Result<string>>
}

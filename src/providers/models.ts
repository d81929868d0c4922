/**
 * Provider Defaults
 *
 * Default models, endpoints and credential variables per provider.
 */

import type { LlmProvider } from '../types'

/** Default models for each provider. */
export const DEFAULT_MODELS: Record<LlmProvider, string> = {
  google: 'gemini-2.5-flash',
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest'
}

export const DEFAULT_PROVIDER: LlmProvider = 'google'

export const DEFAULT_MAX_OUTPUT_TOKENS = 2048

export const PROVIDER_URLS = {
  google: 'https://generativelanguage.googleapis.com/v1beta/models',
  openai: 'https://api.openai.com/v1/chat/completions',
  anthropic: 'https://api.anthropic.com/v1/messages'
} as const satisfies Record<LlmProvider, string>

const API_KEY_ENV_VARS: Record<LlmProvider, string> = {
  google: 'GOOGLE_API_KEY',
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY'
}

export function getValidProviders(): LlmProvider[] {
  return Object.keys(DEFAULT_MODELS).filter(isValidProvider)
}

export function isValidProvider(value: string): value is LlmProvider {
  return value === 'google' || value === 'openai' || value === 'anthropic'
}

/**
 * Get the environment variable holding the API key for a provider.
 */
export function getRequiredApiKeyEnvVar(provider: LlmProvider): string {
  return API_KEY_ENV_VARS[provider]
}

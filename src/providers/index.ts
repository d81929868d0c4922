/**
 * AI Provider API Clients
 *
 * HTTP clients for Google Gemini, OpenAI and Anthropic. Each returns the
 * response text or a classified failure; none of them retry or cache.
 */

import { emptyResponseError, handleHttpError, handleNetworkError, httpFetch } from '../http'
import type { InvokeOptions, LanguageModel, ProviderConfig, Result } from '../types'
import { DEFAULT_MAX_OUTPUT_TOKENS, DEFAULT_MODELS, PROVIDER_URLS } from './models'

export {
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_MODELS,
  DEFAULT_PROVIDER,
  getRequiredApiKeyEnvVar,
  getValidProviders,
  isValidProvider
} from './models'

interface GoogleAIResponse {
  candidates?: Array<{
    content?: {
      parts?: Array<{ text?: string }>
      role?: string
    }
    finishReason?: string
  }>
  promptFeedback?: { blockReason?: string }
}

interface AnthropicResponse {
  content: Array<{ type: string; text?: string }>
}

interface OpenAIResponse {
  choices: Array<{ message: { content: string | null } }>
}

/**
 * Call Gemini generateContent.
 */
async function callGemini(
  prompt: string,
  config: ProviderConfig,
  model: string,
  options: InvokeOptions
): Promise<Result<string>> {
  try {
    return await httpFetch<Result<string>>(
      `${PROVIDER_URLS.google}/${model}:generateContent`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'x-goog-api-key': config.apiKey },
        body: JSON.stringify({
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          generationConfig: {
            maxOutputTokens: config.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
            ...(config.temperature !== undefined && { temperature: config.temperature }),
            ...(options.json && { responseMimeType: 'application/json' })
          }
        })
      },
      async (response) => {
        if (!response.ok) return handleHttpError(response)

        const data = (await response.json()) as GoogleAIResponse
        const blockReason = data.promptFeedback?.blockReason
        if (blockReason) {
          return {
            ok: false,
            error: { type: 'invalid_request', message: `Prompt blocked: ${blockReason}` }
          }
        }
        const parts = data.candidates?.[0]?.content?.parts ?? []
        const text = parts.map((part) => part.text ?? '').join('')
        return text ? { ok: true, value: text } : emptyResponseError()
      },
      { signal: options.signal, timeoutMs: config.requestTimeoutMs }
    )
  } catch (error) {
    return handleNetworkError(error, options.signal)
  }
}

/**
 * Call OpenAI chat completions.
 */
async function callOpenAI(
  prompt: string,
  config: ProviderConfig,
  model: string,
  options: InvokeOptions
): Promise<Result<string>> {
  try {
    return await httpFetch<Result<string>>(
      PROVIDER_URLS.openai,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${config.apiKey}` },
        body: JSON.stringify({
          model,
          messages: [{ role: 'user', content: prompt }],
          max_completion_tokens: config.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
          ...(config.temperature !== undefined && { temperature: config.temperature }),
          ...(options.json && { response_format: { type: 'json_object' } })
        })
      },
      async (response) => {
        if (!response.ok) return handleHttpError(response)

        const data = (await response.json()) as OpenAIResponse
        const text = data.choices[0]?.message?.content
        return text ? { ok: true, value: text } : emptyResponseError()
      },
      { signal: options.signal, timeoutMs: config.requestTimeoutMs }
    )
  } catch (error) {
    return handleNetworkError(error, options.signal)
  }
}

/**
 * Call Anthropic messages.
 */
async function callAnthropic(
  prompt: string,
  config: ProviderConfig,
  model: string,
  options: InvokeOptions
): Promise<Result<string>> {
  try {
    return await httpFetch<Result<string>>(
      PROVIDER_URLS.anthropic,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': config.apiKey,
          'anthropic-version': '2023-06-01'
        },
        body: JSON.stringify({
          model,
          max_tokens: config.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
          ...(config.temperature !== undefined && { temperature: config.temperature }),
          messages: [{ role: 'user', content: prompt }]
        })
      },
      async (response) => {
        if (!response.ok) return handleHttpError(response)

        const data = (await response.json()) as AnthropicResponse
        const text = data.content.find((block) => block.type === 'text')?.text
        return text ? { ok: true, value: text } : emptyResponseError()
      },
      { signal: options.signal, timeoutMs: config.requestTimeoutMs }
    )
  } catch (error) {
    return handleNetworkError(error, options.signal)
  }
}

/**
 * Create the remote model for a provider config.
 */
export function createLanguageModel(config: ProviderConfig): LanguageModel {
  const model = config.model ?? DEFAULT_MODELS[config.provider]
  const call = {
    google: callGemini,
    openai: callOpenAI,
    anthropic: callAnthropic
  }[config.provider]

  return {
    provider: config.provider,
    model,
    invoke: (prompt, options = {}) => call(prompt, config, model, options)
  }
}

/**
 * Client Configuration
 *
 * Schema and validation for the resolved client configuration. Reading
 * configuration sources (environment, files, flags) is the CLI's job; the
 * client only ever sees the validated object produced here.
 */

import { z } from 'zod'
import { DEFAULT_CACHE_DIR } from './cache/types'
import { ConfigurationError } from './errors'
import { DEFAULT_REQUEST_TIMEOUT_MS } from './http'
import { DEFAULT_PROVIDER, getRequiredApiKeyEnvVar } from './providers/models'
import { DEFAULT_RETRY_POLICY } from './retry'

const retrySchema = z.object({
  maxAttempts: z.number().int().min(1).default(DEFAULT_RETRY_POLICY.maxAttempts),
  baseDelayMs: z.number().min(0).default(DEFAULT_RETRY_POLICY.baseDelayMs),
  multiplier: z.number().min(1).default(DEFAULT_RETRY_POLICY.multiplier),
  jitterFraction: z.number().min(0).max(1).default(DEFAULT_RETRY_POLICY.jitterFraction),
  maxDelayMs: z.number().min(0).default(DEFAULT_RETRY_POLICY.maxDelayMs)
})

const cacheSchema = z.object({
  persistence: z.enum(['memory', 'disk']).default('memory'),
  cacheDir: z.string().min(1).default(DEFAULT_CACHE_DIR),
  maxEntries: z.number().int().min(1).optional(),
  ttlSeconds: z.number().min(0).optional()
})

export const clientConfigSchema = z
  .object({
    provider: z.enum(['google', 'openai', 'anthropic']).default(DEFAULT_PROVIDER),
    apiKey: z.string().default(''),
    model: z.string().min(1).optional(),
    maxOutputTokens: z.number().int().min(1).optional(),
    temperature: z.number().min(0).max(2).optional(),
    requestTimeoutMs: z.number().int().min(1).default(DEFAULT_REQUEST_TIMEOUT_MS),
    retry: retrySchema.default({}),
    cache: cacheSchema.default({}),
    coalesce: z.boolean().default(true)
  })
  .superRefine((config, ctx) => {
    if (!config.apiKey.trim()) {
      const envVar = getRequiredApiKeyEnvVar(config.provider)
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['apiKey'],
        message:
          `${envVar} not found in environment variables. ` +
          'Please create a .env file with your API key.'
      })
    }
  })

/** Configuration as supplied; everything but the API key has a default */
export type ClientConfigInput = z.input<typeof clientConfigSchema>

/** Validated configuration with defaults applied */
export type ClientConfig = z.output<typeof clientConfigSchema>

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.')
  return path ? `${path}: ${issue.message}` : issue.message
}

/**
 * Validate untyped configuration (merged from env vars, files, flags).
 *
 * @throws ConfigurationError listing every invalid setting
 */
export function parseClientConfig(input: unknown): ClientConfig {
  const parsed = clientConfigSchema.safeParse(input)
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map(formatIssue))
  }
  return parsed.data
}

/**
 * Validate configuration and apply defaults.
 *
 * @throws ConfigurationError listing every invalid setting
 */
export function resolveClientConfig(input: ClientConfigInput): ClientConfig {
  return parseClientConfig(input)
}

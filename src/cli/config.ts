/**
 * CLI Configuration
 *
 * Resolves the client configuration from, in increasing precedence:
 * built-in CLI defaults, the JSON config file, environment variables
 * (optionally loaded from .env) and command-line flags.
 *
 * Config file: ~/.config/smart-qa/config.json (XDG standard), or
 * --config-file / SMART_QA_CONFIG.
 */

import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { type ClientConfig, parseClientConfig } from '../config'
import { ConfigurationError } from '../errors'
import { DEFAULT_PROVIDER, getRequiredApiKeyEnvVar, isValidProvider } from '../providers/models'

type Env = Record<string, string | undefined>

type ConfigLayer = Record<string, unknown>

/**
 * Settings a command line can override.
 */
export interface ConfigFlags {
  readonly configFile?: string | undefined
  readonly cacheDir?: string | undefined
}

/** The CLI keeps its cache on disk unless told otherwise */
const CLI_DEFAULTS: ConfigLayer = {
  cache: { persistence: 'disk' }
}

/** Environment variable → nested config key */
const ENV_KEYS: ReadonlyArray<readonly [string, readonly string[], 'string' | 'number']> = [
  ['SMART_QA_PROVIDER', ['provider'], 'string'],
  ['SMART_QA_MODEL', ['model'], 'string'],
  ['SMART_QA_MAX_OUTPUT_TOKENS', ['maxOutputTokens'], 'number'],
  ['SMART_QA_TEMPERATURE', ['temperature'], 'number'],
  ['SMART_QA_REQUEST_TIMEOUT_MS', ['requestTimeoutMs'], 'number'],
  ['SMART_QA_MAX_ATTEMPTS', ['retry', 'maxAttempts'], 'number'],
  ['SMART_QA_BASE_DELAY_MS', ['retry', 'baseDelayMs'], 'number'],
  ['SMART_QA_RETRY_MULTIPLIER', ['retry', 'multiplier'], 'number'],
  ['SMART_QA_JITTER_FRACTION', ['retry', 'jitterFraction'], 'number'],
  ['SMART_QA_MAX_DELAY_MS', ['retry', 'maxDelayMs'], 'number'],
  ['SMART_QA_CACHE_DIR', ['cache', 'cacheDir'], 'string'],
  ['SMART_QA_CACHE_PERSISTENCE', ['cache', 'persistence'], 'string'],
  ['SMART_QA_CACHE_MAX_ENTRIES', ['cache', 'maxEntries'], 'number'],
  ['SMART_QA_CACHE_TTL_SECONDS', ['cache', 'ttlSeconds'], 'number']
]

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function setPath(target: Record<string, unknown>, path: readonly string[], value: unknown): void {
  const [head, ...rest] = path
  if (head === undefined) return
  if (rest.length === 0) {
    target[head] = value
    return
  }
  const existing = target[head]
  const child = isRecord(existing) ? existing : {}
  target[head] = child
  setPath(child, rest, value)
}

/**
 * Merge config layers; nested objects merge key by key, later layers win.
 */
export function mergeConfigLayers(...layers: ConfigLayer[]): ConfigLayer {
  const merged: ConfigLayer = {}
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue
      const current = merged[key]
      merged[key] = isRecord(current) && isRecord(value) ? { ...current, ...value } : value
    }
  }
  return merged
}

/**
 * Get XDG config directory path for smart-qa.
 */
function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'smart-qa')
}

/**
 * Get the config file path.
 * Priority: configFile arg > SMART_QA_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string, env: Env = process.env): string {
  if (configFile) {
    return configFile
  }
  if (env.SMART_QA_CONFIG) {
    return env.SMART_QA_CONFIG
  }
  return join(getDefaultConfigDir(), 'config.json')
}

/**
 * Load the config file. A missing file is no config; an unreadable one is
 * a configuration error.
 */
export async function loadConfigFile(path: string): Promise<ConfigLayer | null> {
  if (!existsSync(path)) {
    return null
  }
  let parsed: unknown
  try {
    parsed = JSON.parse(await readFile(path, 'utf-8'))
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError([`config file ${path}: ${detail}`])
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError([`config file ${path}: expected a JSON object`])
  }
  return parsed
}

/**
 * Read SMART_QA_* settings and the provider's API key from the environment.
 * Numbers that fail to parse stay NaN so validation reports them.
 */
export function readEnvConfig(env: Env, provider: string): ConfigLayer {
  const layer: ConfigLayer = {}
  for (const [name, path, kind] of ENV_KEYS) {
    const raw = env[name]
    if (raw === undefined || raw === '') continue
    setPath(layer, path, kind === 'number' ? Number(raw) : raw)
  }
  if (isValidProvider(provider)) {
    const apiKey = env[getRequiredApiKeyEnvVar(provider)]
    if (apiKey) {
      layer.apiKey = apiKey
    }
  }
  return layer
}

/**
 * Resolve and validate the full client configuration.
 *
 * @throws ConfigurationError when a source is unreadable or a value invalid
 */
export async function resolveCliConfig(
  flags: ConfigFlags,
  env: Env = process.env
): Promise<ClientConfig> {
  const fileLayer = (await loadConfigFile(getConfigPath(flags.configFile, env))) ?? {}
  const flagLayer: ConfigLayer = flags.cacheDir ? { cache: { cacheDir: flags.cacheDir } } : {}

  // The provider decides which API key variable to read
  const fileProvider = typeof fileLayer.provider === 'string' ? fileLayer.provider : undefined
  const provider = env.SMART_QA_PROVIDER || fileProvider || DEFAULT_PROVIDER
  const envLayer = readEnvConfig(env, provider)

  return parseClientConfig(mergeConfigLayers(CLI_DEFAULTS, fileLayer, envLayer, flagLayer))
}

/**
 * smart-qa Core Library
 *
 * Summarization, context-grounded question answering and entity extraction
 * over a remote LLM, with fingerprint-keyed caching and bounded retries.
 *
 * The library never reads configuration sources itself: callers resolve a
 * ClientConfig and pass it in, along with any collaborators to swap out.
 */

// Cache module
export {
  CACHE_FILE_NAME,
  type CacheEntry,
  type CachePersistence,
  type CachePolicy,
  type CacheStore,
  type CacheStoreOptions,
  createCacheStore,
  DEFAULT_CACHE_DIR,
  FileCache,
  type FileCacheOptions,
  type FileLockOptions,
  type FingerprintComponents,
  generateFingerprint,
  MemoryCache,
  normalizeText,
  withFileLock
} from './cache/index'
// Client module
export {
  buildAskPrompt,
  buildExtractionPrompt,
  buildSummarizePrompt,
  type CacheEventInfo,
  type ClientDependencies,
  emptyEntities,
  type ExecuteOptions,
  type ExtractionDecodeResult,
  extractJsonFromResponse,
  NO_ANSWER_REPLY,
  type OperationOptions,
  parseExtractionResponse,
  RequestExecutor,
  SmartQAClient
} from './client/index'
// Configuration
export {
  type ClientConfig,
  type ClientConfigInput,
  clientConfigSchema,
  parseClientConfig,
  resolveClientConfig
} from './config'
// Errors
export {
  CacheBackendError,
  type CacheOperation,
  ConfigurationError,
  InvalidInputError,
  MalformedExtractionResponse,
  RemoteCallFailed
} from './errors'
// HTTP
export {
  classifyStatus,
  DEFAULT_REQUEST_TIMEOUT_MS,
  emptyResponseError,
  handleHttpError,
  handleNetworkError,
  type HttpResponse,
  httpFetch
} from './http'
// Logging
export { createLogger, type Logger, silentLogger } from './logger'
// Providers
export {
  createLanguageModel,
  DEFAULT_MODELS,
  DEFAULT_PROVIDER,
  getRequiredApiKeyEnvVar,
  getValidProviders,
  isValidProvider
} from './providers/index'
// Retry policy
export {
  computeDelay,
  DEFAULT_RETRY_POLICY,
  isRetryable,
  type RetryAttempt,
  type RetryOptions,
  type RetryOutcome,
  type RetryPolicy,
  type SleepFn,
  sleep,
  withRetry
} from './retry/index'
// Types
export type {
  ApiError,
  ExecutorStats,
  ExtractedEntities,
  InvokeOptions,
  LanguageModel,
  LlmProvider,
  OperationKind,
  ProviderConfig,
  RemoteFailureKind,
  Result
} from './types'

export const VERSION = '0.1.0'

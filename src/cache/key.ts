/**
 * Request Fingerprints
 *
 * Generates deterministic SHA256 cache keys for model requests.
 */

import { createHash } from 'node:crypto'
import type { FingerprintComponents } from './types'

/**
 * Sort object keys recursively for deterministic JSON stringification
 */
function sortKeys(obj: unknown): unknown {
  if (obj === null || typeof obj !== 'object') {
    return obj
  }

  if (Array.isArray(obj)) {
    return obj.map(sortKeys)
  }

  const sorted: Record<string, unknown> = {}
  const entries = Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  for (const [key, value] of entries) {
    sorted[key] = sortKeys(value)
  }
  return sorted
}

/**
 * Collapse runs of whitespace and trim, so incidental formatting
 * differences map to the same fingerprint.
 */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

/**
 * Generate a deterministic fingerprint from request components.
 *
 * The fingerprint is a SHA256 hash of: operation:model:canonical_payload
 *
 * @example
 * ```ts
 * const key = generateFingerprint({
 *   operation: 'ask',
 *   model: 'gemini-2.5-flash',
 *   payload: { context: 'The sky is blue.', question: 'What color is the sky?' }
 * })
 * // Returns: '5c1f0e9a...' (64 char hex string)
 * ```
 */
export function generateFingerprint(components: FingerprintComponents): string {
  const { operation, model, payload } = components
  const canonical = JSON.stringify(sortKeys(payload))
  const input = `${operation}:${model}:${canonical}`

  return createHash('sha256').update(input).digest('hex')
}

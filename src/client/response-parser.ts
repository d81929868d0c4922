/**
 * Response Parser
 *
 * Decodes entity extraction responses from JSON into typed records.
 * Decoding either yields the full record or a MalformedExtractionResponse;
 * missing or mistyped fields are never defaulted.
 */

import { z } from 'zod'
import { MalformedExtractionResponse } from '../errors'
import type { ExtractedEntities } from '../types'

const entityListSchema = z.array(z.string())

export const extractedEntitiesSchema = z.object({
  people: entityListSchema,
  dates: entityListSchema,
  locations: entityListSchema
})

export type ExtractionDecodeResult =
  | { readonly ok: true; readonly entities: ExtractedEntities }
  | { readonly ok: false; readonly error: MalformedExtractionResponse }

/**
 * A new record with no entities; recoveries never share arrays.
 */
export function emptyEntities(): ExtractedEntities {
  return { people: [], dates: [], locations: [] }
}

/**
 * Pull the JSON object out of a response that might be wrapped in a
 * ```json fence or surrounded by prose.
 */
export function extractJsonFromResponse(response: string): string | null {
  const fenced = response.match(/```(?:json)?\s*([\s\S]*?)\s*```/)
  const body = fenced?.[1] ?? response
  const start = body.indexOf('{')
  const end = body.lastIndexOf('}')
  if (start === -1 || end < start) {
    return null
  }
  return body.slice(start, end + 1)
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
      return `${path}: ${issue.message}`
    })
    .join('; ')
}

/**
 * Decode the model's extraction output.
 */
export function parseExtractionResponse(response: string): ExtractionDecodeResult {
  const fail = (reason: string): ExtractionDecodeResult => ({
    ok: false,
    error: new MalformedExtractionResponse(response, reason)
  })

  const jsonStr = extractJsonFromResponse(response)
  if (jsonStr === null) {
    return fail('no JSON object found in response')
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(jsonStr)
  } catch (error) {
    return fail(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`)
  }

  const decoded = extractedEntitiesSchema.safeParse(parsed)
  if (!decoded.success) {
    return fail(describeIssues(decoded.error))
  }

  return { ok: true, entities: decoded.data }
}

import { createHash } from 'node:crypto'
import { describe, expect, it } from 'vitest'
import { generateFingerprint, normalizeText } from './key'

describe('generateFingerprint', () => {
  it('should generate consistent hash for same inputs', () => {
    const key1 = generateFingerprint({
      operation: 'summarize',
      model: 'gemini-2.5-flash',
      payload: { text: 'hello' }
    })
    const key2 = generateFingerprint({
      operation: 'summarize',
      model: 'gemini-2.5-flash',
      payload: { text: 'hello' }
    })
    expect(key1).toBe(key2)
  })

  it('should generate different hash for different payloads', () => {
    const key1 = generateFingerprint({
      operation: 'summarize',
      model: 'gemini-2.5-flash',
      payload: { text: 'hello' }
    })
    const key2 = generateFingerprint({
      operation: 'summarize',
      model: 'gemini-2.5-flash',
      payload: { text: 'world' }
    })
    expect(key1).not.toBe(key2)
  })

  it('should separate operations with the same payload', () => {
    const payload = { text: 'hello' }
    const summarize = generateFingerprint({ operation: 'summarize', model: 'm', payload })
    const extract = generateFingerprint({ operation: 'extract_entities', model: 'm', payload })
    expect(summarize).not.toBe(extract)
  })

  it('should separate models', () => {
    const payload = { text: 'hello' }
    const a = generateFingerprint({ operation: 'summarize', model: 'model-a', payload })
    const b = generateFingerprint({ operation: 'summarize', model: 'model-b', payload })
    expect(a).not.toBe(b)
  })

  it('should generate 64 character hex string', () => {
    const key = generateFingerprint({ operation: 'ask', model: 'test', payload: {} })
    expect(key).toMatch(/^[a-f0-9]{64}$/)
  })

  it('should normalize object key order for consistent hashing', () => {
    const key1 = generateFingerprint({
      operation: 'ask',
      model: 'm',
      payload: { context: 'The sky is blue.', question: 'What color?' }
    })
    const key2 = generateFingerprint({
      operation: 'ask',
      model: 'm',
      payload: { question: 'What color?', context: 'The sky is blue.' }
    })
    expect(key1).toBe(key2)
  })

  it('should hash operation, model and canonical payload', () => {
    const expected = createHash('sha256').update('ask:m:{"a":1,"b":[{"c":2,"d":3}]}').digest('hex')
    const key = generateFingerprint({
      operation: 'ask',
      model: 'm',
      payload: { b: [{ d: 3, c: 2 }], a: 1 }
    })
    expect(key).toBe(expected)
  })
})

describe('normalizeText', () => {
  it('collapses whitespace runs and trims', () => {
    expect(normalizeText('  The  sky\n\tis   blue. ')).toBe('The sky is blue.')
  })

  it('leaves already-normal text unchanged', () => {
    expect(normalizeText('a b c')).toBe('a b c')
  })
})

import { afterEach, describe, expect, it, vi } from 'vitest'
import { createLogger } from './logger'

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prefixes levels', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const logger = createLogger(false, true)

    logger.log('plain')
    logger.verbose('detail')
    logger.success('done')
    logger.warn('careful')
    logger.error('failed')

    expect(log.mock.calls).toEqual([['plain'], ['  [debug] detail'], ['  ✓ done']])
    expect(warn).toHaveBeenCalledWith('  ⚠ careful')
    expect(error).toHaveBeenCalledWith('  ✗ failed')
  })

  it('keeps warnings and errors when quiet', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const logger = createLogger(true, false)

    logger.log('plain')
    logger.verbose('detail')
    logger.success('done')
    logger.warn('careful')

    expect(log).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledTimes(1)
  })
})

import { describe, it, expect, afterEach, vi } from 'vitest'
import { createLogger, getLogLevel, isLogLevel, setLogLevel } from '../logger.js'

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info')
    vi.restoreAllMocks()
  })

  it('prefixes lines with the scope', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    createLogger('budget').warn('context truncated', 42)
    expect(warn).toHaveBeenCalledWith('[budget] context truncated', 42)
  })

  it('drops lines below the threshold', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const logger = createLogger('turn')

    logger.debug('hidden')
    setLogLevel('warn')
    logger.info('also hidden')
    setLogLevel('debug')
    logger.debug('shown')

    expect(debug).toHaveBeenCalledTimes(1)
    expect(debug).toHaveBeenCalledWith('[turn] shown')
    expect(log).not.toHaveBeenCalled()
    expect(getLogLevel()).toBe('debug')
  })

  it('recognizes level names only', () => {
    expect(isLogLevel('error')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
    expect(isLogLevel('toString')).toBe(false)
  })
})

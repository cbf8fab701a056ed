import { describe, it, expect, vi, afterEach } from 'vitest'

import { createConsoleLogger, silentLogger } from './logger'

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should write warnings and errors to stderr', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {})
    const logger = createConsoleLogger()

    logger.warn('disk almost full')
    logger.error('write failed')

    expect(spy.mock.calls).toEqual([
      ['[warn] disk almost full'],
      ['[error] write failed']
    ])
  })

  it('should drop debug and info unless verbose', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {})

    createConsoleLogger().info('quiet')
    createConsoleLogger().debug('quiet')
    expect(spy).not.toHaveBeenCalled()

    createConsoleLogger(true).info('replayed')
    createConsoleLogger(true).debug('SET a')
    expect(spy.mock.calls).toEqual([['[info] replayed'], ['[debug] SET a']])
  })
})

describe('silentLogger', () => {
  it('should not write anything', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {})

    silentLogger.error('ignored')

    expect(spy).not.toHaveBeenCalled()
    spy.mockRestore()
  })
})

import { describe, expect, it, vi } from 'vitest'
import {
  filteredLogger,
  isLogLevel,
  type Logger,
  prefixedLogger,
  silentLogger,
} from './logger.js'

function spyLogger() {
  const spies = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }
  const logger: Logger = spies
  return { logger, spies }
}

describe('prefixedLogger', () => {
  it('tags every message', () => {
    const { logger, spies } = spyLogger()

    prefixedLogger('plainserve', logger).info('Listening on 127.0.0.1:8080')
    prefixedLogger('plainserve', logger).error('boom', 42)

    expect(spies.info).toHaveBeenCalledWith('[plainserve] Listening on 127.0.0.1:8080')
    expect(spies.error).toHaveBeenCalledWith('[plainserve] boom', 42)
  })
})

describe('filteredLogger', () => {
  it('drops messages below the level', () => {
    const { logger, spies } = spyLogger()
    const filtered = filteredLogger('warn', logger)

    filtered.debug('d')
    filtered.info('i')
    filtered.warn('w')
    filtered.error('e')

    expect(spies.debug).not.toHaveBeenCalled()
    expect(spies.info).not.toHaveBeenCalled()
    expect(spies.warn).toHaveBeenCalledWith('w')
    expect(spies.error).toHaveBeenCalledWith('e')
  })

  it('passes everything at debug', () => {
    const { logger, spies } = spyLogger()

    filteredLogger('debug', logger).debug('trace', { id: 1 })

    expect(spies.debug).toHaveBeenCalledWith('trace', { id: 1 })
  })
})

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('info')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
  })
})

describe('silentLogger', () => {
  it('accepts calls without output', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {})
    silentLogger().error('nothing')
    expect(spy).not.toHaveBeenCalled()
    spy.mockRestore()
  })
})

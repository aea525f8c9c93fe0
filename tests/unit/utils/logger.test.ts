import { describe, expect, it, vi } from 'vitest'
import { createLogger, type Logger } from '../../../src/utils/logger.js'

function createSink(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}

describe('createLogger', () => {
  it('passes info and warnings through by default', () => {
    const sink = createSink()
    const logger = createLogger({}, sink)
    logger.info('hello')
    logger.warn('careful')
    logger.debug('details')
    expect(sink.info).toHaveBeenCalledWith('hello')
    expect(sink.warn).toHaveBeenCalledWith('careful')
    expect(sink.debug).not.toHaveBeenCalled()
  })

  it('mutes everything but errors when quiet', () => {
    const sink = createSink()
    const logger = createLogger({ quiet: true, debug: true }, sink)
    logger.info('hello')
    logger.warn('careful')
    logger.error('broken')
    logger.debug('details')
    expect(sink.info).not.toHaveBeenCalled()
    expect(sink.warn).not.toHaveBeenCalled()
    expect(sink.error).toHaveBeenCalledWith('broken')
    expect(sink.debug).toHaveBeenCalledWith('details')
  })

  it('drops debug output in json mode', () => {
    const sink = createSink()
    createLogger({ json: true, debug: true }, sink).debug('details')
    expect(sink.debug).not.toHaveBeenCalled()
  })
})

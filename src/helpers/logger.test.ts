import { describe, it, expect, vi, afterEach } from 'vitest'
import { createLogger, setLogLevel } from './logger.js'
import { generateRequestId } from './requestId.js'

afterEach(() => {
  setLogLevel('info')
  vi.restoreAllMocks()
})

describe('createLogger', () => {
  it('prefixes lines with level, service and scope', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    createLogger('req123').info('Attempting ingestion to DB')

    expect(log).toHaveBeenCalledTimes(1)
    expect(log.mock.calls[0][0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] \[ingestor\] \[req123\] Attempting ingestion to DB$/,
    )
  })

  it('omits the scope tag for the service logger', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    createLogger().warn('careful')
    expect(warn.mock.calls[0][0]).toMatch(/\] \[WARN\] \[ingestor\] careful$/)
  })

  it('prints the error object after the message', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const cause = new Error('connection refused')
    createLogger('abc').error('write failed', cause)

    expect(error).toHaveBeenCalledTimes(2)
    expect(error.mock.calls[0][0]).toMatch(/\[ERROR\] \[ingestor\] \[abc\] write failed$/)
    expect(error.mock.calls[1][0]).toBe(cause)
  })

  it('drops lines below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    setLogLevel('warn')

    const logger = createLogger()
    logger.debug('hidden')
    logger.info('hidden')
    logger.warn('shown')

    expect(log).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledTimes(1)
  })
})

describe('generateRequestId', () => {
  it('produces 12 lowercase alphanumerics', () => {
    expect(generateRequestId()).toMatch(/^[0-9a-z]{12}$/)
  })

  it('produces a fresh id per call', () => {
    expect(generateRequestId()).not.toBe(generateRequestId())
  })
})

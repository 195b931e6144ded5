import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createLogger, formatPretty, getLogFormat, getLogLevel, setLogLevel } from '../index.js'

function restoreEnv(name: string, value: string | undefined): void {
  if (value === undefined) {
    delete process.env[name]
  } else {
    process.env[name] = value
  }
}

describe('logger', () => {
  const originalFormat = process.env.LOG_FORMAT
  const originalLevel = process.env.LOG_LEVEL

  beforeEach(() => {
    process.env.LOG_FORMAT = 'json'
    delete process.env.LOG_LEVEL
  })

  afterEach(() => {
    vi.restoreAllMocks()
    setLogLevel(null)
    restoreEnv('LOG_FORMAT', originalFormat)
    restoreEnv('LOG_LEVEL', originalLevel)
  })

  it('writes JSON entries with service, component and metadata', () => {
    const consoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {})

    createLogger('scraper').child('pool').info('request sent', { url: 'https://example.com/a' })

    expect(consoleInfo).toHaveBeenCalledTimes(1)
    const payload = JSON.parse(String(consoleInfo.mock.calls[0][0])) as Record<string, unknown>
    expect(payload.service).toBe('scraper')
    expect(payload.component).toBe('pool')
    expect(payload.level).toBe('info')
    expect(payload.message).toBe('request sent')
    expect(payload.url).toBe('https://example.com/a')
  })

  it('nests child components and merges default context', () => {
    const consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    createLogger('scraper').child('fetch', { run: 'r1' }).child('retry').warn('retrying', { attempt: 2 })

    const payload = JSON.parse(String(consoleWarn.mock.calls[0][0])) as Record<string, unknown>
    expect(payload.component).toBe('fetch:retry')
    expect(payload.run).toBe('r1')
    expect(payload.attempt).toBe(2)
  })

  it('drops entries below the configured level', () => {
    const consoleDebug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})

    setLogLevel('error')
    const logger = createLogger('scraper')
    logger.debug('hidden')
    logger.error('shown', {}, new Error('boom'))

    expect(consoleDebug).not.toHaveBeenCalled()
    expect(consoleError).toHaveBeenCalledTimes(1)
    const payload = JSON.parse(String(consoleError.mock.calls[0][0])) as {
      error: { name: string; message: string }
    }
    expect(payload.error.name).toBe('Error')
    expect(payload.error.message).toBe('boom')
  })

  it('reads LOG_LEVEL and LOG_FORMAT from the environment', () => {
    process.env.LOG_LEVEL = 'WARN'
    process.env.LOG_FORMAT = 'pretty'
    expect(getLogLevel()).toBe('warn')
    expect(getLogFormat()).toBe('pretty')

    process.env.LOG_LEVEL = 'verbose'
    expect(getLogLevel()).toBe('info')
  })

  it('formats pretty lines with the component path', () => {
    const line = formatPretty({
      timestamp: '2024-01-01T00:00:00.000Z',
      level: 'info',
      service: 'scraper',
      component: 'pacer',
      message: 'waiting',
    })

    expect(line).toContain('[scraper:pacer]')
    expect(line).toContain('INFO ')
    expect(line.endsWith('waiting')).toBe(true)
  })
})

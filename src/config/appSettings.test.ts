import { describe, it, expect } from 'vitest'
import { ConfigError, loadSettings, parseLogLevel } from './appSettings.js'

const baseEnv = {
  DOCKER_INFLUXDB_HOST: 'http://localhost:8086',
  DOCKER_INFLUXDB_TOKEN: 'test-token',
  DOCKER_INFLUXDB_ORGANIZATION: 'endon',
  DOCKER_INFLUXDB_BUCKET: 'errors',
}

describe('loadSettings', () => {
  it('reads the InfluxDB connection and applies defaults', () => {
    expect(loadSettings(baseEnv)).toEqual({
      httpPort: 80,
      bodyLimit: '1mb',
      logLevel: 'info',
      influx: {
        host: 'http://localhost:8086',
        token: 'test-token',
        organization: 'endon',
        bucket: 'errors',
      },
    })
  })

  it('honours optional overrides', () => {
    const settings = loadSettings({ ...baseEnv, HTTP_PORT: '8080', LOG_LEVEL: 'DEBUG', BODY_LIMIT: '64kb' })
    expect(settings.httpPort).toBe(8080)
    expect(settings.logLevel).toBe('debug')
    expect(settings.bodyLimit).toBe('64kb')
  })

  it.each(Object.keys(baseEnv))('fails fast when %s is missing', key => {
    const env: Record<string, string | undefined> = { ...baseEnv, [key]: undefined }
    expect(() => loadSettings(env)).toThrow(new ConfigError(`Missing environment variable ${key}`))
  })

  it('treats an empty required value as missing', () => {
    expect(() => loadSettings({ ...baseEnv, DOCKER_INFLUXDB_TOKEN: '' })).toThrow(
      'Missing environment variable DOCKER_INFLUXDB_TOKEN',
    )
  })

  it('rejects an invalid port', () => {
    expect(() => loadSettings({ ...baseEnv, HTTP_PORT: 'eighty' })).toThrow(ConfigError)
    expect(() => loadSettings({ ...baseEnv, HTTP_PORT: '70000' })).toThrow(ConfigError)
  })
})

describe('parseLogLevel', () => {
  it('rejects unknown levels', () => {
    expect(() => parseLogLevel('verbose')).toThrow('LOG_LEVEL must be one of: debug, info, warn, error')
  })
})

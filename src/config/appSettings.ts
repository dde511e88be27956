import type { LogLevel } from '../types/index.js'

type Env = Record<string, string | undefined>

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

function env(source: Env, key: string, fallback: string): string {
  return source[key] || fallback
}

/** Read a variable that must be present and non-empty. */
function requireEnv(source: Env, key: string): string {
  const value = source[key]
  if (!value) throw new ConfigError(`Missing environment variable ${key}`)
  return value
}

export function parseLogLevel(raw: string): LogLevel {
  const level = LOG_LEVELS.find(l => l === raw.toLowerCase())
  if (!level) throw new ConfigError(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`)
  return level
}

function parsePort(raw: string): number {
  const port = Number(raw)
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`HTTP_PORT must be an integer between 0 and 65535, got "${raw}"`)
  }
  return port
}

export interface InfluxSettings {
  host: string
  token: string
  organization: string
  bucket: string
}

export interface AppSettings {
  httpPort: number
  /** Max accepted request body, in body-parser notation ("1mb", "100kb") */
  bodyLimit: string
  logLevel: LogLevel
  influx: InfluxSettings
}

/**
 * Build settings from the environment. Throws ConfigError on the first
 * missing or invalid value, so the process never starts half-configured.
 */
export function loadSettings(source: Env = process.env): AppSettings {
  return {
    httpPort: parsePort(env(source, 'HTTP_PORT', '80')),
    bodyLimit: env(source, 'BODY_LIMIT', '1mb'),
    logLevel: parseLogLevel(env(source, 'LOG_LEVEL', 'info')),
    influx: {
      host: requireEnv(source, 'DOCKER_INFLUXDB_HOST'),
      token: requireEnv(source, 'DOCKER_INFLUXDB_TOKEN'),
      organization: requireEnv(source, 'DOCKER_INFLUXDB_ORGANIZATION'),
      bucket: requireEnv(source, 'DOCKER_INFLUXDB_BUCKET'),
    },
  }
}

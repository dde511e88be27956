import type { Logger, LogLevel } from '../types/index.js'

const SERVICE = 'ingestor'
const levels = { debug: 0, info: 1, warn: 2, error: 3 } as const

let currentLevel: number = levels.info

export function setLogLevel(level: LogLevel): void {
  currentLevel = levels[level]
}

function ts(): string {
  return new Date().toISOString()
}

/**
 * Leveled console logger. `scope` is printed after the service tag; request
 * loggers use the correlation id so every line of one request can be grepped.
 */
export function createLogger(scope?: string): Logger {
  const prefix = scope ? `[${SERVICE}] [${scope}]` : `[${SERVICE}]`

  return {
    debug(msg: string) {
      if (currentLevel <= levels.debug) console.log(`[${ts()}] [DEBUG] ${prefix} ${msg}`)
    },
    info(msg: string) {
      if (currentLevel <= levels.info) console.log(`[${ts()}] [INFO] ${prefix} ${msg}`)
    },
    warn(msg: string) {
      if (currentLevel <= levels.warn) console.warn(`[${ts()}] [WARN] ${prefix} ${msg}`)
    },
    error(msg: string, err?: unknown) {
      if (currentLevel <= levels.error) {
        console.error(`[${ts()}] [ERROR] ${prefix} ${msg}`)
        if (err) console.error(err)
      }
    },
  }
}

export const logger = createLogger()

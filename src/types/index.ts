/** Error report as posted by a client service */
export interface ErrorReport {
  service: string
  endpoint: string
  error: string
  traceback?: string
}

/** Tag set indexed by the timeseries store */
export interface ErrorTags {
  service: string
  endpoint: string
}

/** Value payload of a stored point */
export interface ErrorFields {
  error: string
  traceback?: string
}

/** One timestamped record as written to the timeseries store */
export interface StoredPoint {
  measurement: string
  tags: ErrorTags
  fields: ErrorFields
  timestamp: Date
}

/** Write capability consumed by the ingestion endpoint */
export interface TimeseriesStore {
  /**
   * Persist a single point. Resolves once the store acknowledged it.
   * Rejects without writing when `signal` is already aborted.
   */
  write(point: StoredPoint, signal?: AbortSignal): Promise<void>
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  debug(msg: string): void
  info(msg: string): void
  warn(msg: string): void
  error(msg: string, err?: unknown): void
}

/** Per-request state threaded through the route handlers */
export interface RequestContext {
  reqId: string
  log: Logger
  /** Aborted when the client goes away before the response is sent */
  signal: AbortSignal
}

declare global {
  namespace Express {
    interface Locals {
      ctx: RequestContext
    }
  }
}

/**
 * Request-scoped failures. Each carries the HTTP status it maps to and the
 * message returned to the caller; `message` holds the detail that is only logged.
 */
export class IngestError extends Error {
  readonly status: number
  readonly publicMessage: string

  constructor(status: number, publicMessage: string, detail?: string, options?: { cause?: unknown }) {
    super(detail ?? publicMessage, options)
    this.name = 'IngestError'
    this.status = status
    this.publicMessage = publicMessage
  }
}

/** Wrong Content-Type. */
export class ProtocolError extends IngestError {
  constructor(detail?: string) {
    super(415, 'Content-Type must be application/json', detail)
    this.name = 'ProtocolError'
  }
}

/** Unreadable body, invalid JSON or missing required fields. */
export class MalformedInputError extends IngestError {
  constructor(publicMessage: string, detail?: string, options?: { cause?: unknown }) {
    super(400, publicMessage, detail, options)
    this.name = 'MalformedInputError'
  }
}

/** Store write failure. May be transient; the caller decides whether to retry. */
export class PersistenceError extends IngestError {
  constructor(detail?: string, options?: { cause?: unknown }) {
    super(500, 'Error writing point to InfluxDB', detail, options)
    this.name = 'PersistenceError'
  }
}

/**
 * Ingestion REST API — a single route, POST /.
 *
 * Pipeline: attach request context → Content-Type check → body read →
 * decode/validate → build point → blocking store write. Every failure is
 * turned into a response by the router's error handler; nothing escapes the
 * request scope.
 */
import express from 'express'
import type { NextFunction, Request, Response } from 'express'
import { createLogger } from '../helpers/logger.js'
import { generateRequestId } from '../helpers/requestId.js'
import { IngestError, MalformedInputError, PersistenceError, ProtocolError } from '../helpers/errors.js'
import { buildStoredPoint, decodeErrorReport } from '../ingest/errorReport.js'
import type { TimeseriesStore } from '../types/index.js'

interface RouterDeps {
  store: TimeseriesStore
  /** Max accepted body size, body-parser notation */
  bodyLimit?: string
  /** Clock used to stamp points */
  now?: () => Date
}

const JSON_MEDIA_TYPE = 'application/json'

function mediaType(header: string | undefined): string {
  return (header ?? '').split(';')[0].trim().toLowerCase()
}

function attachContext(_req: Request, res: Response, next: NextFunction): void {
  const controller = new AbortController()
  res.on('close', () => {
    if (!res.writableFinished) controller.abort(new Error('Client disconnected'))
  })

  const reqId = generateRequestId()
  res.locals.ctx = { reqId, log: createLogger(reqId), signal: controller.signal }
  next()
}

function requireJson(req: Request, _res: Response, next: NextFunction): void {
  const contentType = req.get('Content-Type')
  if (mediaType(contentType) !== JSON_MEDIA_TYPE) {
    next(new ProtocolError(`Invalid Content-Type. Expected ${JSON_MEDIA_TYPE}, got ${contentType ?? '(none)'}`))
    return
  }
  next()
}

export function createRouter(deps: RouterDeps): express.Router {
  const router = express.Router()
  const now = deps.now ?? (() => new Date())

  // Content-Type is already enforced, so read every body as text and decode it ourselves
  const readBody = express.text({ type: () => true, limit: deps.bodyLimit ?? '1mb' })

  router.post('/', attachContext, requireJson, readBody, async (req, res, next) => {
    const { log, signal } = res.locals.ctx

    try {
      // the text parser leaves a non-string body when the request carries none
      const body: unknown = req.body
      const report = decodeErrorReport(typeof body === 'string' ? body : '')
      const point = buildStoredPoint(report, now())

      log.info(`Attempting ingestion to DB (service=${report.service}, endpoint=${report.endpoint})`)

      try {
        await deps.store.write(point, signal)
      } catch (err) {
        if (signal.aborted) {
          log.warn('Client disconnected, write abandoned')
          return
        }
        throw new PersistenceError(`Error writing point to InfluxDB: ${(err as Error).message}`, { cause: err })
      }

      log.debug('Point written')
      res.status(200).json('Error logged')
    } catch (err) {
      next(err)
    }
  })

  // ── Error mapping ─────────────────────────────────────────────

  router.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err)
      return
    }

    const ctx = res.locals.ctx
    const log = ctx ? ctx.log : createLogger()
    const failure = toIngestError(err)

    if (failure instanceof PersistenceError) {
      log.error(failure.message, failure.cause)
    } else {
      log.warn(failure.message)
    }

    res.status(failure.status).json(failure.publicMessage)
  })

  return router
}

/** Map anything thrown in the pipeline onto the error taxonomy. */
function toIngestError(err: unknown): IngestError {
  if (err instanceof IngestError) return err

  // body-parser failures (aborted stream, oversize body, bad charset) carry a `type` tag
  if (err instanceof Error && 'type' in err && typeof err.type === 'string') {
    return new MalformedInputError('Error reading request body', `Error reading request body: ${err.message}`, {
      cause: err,
    })
  }

  return new PersistenceError(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`, {
    cause: err,
  })
}

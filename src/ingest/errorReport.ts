/**
 * ErrorReport decoding and StoredPoint construction.
 *
 * Decoding follows zero-value semantics: a missing key or a JSON null reads as
 * the empty string, anything else that is not a string is a decode failure.
 * Emptiness of the required fields is checked separately so the two failures
 * can be reported with distinct messages.
 */
import { z } from 'zod'
import { MalformedInputError } from '../helpers/errors.js'
import type { ErrorFields, ErrorReport, StoredPoint } from '../types/index.js'

export const MEASUREMENT = 'error_logs'

const optionalString = z
  .string()
  .nullish()
  .transform(v => v ?? '')

const ErrorReportSchema = z.object({
  service: optionalString,
  endpoint: optionalString,
  error: optionalString,
  traceback: optionalString,
})

/** Parse a raw request body into an ErrorReport, or throw MalformedInputError. */
export function decodeErrorReport(body: string): ErrorReport {
  let raw: unknown
  try {
    raw = JSON.parse(body)
  } catch (err) {
    throw new MalformedInputError(
      'Error unmarshalling JSON',
      `Error unmarshalling JSON: ${(err as Error).message}`,
      { cause: err },
    )
  }

  const parsed = ErrorReportSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'payload'
    throw new MalformedInputError(
      'Error unmarshalling JSON',
      `Error unmarshalling JSON: ${where}: ${issue?.message ?? 'invalid'}`,
    )
  }

  const { service, endpoint, error, traceback } = parsed.data
  if (service === '' || endpoint === '' || error === '') {
    throw new MalformedInputError('Missing required fields in the JSON payload')
  }

  return traceback === '' ? { service, endpoint, error } : { service, endpoint, error, traceback }
}

/** Build the point for one validated report, stamped with `now`. */
export function buildStoredPoint(report: ErrorReport, now: Date = new Date()): StoredPoint {
  const fields: ErrorFields = { error: report.error }
  if (report.traceback) fields.traceback = report.traceback

  return {
    measurement: MEASUREMENT,
    tags: { service: report.service, endpoint: report.endpoint },
    fields,
    timestamp: now,
  }
}

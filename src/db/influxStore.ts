/**
 * InfluxDB 2.x sink for error_logs points.
 *
 * Every write opens its own write API and closes it once the single point is
 * flushed, so the returned promise settles with that point's outcome and
 * concurrent requests never share a buffer. Retries are disabled: a failed
 * write is reported to the caller, which decides whether to try again.
 */
import { InfluxDB, Point, setLogger as setInfluxLogger } from '@influxdata/influxdb-client'
import { OrgsAPI } from '@influxdata/influxdb-client-apis'
import { logger } from '../helpers/logger.js'
import type { StoredPoint, TimeseriesStore } from '../types/index.js'

export interface InfluxTarget {
  /** Organization id resolved at startup */
  orgID: string
  bucket: string
}

export function toInfluxPoint(point: StoredPoint): Point {
  const p = new Point(point.measurement)
    .tag('service', point.tags.service)
    .tag('endpoint', point.tags.endpoint)
    .stringField('error', point.fields.error)
    .timestamp(point.timestamp)

  if (point.fields.traceback !== undefined) p.stringField('traceback', point.fields.traceback)
  return p
}

export class InfluxStore implements TimeseriesStore {
  constructor(
    private readonly client: InfluxDB,
    private readonly target: InfluxTarget,
  ) {}

  async write(point: StoredPoint, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted()

    const writeApi = this.client.getWriteApi(this.target.orgID, this.target.bucket, 'ns', {
      maxRetries: 0,
    })
    writeApi.writePoint(toInfluxPoint(point))
    await writeApi.close()
  }
}

/**
 * Look up the organization id for `name`. Throws when the lookup fails or the
 * organization does not exist; the server must not start without it.
 */
export async function resolveOrganizationId(client: InfluxDB, name: string): Promise<string> {
  const orgsApi = new OrgsAPI(client)
  const { orgs } = await orgsApi.getOrgs({ org: name })
  const org = orgs?.find(o => o.name === name)
  if (!org?.id) throw new Error(`InfluxDB organization "${name}" not found`)

  logger.info(`Organization found: ${org.name} (id=${org.id})`)
  return org.id
}

/**
 * Diagnostics from the client library. Its write failures carry no request id
 * and are already logged at ERROR by the request that issued the write, so
 * they go out one level lower here.
 */
function forwardWarning(message: string, error?: unknown): void {
  logger.warn(`influxdb-client: ${message}${error ? ` (${String(error)})` : ''}`)
}

export const influxClientLogger = {
  error: forwardWarning,
  warn: forwardWarning,
}

/** Send the client library's own diagnostics through the service logger. */
export function routeInfluxLogs(): void {
  setInfluxLogger(influxClientLogger)
}

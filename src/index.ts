/**
 * endon-ingestor — error-report ingestion endpoint.
 *
 * Accepts JSON error reports on POST / and writes each one as an error_logs
 * point to InfluxDB. Startup is fail-fast: missing configuration or an
 * unresolvable organization stops the process before it listens.
 */
import 'dotenv/config'
import http from 'node:http'
import express from 'express'
import { InfluxDB } from '@influxdata/influxdb-client'

import { loadSettings } from './config/appSettings.js'
import { logger, setLogLevel } from './helpers/logger.js'
import { InfluxStore, resolveOrganizationId, routeInfluxLogs } from './db/influxStore.js'
import { createRouter } from './servers/restApi.js'

let httpServer: http.Server | null = null

// ── Startup ────────────────────────────────────────────────────

async function start(): Promise<void> {
  logger.info('=== ingestor starting ===')

  const settings = loadSettings()
  setLogLevel(settings.logLevel)
  routeInfluxLogs()

  const influx = new InfluxDB({ url: settings.influx.host, token: settings.influx.token })

  let orgID: string
  try {
    orgID = await resolveOrganizationId(influx, settings.influx.organization)
  } catch (err) {
    logger.error(`Failed to lookup organization named "${settings.influx.organization}"`, err)
    throw new Error('Cannot start server without InfluxDB organization access')
  }

  const store = new InfluxStore(influx, { orgID, bucket: settings.influx.bucket })

  const app = express()
  app.disable('x-powered-by')
  app.use('/', createRouter({ store, bodyLimit: settings.bodyLimit }))

  const server = http.createServer(app)
  httpServer = server

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject)
    server.listen(settings.httpPort, () => {
      server.off('error', reject)
      logger.info(`HTTP server listening on :${settings.httpPort}`)
      resolve()
    })
  })

  logger.info('=== ingestor ready ===')
}

// ── Graceful shutdown ──────────────────────────────────────────

let shuttingDown = false
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return
  shuttingDown = true
  logger.info(`${signal} received, shutting down...`)

  const server = httpServer
  if (server) {
    await new Promise<void>(resolve => {
      server.close(err => {
        if (err) logger.warn(`HTTP server close: ${err.message}`)
        resolve()
      })
    })
  }

  logger.info('ingestor shutdown complete')
  process.exit(0)
}

process.on('SIGTERM', () => void shutdown('SIGTERM'))
process.on('SIGINT', () => void shutdown('SIGINT'))

start().catch(err => {
  logger.error('ingestor failed to start', err)
  process.exit(1)
})

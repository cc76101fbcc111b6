/**
 * HTTP API: express app factory and the ApiServer service that listens.
 *
 * Endpoints:
 *   POST /webhook/prometheus              accept an alert, start its pipeline
 *   GET  /incidents                       incident summaries (status, service, limit)
 *   GET  /incidents/:id                   incident detail with timeline
 *   POST /incidents/:id/approve-merge     approve a held merge
 *   POST /incidents/:id/reject-merge      reject a held merge
 *   GET  /health                          provider readiness and modes
 */

import { createServer } from 'node:http'
import type { Server } from 'node:http'
import type { AddressInfo } from 'node:net'
import express from 'express'
import type { Express } from 'express'
import type { BaseService } from '../core/lifecycle.js'
import type { IncidentService } from '../modules/incident-service/incident-service.js'
import { createLogger } from '../utils/logger.js'
import { handleHealth } from './handlers/health.js'
import type { HealthDeps } from './handlers/health.js'
import {
  handleApproveMerge,
  handleGetIncident,
  handleListIncidents,
  handleRejectMerge,
} from './handlers/incidents.js'
import { handleAlertWebhook } from './handlers/webhook.js'
import { handleNotFound, handleUncaught, requestLogger } from './shared.js'

const logger = createLogger('api:server')

export interface ApiDeps {
  service: IncidentService
  health: Omit<HealthDeps, 'inFlight'>
}

export function createApiApp(deps: ApiDeps): Express {
  const app = express()

  app.disable('x-powered-by')
  app.use(express.json({ limit: '1mb' }))
  app.use(requestLogger)

  app.post('/webhook/prometheus', handleAlertWebhook(deps))
  app.get('/incidents', handleListIncidents(deps))
  app.get('/incidents/:id', handleGetIncident(deps))
  app.post('/incidents/:id/approve-merge', handleApproveMerge(deps))
  app.post('/incidents/:id/reject-merge', handleRejectMerge(deps))
  app.get('/health', handleHealth({ ...deps.health, inFlight: () => deps.service.inFlightCount }))

  app.use(handleNotFound)
  app.use(handleUncaught)
  return app
}

// ---------------------------------------------------------------------------
// ApiServer
// ---------------------------------------------------------------------------

export interface ApiServerOptions {
  app: Express
  host: string
  port: number
}

export class ApiServer implements BaseService {
  private readonly _options: ApiServerOptions
  private _server: Server | null = null

  constructor(options: ApiServerOptions) {
    this._options = options
  }

  /** Bound address once listening; port 0 binds an ephemeral port */
  get address(): AddressInfo | null {
    const address = this._server?.address()
    return address !== undefined && address !== null && typeof address !== 'string' ? address : null
  }

  async initialize(): Promise<void> {
    if (this._server !== null) return
    const server = createServer(this._options.app)
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(this._options.port, this._options.host, () => {
        server.off('error', reject)
        resolve()
      })
    })
    this._server = server
    logger.info({ host: this._options.host, port: this.address?.port }, 'HTTP API listening')
  }

  async shutdown(): Promise<void> {
    const server = this._server
    if (server === null) return
    this._server = null
    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err !== undefined) reject(err)
        else resolve()
      })
    })
    logger.info('HTTP API stopped')
  }
}

import type { Request, Response } from 'express'
import type { ProviderReadiness } from '../../modules/integrations/types.js'
import { sendOk } from '../shared.js'

const startTime = Date.now()

export interface HealthDeps {
  readiness: () => Record<string, ProviderReadiness>
  inFlight: () => number
  storageDriver: string
}

export interface HealthData {
  status: 'ok' | 'degraded'
  uptimeSeconds: number
  storage: string
  inFlightIncidents: number
  providers: Record<string, ProviderReadiness>
}

/** GET /health — provider readiness and modes */
export function handleHealth(deps: HealthDeps) {
  return (_req: Request, res: Response): void => {
    const providers = deps.readiness()
    const data: HealthData = {
      status: Object.values(providers).every((p) => p.ready) ? 'ok' : 'degraded',
      uptimeSeconds: Math.floor((Date.now() - startTime) / 1000),
      storage: deps.storageDriver,
      inFlightIncidents: deps.inFlight(),
      providers,
    }
    sendOk(res, data)
  }
}

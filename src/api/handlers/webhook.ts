import type { Request, Response } from 'express'
import { AlertPayloadSchema } from '../../modules/incidents/schemas.js'
import type { IncidentService } from '../../modules/incident-service/incident-service.js'
import { describeZodError, sendError, sendMappedError, sendOk } from '../shared.js'
import type { AlertAccepted } from '../types.js'

export interface WebhookDeps {
  service: Pick<IncidentService, 'createIncident'>
}

/** POST /webhook/prometheus — accept an Alertmanager payload and start its pipeline */
export function handleAlertWebhook(deps: WebhookDeps) {
  return async (req: Request, res: Response): Promise<void> => {
    const parsed = AlertPayloadSchema.safeParse(req.body)
    if (!parsed.success) {
      sendError(res, describeZodError(parsed.error), 400, 'VALIDATION_ERROR')
      return
    }

    try {
      const record = await deps.service.createIncident(parsed.data, { source: 'prometheus_webhook' })
      const accepted: AlertAccepted = {
        status: 'accepted',
        incidentId: record.incidentId,
        severity: record.severity,
      }
      sendOk(res, accepted, 202)
    } catch (err) {
      sendMappedError(res, err)
    }
  }
}

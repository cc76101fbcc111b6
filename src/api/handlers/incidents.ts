import type { Request, Response } from 'express'
import { z } from 'zod'
import type { IncidentService } from '../../modules/incident-service/incident-service.js'
import { IncidentStatusSchema } from '../../modules/incidents/schemas.js'
import { describeZodError, sendError, sendMappedError, sendOk } from '../shared.js'

export interface IncidentDeps {
  service: IncidentService
}

export const MAX_LIST_LIMIT = 100

const ListQuerySchema = z.object({
  status: IncidentStatusSchema.optional(),
  service: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(MAX_LIST_LIMIT).default(50),
})

const ApproveBodySchema = z.object({ actor: z.string().min(1).optional() }).default({})

const RejectBodySchema = z
  .object({
    reason: z.string().min(1).optional(),
    actor: z.string().min(1).optional(),
  })
  .default({})

/** GET /incidents — summaries, newest first */
export function handleListIncidents(deps: IncidentDeps) {
  return async (req: Request, res: Response): Promise<void> => {
    const query = ListQuerySchema.safeParse(req.query)
    if (!query.success) {
      sendError(res, describeZodError(query.error), 400, 'VALIDATION_ERROR')
      return
    }
    try {
      const { status, service, limit } = query.data
      const incidents = await deps.service.listIncidents({ status, serviceName: service, limit })
      sendOk(res, { incidents, count: incidents.length })
    } catch (err) {
      sendMappedError(res, err)
    }
  }
}

/** GET /incidents/:id */
export function handleGetIncident(deps: IncidentDeps) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      sendOk(res, await deps.service.getIncident(req.params.id ?? ''))
    } catch (err) {
      sendMappedError(res, err)
    }
  }
}

/** POST /incidents/:id/approve-merge */
export function handleApproveMerge(deps: IncidentDeps) {
  return async (req: Request, res: Response): Promise<void> => {
    const body = ApproveBodySchema.safeParse(req.body ?? {})
    if (!body.success) {
      sendError(res, describeZodError(body.error), 400, 'VALIDATION_ERROR')
      return
    }
    try {
      const record = await deps.service.approveMerge(req.params.id ?? '', body.data.actor)
      sendOk(res, { incidentId: record.incidentId, status: record.status, approvalStatus: record.approvalStatus })
    } catch (err) {
      sendMappedError(res, err)
    }
  }
}

/** POST /incidents/:id/reject-merge */
export function handleRejectMerge(deps: IncidentDeps) {
  return async (req: Request, res: Response): Promise<void> => {
    const body = RejectBodySchema.safeParse(req.body ?? {})
    if (!body.success) {
      sendError(res, describeZodError(body.error), 400, 'VALIDATION_ERROR')
      return
    }
    try {
      const record = await deps.service.rejectMerge(req.params.id ?? '', body.data.reason, body.data.actor)
      sendOk(res, {
        incidentId: record.incidentId,
        status: record.status,
        approvalStatus: record.approvalStatus,
        errorMessage: record.errorMessage,
      })
    } catch (err) {
      sendMappedError(res, err)
    }
  }
}

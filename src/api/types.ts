/**
 * Response envelope shared by every HTTP endpoint.
 */

export interface ApiEnvelope<T = unknown> {
  ok: boolean
  data?: T
  error?: string
  /** Machine-readable error code, e.g. "INCIDENT_NOT_FOUND" or an InvalidState reason */
  code?: string
  correlationId?: string
  timestamp: string
}

export interface AlertAccepted {
  status: 'accepted'
  incidentId: string
  severity: string
}

/**
 * PatchwardenEvents — every typed event carried by the event bus.
 *
 * Event naming convention: {subject}:{action} (e.g. "stage:completed").
 */

import type { IncidentId, IncidentStatus, Severity, StageName } from './types.js'

// ---------------------------------------------------------------------------
// PatchwardenEvents
// ---------------------------------------------------------------------------

export interface PatchwardenEvents {
  // -------------------------------------------------------------------------
  // Incident lifecycle
  // -------------------------------------------------------------------------

  /** A new incident was accepted and its pipeline scheduled */
  'incident:created': { incidentId: IncidentId; severity: Severity; serviceName: string }

  /** The incident moved along a state-machine edge */
  'incident:status-changed': { incidentId: IncidentId; from: IncidentStatus; to: IncidentStatus }

  /** Reconciliation acted on an incident left without a running task */
  'incident:reconciled': { incidentId: IncidentId; action: 'resumed' | 'failed' | 'expired' }

  // -------------------------------------------------------------------------
  // Stage execution
  // -------------------------------------------------------------------------

  'stage:started': { incidentId: IncidentId; stage: StageName }

  'stage:completed': { incidentId: IncidentId; stage: StageName; durationMs: number }

  /** Final failure of a stage, after retries */
  'stage:failed': {
    incidentId: IncidentId
    stage: StageName
    error: string
    kind: 'transient' | 'permanent'
  }

  /** A transient failure is about to be retried */
  'stage:retrying': {
    incidentId: IncidentId
    stage: StageName
    attempt: number
    maxAttempts: number
    delayMs: number
  }
}

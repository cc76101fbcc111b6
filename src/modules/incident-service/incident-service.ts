/**
 * IncidentService — the boundary the HTTP API, the CLI and the reconciler
 * talk to. It owns the in-flight pipeline tasks: one supervised task chain
 * per incident, whose crash marks the incident FAILED.
 */

import type { BaseService } from '../../core/lifecycle.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { LeaseSettings } from '../incidents/lease.js'
import type { AlertPayload } from '../incidents/schemas.js'
import type {
  IncidentDetail,
  IncidentFilter,
  IncidentRecord,
  IncidentSummary,
  IntegrationTrace,
  MergePolicySnapshot,
} from '../incidents/types.js'
import type { IncidentStore } from '../incident-store/incident-store.js'
import type { PipelineOrchestrator } from '../pipeline-orchestrator/orchestrator.js'
import type { Clock } from '../timeline/timeline-log.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface IncidentServiceOptions {
  store: IncidentStore
  orchestrator: PipelineOrchestrator
  /** Merge policy captured on every new incident */
  policy: MergePolicySnapshot
  /** Provider names recorded on every new incident */
  trace: IntegrationTrace
  /** Waiting time after which an AWAITING_APPROVAL incident reads as stale; 0 disables */
  staleAfterMs: number
  clock?: Clock
  eventBus?: TypedEventBus
  /** How long shutdown() waits for in-flight tasks before giving up on them */
  drainTimeoutMs?: number
  /**
   * Owner lease granted on create and approve, renewed every ttlMs/3 while a
   * task runs. Pass the same settings to the orchestrator.
   */
  lease?: LeaseSettings
}

export interface CreateIncidentOptions {
  /** Where the alert came from, recorded on INCIDENT_CREATED */
  source?: string
}

// ---------------------------------------------------------------------------
// IncidentService
// ---------------------------------------------------------------------------

export interface IncidentService extends BaseService {
  /**
   * Record a new PROCESSING incident and schedule its pipeline run.
   * Returns as soon as the record is stored.
   */
  createIncident(alert: AlertPayload, options?: CreateIncidentOptions): Promise<IncidentRecord>

  /** @throws {IncidentNotFoundError} */
  getIncident(incidentId: string): Promise<IncidentDetail>

  /** Summaries, newest first */
  listIncidents(filter?: IncidentFilter): Promise<IncidentSummary[]>

  /**
   * Approve a held merge: AWAITING_APPROVAL -> MERGING, then run the merge
   * stage in the background. Returns the MERGING record.
   * @throws {InvalidStateError} when the incident is not waiting for approval
   * @throws {IncidentNotFoundError}
   */
  approveMerge(incidentId: string, actor?: string): Promise<IncidentRecord>

  /**
   * Reject a held merge: AWAITING_APPROVAL -> FAILED.
   * @throws {InvalidStateError} when the incident is not waiting for approval
   * @throws {IncidentNotFoundError}
   */
  rejectMerge(incidentId: string, reason?: string, actor?: string): Promise<IncidentRecord>

  /**
   * Schedule a pipeline run for an existing incident (reconciliation).
   * Returns false when a task for it is already in flight.
   */
  resumeIncident(incidentId: string): boolean

  isInFlight(incidentId: string): boolean

  readonly inFlightCount: number

  /** Resolve once no task (for `incidentId`, or any) is in flight */
  waitForIdle(incidentId?: string): Promise<void>
}

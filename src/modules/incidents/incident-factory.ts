/**
 * Construction of new incident records and the read-side views over them.
 */

import { randomBytes } from 'node:crypto'
import { SEVERITIES } from '../../core/types.js'
import type { Severity } from '../../core/types.js'
import { TimelineLog } from '../timeline/timeline-log.js'
import type { Clock } from '../timeline/timeline-log.js'
import { firstAlert } from './schemas.js'
import type { AlertPayload } from './schemas.js'
import { isTerminal } from './state-machine.js'
import type {
  IncidentDetail,
  IncidentRecord,
  IncidentSummary,
  IntegrationTrace,
  MergePolicySnapshot,
} from './types.js'

/** Generate an incident identifier such as "INC-9f86d081" */
export function generateIncidentId(): string {
  return `INC-${randomBytes(4).toString('hex')}`
}

export function parseSeverity(value: string | undefined, fallback: Severity = 'high'): Severity {
  const normalised = (value ?? '').toLowerCase()
  return SEVERITIES.find((s) => s === normalised) ?? fallback
}

export interface NewIncidentInput {
  incidentId: string
  alert: AlertPayload
  policy: MergePolicySnapshot
  trace: IntegrationTrace
  source: string
  clock: Clock
}

/**
 * Build the initial PROCESSING record with its INCIDENT_CREATED event.
 * Severity and service come from the alert labels until triage refines them.
 */
export function createIncidentRecord(input: NewIncidentInput): IncidentRecord {
  const labels = firstAlert(input.alert).labels
  const severity = parseSeverity(labels.severity)
  const log = new TimelineLog([], input.clock)
  const created = log.append({
    eventType: 'INCIDENT_CREATED',
    agent: 'system',
    details: { source: input.source },
  })

  return {
    incidentId: input.incidentId,
    status: 'PROCESSING',
    severity,
    serviceName: labels.service ?? 'unknown-service',
    createdAt: created.timestamp,
    updatedAt: created.timestamp,
    resolvedAt: null,
    // PENDING is set by the merge gate once CI has passed
    approvalStatus: 'NOT_REQUIRED',
    prStatus: 'NOT_CREATED',
    rawAlert: input.alert,
    validatedAlert: null,
    rootCause: null,
    ticket: null,
    remediation: null,
    errorMessage: null,
    failedStage: null,
    stageFailures: [],
    policy: { ...input.policy, approvalRequiredSeverities: [...input.policy.approvalRequiredSeverities] },
    integrationTrace: { ...input.trace },
    resumeAttempts: 0,
    lease: null,
    timeline: log.toArray(),
    version: 0,
  }
}

// ---------------------------------------------------------------------------
// Views
// ---------------------------------------------------------------------------

/**
 * Time to remediation in seconds, from the first to the last timeline event.
 * Null until the incident is terminal.
 */
export function computeMttrSeconds(record: IncidentRecord): number | null {
  if (!isTerminal(record.status)) return null
  return new TimelineLog(record.timeline).spanMs() / 1000
}

/** Whether an incident has waited for approval longer than `staleAfterMs` */
export function isStale(record: IncidentRecord, staleAfterMs: number, now: Date): boolean {
  if (record.status !== 'AWAITING_APPROVAL' || staleAfterMs <= 0) return false
  const waitingSince = [...record.timeline]
    .reverse()
    .find((event) => event.transition?.to === 'AWAITING_APPROVAL')
  const since = Date.parse(waitingSince?.timestamp ?? record.updatedAt)
  return now.getTime() - since >= staleAfterMs
}

export function toIncidentSummary(record: IncidentRecord, staleAfterMs: number, now: Date): IncidentSummary {
  return {
    incidentId: record.incidentId,
    status: record.status,
    severity: record.severity,
    serviceName: record.serviceName,
    createdAt: record.createdAt,
    resolvedAt: record.resolvedAt,
    mttrSeconds: computeMttrSeconds(record),
    approvalStatus: record.approvalStatus,
    prStatus: record.prStatus,
    isStale: isStale(record, staleAfterMs, now),
  }
}

export function toIncidentDetail(record: IncidentRecord, staleAfterMs: number, now: Date): IncidentDetail {
  return {
    ...structuredClone(record),
    mttrSeconds: computeMttrSeconds(record),
    isStale: isStale(record, staleAfterMs, now),
  }
}

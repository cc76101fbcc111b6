/**
 * Incident state machine.
 *
 *   PROCESSING ──► AWAITING_APPROVAL ──► MERGING ──► RESOLVED
 *       │                 │                 │
 *       ├──► RESOLVED      └──► FAILED       └──► FAILED
 *       └──► FAILED
 *
 * RESOLVED and FAILED are terminal. Every helper here mutates a draft
 * record handed out by IncidentStore.update(); a thrown error discards the
 * draft, so a rejected transition leaves the stored incident unchanged.
 */

import {
  AlreadyTerminalError,
  InvalidTransitionError,
  PolicyViolationError,
} from '../../core/errors.js'
import type { IncidentStatus, StageName } from '../../core/types.js'
import { stampEvent } from '../timeline/timeline-log.js'
import type { Clock } from '../timeline/timeline-log.js'
import type { TimelineEvent, TimelineEventInput, TimelineEventType } from '../timeline/types.js'
import type { IncidentRecord } from './types.js'

// ---------------------------------------------------------------------------
// Transition table
// ---------------------------------------------------------------------------

export const ALLOWED_TRANSITIONS: Readonly<Record<IncidentStatus, readonly IncidentStatus[]>> = {
  PROCESSING: ['AWAITING_APPROVAL', 'RESOLVED', 'FAILED'],
  AWAITING_APPROVAL: ['MERGING', 'FAILED'],
  MERGING: ['RESOLVED', 'FAILED'],
  RESOLVED: [],
  FAILED: [],
}

export function isTerminal(status: IncidentStatus): boolean {
  return status === 'RESOLVED' || status === 'FAILED'
}

export function canTransition(from: IncidentStatus, to: IncidentStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to)
}

// ---------------------------------------------------------------------------
// Mutators
// ---------------------------------------------------------------------------

export interface TransitionOptions {
  eventType: TimelineEventType
  agent: string
  details?: Record<string, unknown>
  durationMs?: number | null
}

/** Appends in place */
function pushEvent(record: IncidentRecord, input: TimelineEventInput, clock: Clock): TimelineEvent {
  const event = stampEvent(record.timeline[record.timeline.length - 1], input, clock)
  record.timeline.push(event)
  return event
}

function assertMutable(record: IncidentRecord): void {
  if (isTerminal(record.status)) {
    throw new AlreadyTerminalError(record.incidentId, record.status)
  }
}

/**
 * Append a non-transition event to the incident timeline.
 * @throws {AlreadyTerminalError} when the incident is RESOLVED or FAILED
 */
export function appendEvent(record: IncidentRecord, input: TimelineEventInput, clock: Clock): TimelineEvent {
  assertMutable(record)
  const event = pushEvent(record, input, clock)
  record.updatedAt = event.timestamp
  return event
}

/**
 * Move the incident to `to`, appending exactly one timeline event that
 * carries the transition. Terminal targets also stamp `resolvedAt`.
 *
 * @throws {AlreadyTerminalError} when the incident is already terminal
 * @throws {InvalidTransitionError} when `to` is not reachable from the current status
 */
export function transitionIncident(
  record: IncidentRecord,
  to: IncidentStatus,
  options: TransitionOptions,
  clock: Clock,
): TimelineEvent {
  assertMutable(record)
  const from = record.status
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(record.incidentId, from, to)
  }

  const event = pushEvent(
    record,
    {
      eventType: options.eventType,
      agent: options.agent,
      details: options.details,
      durationMs: options.durationMs,
      transition: { from, to },
    },
    clock,
  )

  record.status = to
  record.updatedAt = event.timestamp
  if (isTerminal(to)) {
    record.resolvedAt = event.timestamp
  }
  return event
}

/** Transition to FAILED, recording the cause and originating stage */
export function failIncident(
  record: IncidentRecord,
  stage: StageName,
  message: string,
  clock: Clock,
  details: Record<string, unknown> = {},
): TimelineEvent {
  const event = transitionIncident(
    record,
    'FAILED',
    { eventType: 'INCIDENT_FAILED', agent: stage, details: { stage, error: message, ...details } },
    clock,
  )
  record.errorMessage = message
  record.failedStage = stage
  return event
}

export function resolveIncident(
  record: IncidentRecord,
  agent: string,
  clock: Clock,
  details: Record<string, unknown> = {},
): TimelineEvent {
  return transitionIncident(record, 'RESOLVED', { eventType: 'INCIDENT_RESOLVED', agent, details }, clock)
}

/**
 * Flag the remediation PR as merged.
 * @throws {PolicyViolationError} unless approval is APPROVED or NOT_REQUIRED
 */
export function markPrMerged(record: IncidentRecord): void {
  if (record.approvalStatus !== 'APPROVED' && record.approvalStatus !== 'NOT_REQUIRED') {
    throw new PolicyViolationError(
      `Incident ${record.incidentId} cannot merge with approval status ${record.approvalStatus}`,
      'MERGE_NOT_APPROVED',
      { incidentId: record.incidentId, approvalStatus: record.approvalStatus },
    )
  }
  record.prStatus = 'MERGED'
  if (record.remediation !== null) {
    record.remediation = { ...record.remediation, prMerged: true }
  }
}

/**
 * Timeline event types.
 */

import type { IncidentStatus } from '../../core/types.js'

export type TimelineEventType =
  | 'INCIDENT_CREATED'
  | 'ALERT_VALIDATED'
  | 'ALERT_SUPPRESSED'
  | 'INVESTIGATION_STARTED'
  | 'ROOT_CAUSE_IDENTIFIED'
  | 'TICKET_CREATED'
  | 'TICKET_FAILED'
  | 'PR_CREATED'
  | 'REMEDIATION_FAILED'
  | 'CI_PASSED'
  | 'CI_FAILED'
  | 'CI_TIMEOUT'
  | 'MERGE_GATE_EVALUATED'
  | 'ESCALATED_TO_HUMAN'
  | 'MERGE_APPROVED'
  | 'MERGE_REJECTED'
  | 'MERGE_STARTED'
  | 'PR_MERGED'
  | 'MERGE_FAILED'
  | 'TICKET_TRANSITIONED'
  | 'TICKET_TRANSITION_FAILED'
  | 'PIPELINE_RESUMED'
  | 'INCIDENT_RESOLVED'
  | 'INCIDENT_FAILED'

/** Status change carried by the single event that records a transition */
export interface StatusTransition {
  from: IncidentStatus
  to: IncidentStatus
}

export interface TimelineEvent {
  eventType: TimelineEventType
  /** ISO-8601, non-decreasing within one incident */
  timestamp: string
  /** Stage or actor that produced the event */
  agent: string
  details: Record<string, unknown>
  durationMs: number | null
  /** Present on exactly the events that changed the incident status */
  transition?: StatusTransition
}

/** Input to TimelineLog.append(); timestamp defaults to the log's clock */
export interface TimelineEventInput {
  eventType: TimelineEventType
  agent: string
  details?: Record<string, unknown>
  durationMs?: number | null
  timestamp?: string
  transition?: StatusTransition
}

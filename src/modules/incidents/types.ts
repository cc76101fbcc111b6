/**
 * Incident record model.
 *
 * One IncidentRecord holds the full state of one incident: lifecycle status,
 * stage outputs, merge-gate inputs and the ordered audit timeline.
 */

import type {
  ApprovalStatus,
  IncidentId,
  IncidentStatus,
  MergeMethod,
  PrStatus,
  Severity,
  StageName,
} from '../../core/types.js'
import type { TimelineEvent } from '../timeline/types.js'
import type { AlertPayload } from './schemas.js'

// ---------------------------------------------------------------------------
// Stage outputs
// ---------------------------------------------------------------------------

/** Output of the triage stage. Created once per incident, never mutated. */
export interface ValidatedAlert {
  isActionable: boolean
  severity: Severity
  serviceName: string
  errorType: string
  affectedEndpoints: string[]
  triageReason: string
  /** When the upstream alert fired (ISO-8601) */
  triggeredAt: string
  /** Signal hits and weighted score behind the decision */
  enrichment: Record<string, unknown>
}

export interface Evidence {
  source: string
  timestamp: string
  content: string
}

export type RootCauseCategory =
  | 'code_bug'
  | 'config_error'
  | 'dependency_failure'
  | 'resource_exhaustion'

export type RecommendedAction = 'fix_code' | 'rollback' | 'scale_up' | 'config_change'

/** Patch produced by the reasoning provider, pushed by the remediation stage */
export interface ProposedFix {
  filePath: string
  content: string
  summary: string
}

/** Output of the analysis stage ("thought signature"). Immutable once produced. */
export interface RootCauseAnalysis {
  rootCause: string
  rootCauseCategory: RootCauseCategory
  evidenceChain: Evidence[]
  confidenceScore: number
  targetRepository: string
  targetFile: string
  recommendedAction: RecommendedAction
  proposedFix?: ProposedFix
}

/** Ticket as reported by the ticketing provider */
export interface TicketRecord {
  ticketKey: string
  ticketUrl: string
  /** Provider-reported workflow state; never invented locally */
  status: string
}

export interface RemediationRecord {
  success: boolean
  branchName: string | null
  prNumber: number | null
  prUrl: string | null
  prMerged: boolean
  errorMessage: string | null
}

// ---------------------------------------------------------------------------
// Supporting records
// ---------------------------------------------------------------------------

/** Merge-gate flags captured when the incident is created */
export interface MergePolicySnapshot {
  requireCiPass: boolean
  requireCodeownerReview: boolean
  requirePrApproval: boolean
  mergeMethod: MergeMethod
  approvalRequiredSeverities: Severity[]
}

/** A stage failure that did not by itself end the incident (e.g. ticketing) */
export interface StageFailure {
  stage: StageName
  message: string
  kind: 'transient' | 'permanent'
  at: string
}

export interface IntegrationTrace {
  ticketProvider: string
  codeProvider: string
  analysisProvider: string
}

// ---------------------------------------------------------------------------
// IncidentRecord
// ---------------------------------------------------------------------------

export interface IncidentLease {
  ownerId: string
  /** ISO time after which another process may take the incident over */
  expiresAt: string
}

export interface IncidentRecord {
  incidentId: IncidentId
  status: IncidentStatus
  severity: Severity
  serviceName: string
  createdAt: string
  updatedAt: string
  /** Set iff status is RESOLVED or FAILED */
  resolvedAt: string | null
  approvalStatus: ApprovalStatus
  prStatus: PrStatus
  rawAlert: AlertPayload
  validatedAlert: ValidatedAlert | null
  rootCause: RootCauseAnalysis | null
  ticket: TicketRecord | null
  remediation: RemediationRecord | null
  /** Human-readable cause of a FAILED incident */
  errorMessage: string | null
  failedStage: StageName | null
  stageFailures: StageFailure[]
  policy: MergePolicySnapshot
  integrationTrace: IntegrationTrace
  /** How many times reconciliation restarted an orphaned run */
  resumeAttempts: number
  /** Process currently driving the pipeline; null when nobody is */
  lease: IncidentLease | null
  timeline: TimelineEvent[]
  /** Optimistic-concurrency version, bumped on every write */
  version: number
}

// ---------------------------------------------------------------------------
// Views
// ---------------------------------------------------------------------------

export interface IncidentSummary {
  incidentId: IncidentId
  status: IncidentStatus
  severity: Severity
  serviceName: string
  createdAt: string
  resolvedAt: string | null
  mttrSeconds: number | null
  approvalStatus: ApprovalStatus
  prStatus: PrStatus
  isStale: boolean
}

export interface IncidentDetail extends IncidentRecord {
  mttrSeconds: number | null
  isStale: boolean
}

export interface IncidentFilter {
  status?: IncidentStatus
  serviceName?: string
  /** Maximum number of items, newest first */
  limit?: number
}

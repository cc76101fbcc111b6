/**
 * Shared types for the merge-gate module.
 */

import type { InvalidStateReason } from '../../core/errors.js'
import type { ApprovalStatus, IncidentStatus, PrStatus, ReviewStatus, Severity } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Gate evaluation
// ---------------------------------------------------------------------------

export type MergeGateAction = 'auto_merge' | 'require_approval' | 'block'

/** Observed state of the remediation PR */
export interface MergeGateInput {
  prStatus: PrStatus
  reviewStatus: ReviewStatus
  severity: Severity
}

export interface MergeGateDecision {
  action: MergeGateAction
  /** Machine-readable causes, e.g. "require_ci_pass" or "ci_failed" */
  reasons: string[]
  /** True when the block can never clear (CI failed): the incident must fail */
  terminal: boolean
}

// ---------------------------------------------------------------------------
// Approval commands
// ---------------------------------------------------------------------------

export interface ApprovalSubject {
  status: IncidentStatus
  prStatus: PrStatus
  approvalStatus: ApprovalStatus
}

export type ApprovalEligibility =
  | { allowed: true }
  | { allowed: false; reason: InvalidStateReason; message: string }

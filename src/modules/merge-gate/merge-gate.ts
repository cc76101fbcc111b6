/**
 * Merge gate policy: pure decisions over the configured merge policy and the
 * observed PR state. Nothing here touches a record or a provider.
 */

import type { MergePolicySnapshot } from '../incidents/types.js'
import type {
  ApprovalEligibility,
  ApprovalSubject,
  MergeGateDecision,
  MergeGateInput,
} from './types.js'

/**
 * Decide whether a remediation PR may merge now.
 *
 * - CI failed: block, terminal.
 * - No PR yet or CI pending: block, not terminal (the incident is held).
 * - CI passed: auto-merge when no gate flag is set, no reviewer asked for
 *   changes and the severity is not reserved for humans; otherwise
 *   require approval.
 */
export function evaluateMergeGate(policy: MergePolicySnapshot, input: MergeGateInput): MergeGateDecision {
  switch (input.prStatus) {
    case 'CI_FAILED':
      return { action: 'block', reasons: ['ci_failed'], terminal: true }
    case 'NOT_CREATED':
      return { action: 'block', reasons: ['pr_not_created'], terminal: false }
    case 'PENDING_CI':
      return { action: 'block', reasons: ['ci_pending'], terminal: false }
    case 'MERGED':
      return { action: 'block', reasons: ['already_merged'], terminal: false }
    case 'CI_PASSED':
      break
  }

  const reasons: string[] = []
  if (policy.requireCiPass) reasons.push('require_ci_pass')
  if (policy.requireCodeownerReview) reasons.push('require_codeowner_review')
  if (policy.requirePrApproval) reasons.push('require_pr_approval')
  if (policy.approvalRequiredSeverities.includes(input.severity)) reasons.push('severity_requires_approval')
  if (input.reviewStatus === 'changes_requested') reasons.push('changes_requested')

  if (reasons.length === 0) {
    return { action: 'auto_merge', reasons: [], terminal: false }
  }
  return { action: 'require_approval', reasons, terminal: false }
}

/**
 * Check whether an approve command may proceed against the incident's
 * current state. Callers run this inside the per-incident lock.
 */
export function evaluateApprovalRequest(subject: ApprovalSubject): ApprovalEligibility {
  if (subject.prStatus === 'NOT_CREATED') {
    return { allowed: false, reason: 'pr_not_created', message: 'No pull request exists for this incident' }
  }
  if (subject.prStatus === 'MERGED') {
    return { allowed: false, reason: 'already_merged', message: 'Pull request is already merged' }
  }
  if (subject.approvalStatus === 'APPROVED') {
    return { allowed: false, reason: 'already_approved', message: 'Merge was already approved' }
  }
  if (subject.approvalStatus === 'REJECTED') {
    return { allowed: false, reason: 'already_rejected', message: 'Merge was already rejected' }
  }
  if (subject.prStatus !== 'CI_PASSED') {
    return { allowed: false, reason: 'ci_not_passed', message: `CI has not passed (pr status ${subject.prStatus})` }
  }
  // approval only turns PENDING at the merge gate
  if (subject.approvalStatus === 'NOT_REQUIRED') {
    return { allowed: false, reason: 'approval_not_required', message: 'Merge policy does not require approval' }
  }
  if (subject.status !== 'AWAITING_APPROVAL') {
    return {
      allowed: false,
      reason: 'not_awaiting_approval',
      message: `Incident is ${subject.status}, not AWAITING_APPROVAL`,
    }
  }
  return { allowed: true }
}

/** Check whether a reject command may proceed */
export function evaluateRejectionRequest(subject: ApprovalSubject): ApprovalEligibility {
  if (subject.approvalStatus === 'APPROVED') {
    return { allowed: false, reason: 'already_approved', message: 'Merge was already approved' }
  }
  if (subject.approvalStatus === 'REJECTED') {
    return { allowed: false, reason: 'already_rejected', message: 'Merge was already rejected' }
  }
  if (subject.status !== 'AWAITING_APPROVAL') {
    return {
      allowed: false,
      reason: 'not_awaiting_approval',
      message: `Incident is ${subject.status}, not AWAITING_APPROVAL`,
    }
  }
  return { allowed: true }
}

import type { MergePolicySnapshot } from '../incidents/types.js'
import type { MergeGateConfig } from './config-schema.js'

/** Snapshot of the merge-gate section taken when an incident is created */
export function mergePolicyFromConfig(config: MergeGateConfig): MergePolicySnapshot {
  return {
    requireCiPass: config.require_ci_pass,
    requireCodeownerReview: config.require_codeowner_review,
    requirePrApproval: config.require_pr_approval,
    mergeMethod: config.merge_method,
    approvalRequiredSeverities: [...config.approval_required_severities],
  }
}

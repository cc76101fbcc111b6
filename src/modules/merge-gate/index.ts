export { evaluateApprovalRequest, evaluateMergeGate, evaluateRejectionRequest } from './merge-gate.js'
export type {
  ApprovalEligibility,
  ApprovalSubject,
  MergeGateAction,
  MergeGateDecision,
  MergeGateInput,
} from './types.js'

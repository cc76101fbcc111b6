/**
 * Core types for Patchwarden
 * Shared identifiers and enumerations used across all modules
 */

/** Unique, externally visible incident identifier (e.g. "INC-1a2b3c4d") */
export type IncidentId = string

/** Lifecycle status of an incident; see the transition table in modules/incidents/state-machine.ts */
export type IncidentStatus =
  | 'PROCESSING'
  | 'AWAITING_APPROVAL'
  | 'MERGING'
  | 'RESOLVED'
  | 'FAILED'

export type ApprovalStatus = 'NOT_REQUIRED' | 'PENDING' | 'APPROVED' | 'REJECTED'

export type PrStatus = 'NOT_CREATED' | 'PENDING_CI' | 'CI_PASSED' | 'CI_FAILED' | 'MERGED'

/** Alert severity, as carried on alert labels */
export type Severity = 'critical' | 'high' | 'medium' | 'low'

export const SEVERITIES: readonly Severity[] = ['critical', 'high', 'medium', 'low']

/** Discrete pipeline steps; `pipeline` marks failures outside any single stage */
export type StageName =
  | 'triage'
  | 'analysis'
  | 'ticketing'
  | 'remediation'
  | 'ci'
  | 'merge'
  | 'approval'
  | 'pipeline'

/** Severity level for log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/** Method used when merging a remediation pull request */
export type MergeMethod = 'merge' | 'squash' | 'rebase'

/** Code-owner review state observed on a pull request */
export type ReviewStatus = 'approved' | 'pending' | 'changes_requested' | 'unknown'

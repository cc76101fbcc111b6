/**
 * Contracts for the external collaborators the pipeline drives.
 *
 * Providers signal failures with TransientIntegrationError (retry-eligible)
 * or PermanentIntegrationError. Every call accepts an AbortSignal that the
 * stage adapter fires when its per-attempt timeout elapses.
 */

import type { MergeMethod, ReviewStatus } from '../../core/types.js'
import type { AlertPayload } from '../incidents/schemas.js'
import type { RootCauseAnalysis, TicketRecord, ValidatedAlert } from '../incidents/types.js'

export interface CallOptions {
  signal?: AbortSignal
}

// ---------------------------------------------------------------------------
// Triage and analysis
// ---------------------------------------------------------------------------

export interface TriageProvider {
  readonly name: string
  triage(alert: AlertPayload, context: { incidentId: string } & CallOptions): Promise<ValidatedAlert>
}

export interface AnalysisContext extends CallOptions {
  incidentId: string
  rawAlert: AlertPayload
}

export interface AnalysisProvider {
  readonly name: string
  analyze(alert: ValidatedAlert, context: AnalysisContext): Promise<RootCauseAnalysis>
}

// ---------------------------------------------------------------------------
// Ticketing
// ---------------------------------------------------------------------------

export interface CreateTicketRequest extends CallOptions {
  incidentId: string
  summary: string
  description: string
  priority: string
}

export interface TicketTransitionResult {
  ticketKey: string
  fromStatus: string | null
  toStatus: string
}

export interface TicketProvider {
  readonly name: string
  createTicket(request: CreateTicketRequest): Promise<TicketRecord>
  /** Ticket previously created for this incident, if the provider has one */
  findTicketByIncident(incidentId: string, options?: CallOptions): Promise<TicketRecord | null>
  transitionTicket(ticketKey: string, targetStatus: string, options?: CallOptions): Promise<TicketTransitionResult>
}

// ---------------------------------------------------------------------------
// Version control
// ---------------------------------------------------------------------------

export interface BranchRef {
  branchName: string
  baseBranch: string
  /** False when the branch already existed */
  created: boolean
}

export interface FileChange {
  path: string
  content: string
}

export interface PullRequestRef {
  number: number
  url: string
  headBranch: string
  merged: boolean
}

export type CiState = 'pending' | 'passed' | 'failed'

export interface CiObservation {
  ci: CiState
  review: ReviewStatus
  details: Record<string, unknown>
}

export interface MergeOutcome {
  merged: boolean
  /** True when the PR had been merged before this call */
  alreadyMerged: boolean
  message: string
}

export interface CodeProvider {
  readonly name: string
  createBranch(request: { repository: string; branchName: string } & CallOptions): Promise<BranchRef>
  pushFiles(
    request: { repository: string; branchName: string; files: FileChange[]; message: string } & CallOptions,
  ): Promise<void>
  createPullRequest(
    request: { repository: string; branchName: string; baseBranch: string; title: string; body: string } & CallOptions,
  ): Promise<PullRequestRef>
  /** Open or closed PR whose head is `branchName`, if any */
  findPullRequest(request: { repository: string; branchName: string } & CallOptions): Promise<PullRequestRef | null>
  getCiStatus(request: { repository: string; prNumber: number } & CallOptions): Promise<CiObservation>
  mergePullRequest(
    request: { repository: string; prNumber: number; method: MergeMethod } & CallOptions,
  ): Promise<MergeOutcome>
}

// ---------------------------------------------------------------------------
// Wiring
// ---------------------------------------------------------------------------

export interface Integrations {
  triage: TriageProvider
  analysis: AnalysisProvider
  ticketing: TicketProvider
  code: CodeProvider
}

export interface ProviderReadiness {
  ready: boolean
  mode: string
  backend: string
  reason: string
  missingFields: string[]
}

/**
 * In-process ticket and code providers for `mode: mock`.
 *
 * Keys and PR numbers are derived from the incident id, and all state lives
 * in memory so idempotent lookups behave like the real providers.
 */

import { createHash } from 'node:crypto'
import { PermanentIntegrationError } from '../../core/errors.js'
import type { MergeMethod, ReviewStatus } from '../../core/types.js'
import type { TicketRecord } from '../incidents/types.js'
import type {
  BranchRef,
  CallOptions,
  CiObservation,
  CiState,
  CodeProvider,
  CreateTicketRequest,
  FileChange,
  MergeOutcome,
  PullRequestRef,
  TicketProvider,
  TicketTransitionResult,
} from './types.js'

/** Stable non-negative integer derived from `value` */
export function stableHash(value: string): number {
  return createHash('sha256').update(value).digest().readUInt32BE(0)
}

// ---------------------------------------------------------------------------
// Tickets
// ---------------------------------------------------------------------------

export class MockTicketProvider implements TicketProvider {
  readonly name = 'jira_mock'
  private readonly _byIncident = new Map<string, TicketRecord>()
  private readonly _baseUrl: string

  constructor(baseUrl = 'https://jira.example.test') {
    this._baseUrl = baseUrl
  }

  async createTicket(request: CreateTicketRequest): Promise<TicketRecord> {
    const existing = this._byIncident.get(request.incidentId)
    if (existing !== undefined) return { ...existing }

    const ticketKey = `SRE-${String(stableHash(request.incidentId) % 100000).padStart(5, '0')}`
    const ticket: TicketRecord = { ticketKey, ticketUrl: `${this._baseUrl}/browse/${ticketKey}`, status: 'Open' }
    this._byIncident.set(request.incidentId, ticket)
    return { ...ticket }
  }

  async findTicketByIncident(incidentId: string): Promise<TicketRecord | null> {
    const ticket = this._byIncident.get(incidentId)
    return ticket === undefined ? null : { ...ticket }
  }

  async transitionTicket(ticketKey: string, targetStatus: string): Promise<TicketTransitionResult> {
    for (const ticket of this._byIncident.values()) {
      if (ticket.ticketKey === ticketKey) {
        const fromStatus = ticket.status
        ticket.status = targetStatus
        return { ticketKey, fromStatus, toStatus: targetStatus }
      }
    }
    throw new PermanentIntegrationError(`Unknown ticket ${ticketKey}`, { provider: this.name, httpStatus: 404 })
  }

  /** Number of tickets held, for tests and diagnostics */
  get size(): number {
    return this._byIncident.size
  }
}

// ---------------------------------------------------------------------------
// Code
// ---------------------------------------------------------------------------

export interface MockCodeProviderOptions {
  ci?: CiState
  review?: ReviewStatus
  /** When false, merge attempts report the PR as not mergeable */
  mergeable?: boolean
}

interface MockPullRequest extends PullRequestRef {
  repository: string
}

export class MockCodeProvider implements CodeProvider {
  readonly name = 'github_mock'
  private readonly _options: Required<MockCodeProviderOptions>
  private readonly _branches = new Map<string, Map<string, string>>()
  private readonly _pulls = new Map<string, MockPullRequest>()

  constructor(options: MockCodeProviderOptions = {}) {
    this._options = { ci: 'passed', review: 'approved', mergeable: true, ...options }
  }

  async createBranch(request: { repository: string; branchName: string }): Promise<BranchRef> {
    const key = `${request.repository}#${request.branchName}`
    const created = !this._branches.has(key)
    if (created) this._branches.set(key, new Map())
    return { branchName: request.branchName, baseBranch: 'main', created }
  }

  async pushFiles(
    request: { repository: string; branchName: string; files: FileChange[]; message: string } & CallOptions,
  ): Promise<void> {
    const files = this._branches.get(`${request.repository}#${request.branchName}`)
    if (files === undefined) {
      throw new PermanentIntegrationError(`Branch ${request.branchName} does not exist`, {
        provider: this.name,
        httpStatus: 404,
      })
    }
    for (const file of request.files) files.set(file.path, file.content)
  }

  async createPullRequest(
    request: { repository: string; branchName: string; baseBranch: string; title: string; body: string } & CallOptions,
  ): Promise<PullRequestRef> {
    const existing = await this.findPullRequest(request)
    if (existing !== null) return existing

    const prNumber = (stableHash(request.branchName) % 9000) + 1000
    const pull: MockPullRequest = {
      repository: request.repository,
      number: prNumber,
      url: `https://github.example.test/${request.repository}/pull/${String(prNumber)}`,
      headBranch: request.branchName,
      merged: false,
    }
    this._pulls.set(`${request.repository}#${request.branchName}`, pull)
    return toRef(pull)
  }

  async findPullRequest(request: { repository: string; branchName: string }): Promise<PullRequestRef | null> {
    const pull = this._pulls.get(`${request.repository}#${request.branchName}`)
    return pull === undefined ? null : toRef(pull)
  }

  async getCiStatus(request: { repository: string; prNumber: number }): Promise<CiObservation> {
    return {
      ci: this._options.ci,
      review: this._options.review,
      details: { provider: 'mock', repository: request.repository, prNumber: request.prNumber },
    }
  }

  async mergePullRequest(
    request: { repository: string; prNumber: number; method: MergeMethod } & CallOptions,
  ): Promise<MergeOutcome> {
    const pull = [...this._pulls.values()].find(
      (p) => p.repository === request.repository && p.number === request.prNumber,
    )
    if (pull === undefined) {
      throw new PermanentIntegrationError(`Pull request #${String(request.prNumber)} not found`, {
        provider: this.name,
        httpStatus: 404,
      })
    }
    if (pull.merged) return { merged: true, alreadyMerged: true, message: 'Pull request already merged' }
    if (!this._options.mergeable) return { merged: false, alreadyMerged: false, message: 'Pull request is not mergeable' }
    pull.merged = true
    return { merged: true, alreadyMerged: false, message: 'Pull request merged' }
  }

  /** Content pushed to a branch, for tests and diagnostics */
  fileContent(repository: string, branchName: string, path: string): string | undefined {
    return this._branches.get(`${repository}#${branchName}`)?.get(path)
  }
}

function toRef(pull: MockPullRequest): PullRequestRef {
  return { number: pull.number, url: pull.url, headBranch: pull.headBranch, merged: pull.merged }
}

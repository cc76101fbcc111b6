/**
 * Stage adapters — one method per pipeline stage, each wrapping a provider
 * call in runStage() so the orchestrator sees a StageResult and never a
 * thrown integration error.
 *
 * Side-effecting stages (ticketing, remediation, merge) consult the
 * idempotency ledger first and record their output on success, so a stage
 * re-run after a restart returns the earlier result instead of acting twice.
 */

import { z } from 'zod'
import { PermanentIntegrationError } from '../../core/errors.js'
import type { MergeMethod, Severity, StageName } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { sleep as defaultSleep } from '../../utils/helpers.js'
import type { IdempotencyStore } from '../incident-store/incident-store.js'
import { idempotencyKey } from '../incident-store/incident-store.js'
import { RemediationRecordSchema, TicketRecordSchema } from '../incidents/schemas.js'
import type {
  IncidentRecord,
  ProposedFix,
  RemediationRecord,
  RootCauseAnalysis,
  TicketRecord,
  ValidatedAlert,
} from '../incidents/types.js'
import type { Integrations, MergeOutcome, PullRequestRef, TicketTransitionResult } from '../integrations/types.js'
import { runStage } from './stage-runner.js'
import type { CiVerdict, StageResult, StageRuntime } from './types.js'

const logger = createLogger('stage-adapters')

const MergeOutcomeSchema = z.object({ merged: z.boolean(), alreadyMerged: z.boolean(), message: z.string() })

const JIRA_PRIORITY: Record<Severity, string> = {
  critical: 'Highest',
  high: 'High',
  medium: 'Medium',
  low: 'Low',
}

export interface CiPollOptions {
  pollIntervalMs: number
  timeoutMs: number
}

export interface PullRequestTarget {
  repository: string
  prNumber: number
}

/** Branch that carries the fix for `incidentId` */
export function remediationBranch(incidentId: string): string {
  return `fix/${incidentId.toLowerCase()}`
}

function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 1)}…`
}

export function ticketSummary(alert: ValidatedAlert): string {
  return truncate(`[${alert.severity.toUpperCase()}] ${alert.serviceName}: ${alert.errorType}`, 255)
}

export function ticketDescription(incidentId: string, alert: ValidatedAlert, analysis: RootCauseAnalysis): string {
  return [
    `Incident: ${incidentId}`,
    `Service: ${alert.serviceName}`,
    `Root cause (${analysis.rootCauseCategory}, confidence ${analysis.confidenceScore.toFixed(2)}): ${analysis.rootCause}`,
    `Recommended action: ${analysis.recommendedAction}`,
    '',
    'Evidence:',
    ...analysis.evidenceChain.map((e) => `- [${e.source}] ${e.content}`),
  ].join('\n')
}

export class StageAdapters {
  private readonly _integrations: Integrations
  private readonly _ledger: IdempotencyStore
  private readonly _runtime: StageRuntime

  constructor(integrations: Integrations, ledger: IdempotencyStore, runtime: StageRuntime) {
    this._integrations = integrations
    this._ledger = ledger
    this._runtime = runtime
  }

  triage(record: IncidentRecord): Promise<StageResult<ValidatedAlert>> {
    return runStage(
      'triage',
      record.incidentId,
      (signal) => this._integrations.triage.triage(record.rawAlert, { incidentId: record.incidentId, signal }),
      this._runtime,
    )
  }

  analyze(record: IncidentRecord, alert: ValidatedAlert): Promise<StageResult<RootCauseAnalysis>> {
    return runStage(
      'analysis',
      record.incidentId,
      (signal) =>
        this._integrations.analysis.analyze(alert, { incidentId: record.incidentId, rawAlert: record.rawAlert, signal }),
      this._runtime,
    )
  }

  /** Ledger, then the provider's own lookup by incident, then create */
  createTicket(
    record: IncidentRecord,
    alert: ValidatedAlert,
    analysis: RootCauseAnalysis,
  ): Promise<StageResult<TicketRecord>> {
    const { incidentId } = record
    const provider = this._integrations.ticketing
    return this._once('ticketing', incidentId, TicketRecordSchema.parse, async (signal) => {
      const existing = await provider.findTicketByIncident(incidentId, { signal })
      if (existing !== null) {
        logger.info({ incidentId, ticketKey: existing.ticketKey }, 'Reusing existing ticket')
        return existing
      }
      return provider.createTicket({
        incidentId,
        summary: ticketSummary(alert),
        description: ticketDescription(incidentId, alert, analysis),
        priority: JIRA_PRIORITY[alert.severity],
        signal,
      })
    })
  }

  /** Branch, push the proposed fix, open (or find) the pull request */
  remediate(
    record: IncidentRecord,
    alert: ValidatedAlert,
    analysis: RootCauseAnalysis,
  ): Promise<StageResult<RemediationRecord>> {
    const { incidentId } = record
    const code = this._integrations.code
    const repository = analysis.targetRepository
    const branchName = remediationBranch(incidentId)

    return this._once('remediation', incidentId, RemediationRecordSchema.parse, async (signal) => {
      const fix = analysis.proposedFix
      if (fix === undefined) {
        throw new PermanentIntegrationError('Analysis produced no proposed fix', { provider: code.name })
      }

      const pull =
        (await code.findPullRequest({ repository, branchName, signal })) ??
        (await this._openPullRequest(record, alert, analysis, fix, signal))

      return {
        success: true,
        branchName,
        prNumber: pull.number,
        prUrl: pull.url,
        prMerged: pull.merged,
        errorMessage: null,
      }
    })
  }

  /**
   * Poll CI until it settles or `timeoutMs` elapses. A poll that fails
   * permanently (or exhausts its retries) ends the wait with that error.
   */
  async observeCi(
    record: IncidentRecord,
    target: PullRequestTarget,
    options: CiPollOptions,
  ): Promise<StageResult<CiVerdict>> {
    const now = this._runtime.now ?? Date.now
    const sleep = this._runtime.sleep ?? defaultSleep
    const startedAt = now()
    let polls = 0

    for (;;) {
      polls++
      const observed = await runStage(
        'ci',
        record.incidentId,
        (signal) => this._integrations.code.getCiStatus({ ...target, signal }),
        this._runtime,
      )
      const waitedMs = now() - startedAt
      if (!observed.ok) return { ok: false, error: observed.error, durationMs: waitedMs }

      const { ci, review, details } = observed.value
      if (ci !== 'pending') {
        return { ok: true, value: { outcome: ci, review, polls, waitedMs, details }, attempts: polls, durationMs: waitedMs }
      }
      if (waitedMs + options.pollIntervalMs > options.timeoutMs) {
        logger.warn({ incidentId: record.incidentId, polls, waitedMs }, 'CI did not settle before the deadline')
        return { ok: true, value: { outcome: 'timeout', review, polls, waitedMs, details }, attempts: polls, durationMs: waitedMs }
      }
      await sleep(options.pollIntervalMs)
    }
  }

  /** Merge the PR; "not mergeable" is a permanent failure */
  merge(record: IncidentRecord, target: PullRequestTarget, method: MergeMethod): Promise<StageResult<MergeOutcome>> {
    const code = this._integrations.code
    return this._once('merge', record.incidentId, MergeOutcomeSchema.parse, async (signal) => {
      const outcome = await code.mergePullRequest({ ...target, method, signal })
      if (!outcome.merged) {
        throw new PermanentIntegrationError(outcome.message, { provider: code.name, prNumber: target.prNumber })
      }
      return outcome
    })
  }

  transitionTicket(record: IncidentRecord, ticketKey: string, targetStatus: string): Promise<StageResult<TicketTransitionResult>> {
    return runStage(
      'ticketing',
      record.incidentId,
      (signal) => this._integrations.ticketing.transitionTicket(ticketKey, targetStatus, { signal }),
      this._runtime,
    )
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _openPullRequest(
    record: IncidentRecord,
    alert: ValidatedAlert,
    analysis: RootCauseAnalysis,
    fix: ProposedFix,
    signal: AbortSignal,
  ): Promise<PullRequestRef> {
    const code = this._integrations.code
    const repository = analysis.targetRepository
    const branchName = remediationBranch(record.incidentId)

    const branch = await code.createBranch({ repository, branchName, signal })
    await code.pushFiles({
      repository,
      branchName,
      files: [{ path: fix.filePath, content: fix.content }],
      message: `Remediate ${record.incidentId}: ${fix.summary}`,
      signal,
    })
    return code.createPullRequest({
      repository,
      branchName,
      baseBranch: branch.baseBranch,
      title: truncate(`fix(${alert.serviceName}): ${analysis.rootCause}`, 120),
      body: [
        `Automated remediation for ${record.incidentId}.`,
        '',
        `Root cause: ${analysis.rootCause}`,
        `Category: ${analysis.rootCauseCategory}`,
        `Confidence: ${analysis.confidenceScore.toFixed(2)}`,
        `Change: ${fix.summary}`,
      ].join('\n'),
      signal,
    })
  }

  private async _once<T>(
    stage: StageName,
    incidentId: string,
    parse: (raw: unknown) => T,
    fn: (signal: AbortSignal) => Promise<T>,
  ): Promise<StageResult<T>> {
    const key = idempotencyKey(incidentId, stage)
    const prior = await this._ledger.get(key, parse)
    if (prior !== undefined) {
      logger.info({ incidentId, stage, key }, 'Stage already completed; returning recorded result')
      return { ok: true, value: prior, attempts: 0, durationMs: 0 }
    }

    const result = await runStage(stage, incidentId, fn, this._runtime)
    if (result.ok) {
      await this._ledger.put(key, { incidentId, stage, output: result.value })
    }
    return result
  }
}

/**
 * Pipeline Orchestrator — factory and core implementation.
 *
 * Every write goes through IncidentStore.update(), so the orchestrator's
 * transitions serialize against the approval command on the same
 * per-incident lock. Each stage result is committed before the next stage
 * starts; a resumed run reads those results back and skips ahead.
 */

import { IncidentNotFoundError, LeaseLostError } from '../../core/errors.js'
import type { IncidentStatus, StageName } from '../../core/types.js'
import { childLogger, createLogger } from '../../utils/logger.js'
import { leaseHeldByOther, refreshLease } from '../incidents/lease.js'
import {
  appendEvent,
  failIncident,
  markPrMerged,
  resolveIncident,
  transitionIncident,
} from '../incidents/state-machine.js'
import type {
  IncidentRecord,
  RemediationRecord,
  RootCauseAnalysis,
  TicketRecord,
  ValidatedAlert,
} from '../incidents/types.js'
import { evaluateMergeGate } from '../merge-gate/merge-gate.js'
import { remediationBranch } from '../stage-adapters/stage-adapters.js'
import type { PullRequestTarget } from '../stage-adapters/stage-adapters.js'
import type { StageError, StageResult } from '../stage-adapters/types.js'
import type { PipelineOrchestrator } from './orchestrator.js'
import type { PipelineOrchestratorDeps } from './types.js'

const logger = createLogger('pipeline-orchestrator')

/** Repository and PR number the merge stage acts on, when a PR exists */
export function mergeTarget(record: IncidentRecord): PullRequestTarget | null {
  const prNumber = record.remediation?.prNumber ?? null
  if (record.rootCause === null || prNumber === null) return null
  return { repository: record.rootCause.targetRepository, prNumber }
}

export function createPipelineOrchestrator(deps: PipelineOrchestratorDeps): PipelineOrchestrator {
  const { store, adapters, settings, clock, eventBus, lease } = deps

  // -------------------------------------------------------------------------
  // Store helpers
  // -------------------------------------------------------------------------

  async function load(incidentId: string): Promise<IncidentRecord> {
    const record = await store.get(incidentId)
    if (record === null) throw new IncidentNotFoundError(incidentId)
    return record
  }

  /** store.update() that also reports the status change it committed, if any */
  async function update(incidentId: string, mutate: (draft: IncidentRecord) => void): Promise<IncidentRecord> {
    const before: IncidentStatus[] = []
    const committed = await store.update(incidentId, (draft) => {
      if (lease !== undefined) {
        if (leaseHeldByOther(draft, lease.ownerId, lease)) {
          throw new LeaseLostError(incidentId, draft.lease?.ownerId ?? 'unknown')
        }
      }
      before.push(draft.status)
      mutate(draft)
      if (lease !== undefined) refreshLease(draft, lease)
    })
    const [from] = before
    if (from !== undefined && from !== committed.status) {
      logger.info({ incidentId, from, to: committed.status }, 'Incident status changed')
      eventBus?.emit('incident:status-changed', { incidentId, from, to: committed.status })
    }
    return committed
  }

  function failWith(
    incidentId: string,
    stage: StageName,
    error: StageError | string,
    details: Record<string, unknown> = {},
  ): Promise<IncidentRecord> {
    const message = typeof error === 'string' ? error : error.message
    const cause = typeof error === 'string' ? {} : { kind: error.kind, attempts: error.attempts }
    return update(incidentId, (draft) => {
      failIncident(draft, stage, message, clock, { ...cause, ...details })
    })
  }

  function recordStageFailure(draft: IncidentRecord, stage: StageName, error: StageError): void {
    draft.stageFailures.push({ stage, message: error.message, kind: error.kind, at: clock().toISOString() })
  }

  // -------------------------------------------------------------------------
  // Stages
  // -------------------------------------------------------------------------

  async function ticketingStage(
    record: IncidentRecord,
    alert: ValidatedAlert,
    analysis: RootCauseAnalysis,
  ): Promise<StageResult<TicketRecord>> {
    const result = await adapters.createTicket(record, alert, analysis)
    await update(record.incidentId, (draft) => {
      if (result.ok) {
        draft.ticket = result.value
        appendEvent(
          draft,
          {
            eventType: 'TICKET_CREATED',
            agent: 'ticketing',
            durationMs: result.durationMs,
            details: { ticketKey: result.value.ticketKey, ticketUrl: result.value.ticketUrl },
          },
          clock,
        )
      } else {
        recordStageFailure(draft, 'ticketing', result.error)
        appendEvent(
          draft,
          {
            eventType: 'TICKET_FAILED',
            agent: 'ticketing',
            durationMs: result.durationMs,
            details: { error: result.error.message, kind: result.error.kind },
          },
          clock,
        )
      }
    })
    return result
  }

  async function remediationStage(
    record: IncidentRecord,
    alert: ValidatedAlert,
    analysis: RootCauseAnalysis,
  ): Promise<StageResult<RemediationRecord>> {
    const result = await adapters.remediate(record, alert, analysis)
    await update(record.incidentId, (draft) => {
      if (result.ok) {
        draft.remediation = result.value
        draft.prStatus = 'PENDING_CI'
        appendEvent(
          draft,
          {
            eventType: 'PR_CREATED',
            agent: 'remediation',
            durationMs: result.durationMs,
            details: {
              branchName: result.value.branchName,
              prNumber: result.value.prNumber,
              prUrl: result.value.prUrl,
            },
          },
          clock,
        )
      } else {
        draft.remediation = {
          success: false,
          branchName: remediationBranch(draft.incidentId),
          prNumber: null,
          prUrl: null,
          prMerged: false,
          errorMessage: result.error.message,
        }
        recordStageFailure(draft, 'remediation', result.error)
        appendEvent(
          draft,
          {
            eventType: 'REMEDIATION_FAILED',
            agent: 'remediation',
            durationMs: result.durationMs,
            details: { error: result.error.message, kind: result.error.kind },
          },
          clock,
        )
      }
    })
    return result
  }

  /** Merge the PR, close out the ticket, resolve; any merge failure fails the incident */
  async function mergeStage(incidentId: string, record: IncidentRecord): Promise<IncidentRecord> {
    const log = childLogger(logger, { incidentId, stage: 'merge' })
    const target = mergeTarget(record)
    if (target === null) return failWith(incidentId, 'merge', 'No pull request to merge')

    const method = record.policy.mergeMethod
    const started = await update(incidentId, (draft) => {
      appendEvent(draft, { eventType: 'MERGE_STARTED', agent: 'merge', details: { prNumber: target.prNumber, method } }, clock)
    })

    const result = await adapters.merge(started, target, method)
    if (!result.ok) {
      log.warn({ err: result.error.message }, 'Merge failed')
      return update(incidentId, (draft) => {
        appendEvent(
          draft,
          {
            eventType: 'MERGE_FAILED',
            agent: 'merge',
            durationMs: result.durationMs,
            details: { prNumber: target.prNumber, error: result.error.message },
          },
          clock,
        )
        failIncident(draft, 'merge', result.error.message, clock, { kind: result.error.kind })
      })
    }

    const merged = await update(incidentId, (draft) => {
      markPrMerged(draft)
      appendEvent(
        draft,
        {
          eventType: 'PR_MERGED',
          agent: 'merge',
          durationMs: result.durationMs,
          details: { prNumber: target.prNumber, method, alreadyMerged: result.value.alreadyMerged },
        },
        clock,
      )
    })
    log.info({ prNumber: target.prNumber }, 'Pull request merged')

    const ticket = merged.ticket
    if (ticket !== null) {
      const moved = await adapters.transitionTicket(merged, ticket.ticketKey, settings.doneStatus)
      await update(incidentId, (draft) => {
        if (moved.ok) {
          draft.ticket = { ...ticket, status: moved.value.toStatus }
          appendEvent(
            draft,
            { eventType: 'TICKET_TRANSITIONED', agent: 'ticketing', details: { ...moved.value } },
            clock,
          )
        } else {
          recordStageFailure(draft, 'ticketing', moved.error)
          appendEvent(
            draft,
            {
              eventType: 'TICKET_TRANSITION_FAILED',
              agent: 'ticketing',
              details: { ticketKey: ticket.ticketKey, error: moved.error.message },
            },
            clock,
          )
        }
      })
    }

    return update(incidentId, (draft) => {
      resolveIncident(draft, 'merge', clock, { prNumber: target.prNumber })
    })
  }

  // -------------------------------------------------------------------------
  // Public operations
  // -------------------------------------------------------------------------

  async function run(incidentId: string): Promise<IncidentRecord> {
    let record = await load(incidentId)
    if (record.status === 'MERGING') return executeMerge(incidentId)
    if (record.status !== 'PROCESSING') {
      logger.debug({ incidentId, status: record.status }, 'Nothing to run')
      return record
    }

    // 1. Triage
    let alert = record.validatedAlert
    if (alert === null) {
      const result = await adapters.triage(record)
      if (!result.ok) return failWith(incidentId, 'triage', result.error)
      const validated = result.value
      alert = validated
      record = await update(incidentId, (draft) => {
        draft.validatedAlert = validated
        draft.severity = validated.severity
        draft.serviceName = validated.serviceName
        appendEvent(
          draft,
          {
            eventType: 'ALERT_VALIDATED',
            agent: 'triage',
            durationMs: result.durationMs,
            details: {
              isActionable: validated.isActionable,
              severity: validated.severity,
              errorType: validated.errorType,
              triageReason: validated.triageReason,
            },
          },
          clock,
        )
        if (!validated.isActionable) {
          appendEvent(
            draft,
            { eventType: 'ALERT_SUPPRESSED', agent: 'triage', details: { reason: validated.triageReason } },
            clock,
          )
          resolveIncident(draft, 'triage', clock, { suppressed: true })
        }
      })
      if (!validated.isActionable) {
        logger.info({ incidentId }, 'Alert suppressed by triage')
        return record
      }
    }

    // 2. Analysis
    let analysis = record.rootCause
    if (analysis === null) {
      record = await update(incidentId, (draft) => {
        appendEvent(draft, { eventType: 'INVESTIGATION_STARTED', agent: 'analysis' }, clock)
      })
      const result = await adapters.analyze(record, alert)
      if (!result.ok) return failWith(incidentId, 'analysis', result.error)
      const found = result.value
      analysis = found
      record = await update(incidentId, (draft) => {
        draft.rootCause = found
        appendEvent(
          draft,
          {
            eventType: 'ROOT_CAUSE_IDENTIFIED',
            agent: 'analysis',
            durationMs: result.durationMs,
            details: {
              category: found.rootCauseCategory,
              confidence: found.confidenceScore,
              targetRepository: found.targetRepository,
              targetFile: found.targetFile,
            },
          },
          clock,
        )
      })
    }

    // 3. Ticketing ∥ remediation
    const [ticketing] = await Promise.all([
      record.ticket === null ? ticketingStage(record, alert, analysis) : Promise.resolve(null),
      record.remediation === null ? remediationStage(record, alert, analysis) : Promise.resolve(null),
    ])
    record = await load(incidentId)

    const remediation = record.remediation
    if (remediation === null || !remediation.success || remediation.prNumber === null) {
      const reason = remediation?.errorMessage ?? 'Remediation produced no pull request'
      const ticketFailed = ticketing !== null && !ticketing.ok
      const message = ticketFailed
        ? `Ticketing and remediation both failed: ${ticketing.error.message}; ${reason}`
        : reason
      return failWith(incidentId, 'remediation', message, { ticketFailed })
    }

    // 4. CI
    const target: PullRequestTarget = { repository: analysis.targetRepository, prNumber: remediation.prNumber }
    const observed = await adapters.observeCi(record, target, {
      pollIntervalMs: settings.ciPollIntervalMs,
      timeoutMs: settings.ciTimeoutMs,
    })
    if (!observed.ok) return failWith(incidentId, 'ci', observed.error, { prNumber: target.prNumber })

    const verdict = observed.value
    const ciDetails = { prNumber: target.prNumber, polls: verdict.polls, waitedMs: verdict.waitedMs }
    if (verdict.outcome === 'failed') {
      return update(incidentId, (draft) => {
        draft.prStatus = 'CI_FAILED'
        appendEvent(draft, { eventType: 'CI_FAILED', agent: 'ci', durationMs: verdict.waitedMs, details: ciDetails }, clock)
        failIncident(draft, 'ci', `CI checks failed on PR #${String(target.prNumber)}`, clock, ciDetails)
      })
    }
    if (verdict.outcome === 'timeout') {
      return update(incidentId, (draft) => {
        appendEvent(draft, { eventType: 'CI_TIMEOUT', agent: 'ci', durationMs: verdict.waitedMs, details: ciDetails }, clock)
        failIncident(draft, 'ci', `CI did not complete within ${String(settings.ciTimeoutMs)}ms`, clock, ciDetails)
      })
    }
    record = await update(incidentId, (draft) => {
      draft.prStatus = 'CI_PASSED'
      appendEvent(
        draft,
        { eventType: 'CI_PASSED', agent: 'ci', durationMs: verdict.waitedMs, details: { ...ciDetails, review: verdict.review } },
        clock,
      )
    })

    // 5. Merge gate
    const decision = evaluateMergeGate(record.policy, {
      prStatus: record.prStatus,
      reviewStatus: verdict.review,
      severity: record.severity,
    })
    record = await update(incidentId, (draft) => {
      appendEvent(
        draft,
        { eventType: 'MERGE_GATE_EVALUATED', agent: 'merge_gate', details: { action: decision.action, reasons: decision.reasons } },
        clock,
      )
      if (decision.action === 'require_approval') {
        draft.approvalStatus = 'PENDING'
        transitionIncident(
          draft,
          'AWAITING_APPROVAL',
          { eventType: 'ESCALATED_TO_HUMAN', agent: 'merge_gate', details: { reasons: decision.reasons } },
          clock,
        )
      } else if (decision.action === 'auto_merge') {
        draft.approvalStatus = 'NOT_REQUIRED'
      }
    })

    if (decision.action !== 'auto_merge') {
      logger.info({ incidentId, action: decision.action, reasons: decision.reasons }, 'Merge gate holds the incident')
      return record
    }

    // 6. Auto-merge
    return mergeStage(incidentId, record)
  }

  async function executeMerge(incidentId: string): Promise<IncidentRecord> {
    const record = await load(incidentId)
    if (record.status !== 'MERGING') {
      logger.warn({ incidentId, status: record.status }, 'executeMerge called outside MERGING; ignoring')
      return record
    }
    return mergeStage(incidentId, record)
  }

  return { run, executeMerge }
}

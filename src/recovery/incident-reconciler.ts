/**
 * IncidentReconciler — finds incidents left without a running task and acts
 * on them.
 *
 *  - PROCESSING / MERGING with no in-flight task and no live lease held by
 *    another process: resume the pipeline (recorded stage outputs are
 *    skipped), or fail it once max_resume_attempts is spent
 *  - AWAITING_APPROVAL past the approval window: reject and fail
 *
 * Runs once on initialize() and then every `intervalMs`.
 */

import type { BaseService } from '../core/lifecycle.js'
import type { TypedEventBus } from '../core/event-bus.js'
import type { IncidentStatus } from '../core/types.js'
import { isStale } from '../modules/incidents/incident-factory.js'
import { grantLease, leaseHeldByOther } from '../modules/incidents/lease.js'
import type { LeaseSettings } from '../modules/incidents/lease.js'
import { appendEvent, failIncident, isTerminal } from '../modules/incidents/state-machine.js'
import type { IncidentRecord } from '../modules/incidents/types.js'
import type { IncidentService } from '../modules/incident-service/incident-service.js'
import type { IncidentStore } from '../modules/incident-store/incident-store.js'
import type { Clock } from '../modules/timeline/timeline-log.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('recovery:reconciler')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ReconcileActionKind = 'resumed' | 'failed' | 'expired'

export interface ReconcileAction {
  incidentId: string
  action: ReconcileActionKind
  reason: string
}

export interface ReconcileResult {
  resumed: number
  failed: number
  expired: number
  actions: ReconcileAction[]
}

export interface IncidentReconcilerOptions {
  store: IncidentStore
  service: Pick<IncidentService, 'isInFlight' | 'resumeIncident'>
  maxResumeAttempts: number
  /** 0 disables the approval window */
  approvalTimeoutMs: number
  /** 0 disables the periodic sweep */
  intervalMs: number
  clock?: Clock
  eventBus?: TypedEventBus
  /** This process's lease; a resumed incident is leased to it */
  lease?: LeaseSettings
}

// ---------------------------------------------------------------------------
// IncidentReconciler
// ---------------------------------------------------------------------------

export class IncidentReconciler implements BaseService {
  private readonly _options: IncidentReconcilerOptions
  private readonly _clock: Clock
  private _timer: ReturnType<typeof setInterval> | null = null
  private _running: Promise<ReconcileResult> | null = null

  constructor(options: IncidentReconcilerOptions) {
    this._options = options
    this._clock = options.clock ?? (() => new Date())
  }

  async initialize(): Promise<void> {
    await this.reconcile()
    if (this._options.intervalMs > 0) {
      this._timer = setInterval(() => {
        this.reconcile().catch((err: unknown) => {
          logger.error({ err }, 'Reconciliation sweep failed')
        })
      }, this._options.intervalMs)
      this._timer.unref()
    }
  }

  async shutdown(): Promise<void> {
    if (this._timer !== null) {
      clearInterval(this._timer)
      this._timer = null
    }
    if (this._running !== null) {
      await this._running
    }
  }

  /** One sweep; concurrent callers share the sweep already in progress */
  reconcile(): Promise<ReconcileResult> {
    if (this._running === null) {
      this._running = this._sweep().finally(() => {
        this._running = null
      })
    }
    return this._running
  }

  // -------------------------------------------------------------------------
  // Sweep
  // -------------------------------------------------------------------------

  private async _sweep(): Promise<ReconcileResult> {
    const { store } = this._options
    const result: ReconcileResult = { resumed: 0, failed: 0, expired: 0, actions: [] }

    const orphanCandidates = [
      ...(await store.list({ status: 'PROCESSING' })),
      ...(await store.list({ status: 'MERGING' })),
    ]
    for (const record of orphanCandidates) {
      if (this._options.service.isInFlight(record.incidentId)) continue
      if (this._leasedElsewhere(record)) {
        logger.debug({ incidentId: record.incidentId, owner: record.lease?.ownerId }, 'Incident leased by another process')
        continue
      }
      const action = await this._recoverOrphan(record)
      if (action !== null) this._tally(result, action)
    }

    if (this._options.approvalTimeoutMs > 0) {
      const now = this._clock()
      for (const record of await store.list({ status: 'AWAITING_APPROVAL' })) {
        if (!isStale(record, this._options.approvalTimeoutMs, now)) continue
        const action = await this._expireApproval(record)
        if (action !== null) this._tally(result, action)
      }
    }

    if (result.actions.length > 0) {
      logger.info(
        { resumed: result.resumed, failed: result.failed, expired: result.expired },
        'Reconciliation sweep acted on incidents',
      )
    } else {
      logger.debug('Reconciliation sweep found nothing to do')
    }
    return result
  }

  private async _recoverOrphan(record: IncidentRecord): Promise<ReconcileAction | null> {
    const { maxResumeAttempts } = this._options
    const incidentId = record.incidentId
    const decision: { action: ReconcileActionKind | null; reason: string } = { action: null, reason: '' }

    await this._update(incidentId, (draft) => {
      if (draft.status !== 'PROCESSING' && draft.status !== 'MERGING') return
      if (this._leasedElsewhere(draft)) return
      if (draft.resumeAttempts >= maxResumeAttempts) {
        decision.action = 'failed'
        decision.reason = `Pipeline abandoned after ${String(draft.resumeAttempts)} resume attempts`
        failIncident(draft, 'pipeline', decision.reason, this._clock, { resumeAttempts: draft.resumeAttempts })
        draft.lease = null
        return
      }
      const { lease } = this._options
      if (lease !== undefined) draft.lease = grantLease(lease)
      draft.resumeAttempts += 1
      decision.action = 'resumed'
      decision.reason = `resume attempt ${String(draft.resumeAttempts)} of ${String(maxResumeAttempts)}`
      appendEvent(
        draft,
        {
          eventType: 'PIPELINE_RESUMED',
          agent: 'reconciler',
          details: { attempt: draft.resumeAttempts, status: draft.status },
        },
        this._clock,
      )
    })

    if (decision.action === null) return null
    if (decision.action === 'resumed') {
      this._options.service.resumeIncident(incidentId)
    }
    logger.info({ incidentId, action: decision.action, reason: decision.reason }, 'Reconciled orphaned incident')
    return { incidentId, action: decision.action, reason: decision.reason }
  }

  private async _expireApproval(record: IncidentRecord): Promise<ReconcileAction | null> {
    const incidentId = record.incidentId
    const reason = 'approval window expired'
    const expired: boolean[] = []

    await this._update(incidentId, (draft) => {
      if (draft.status !== 'AWAITING_APPROVAL') return
      draft.approvalStatus = 'REJECTED'
      appendEvent(draft, { eventType: 'MERGE_REJECTED', agent: 'reconciler', details: { reason } }, this._clock)
      failIncident(draft, 'approval', 'Approval window expired', this._clock, {
        approvalTimeoutMs: this._options.approvalTimeoutMs,
      })
      expired.push(true)
    })

    if (expired.length === 0) return null
    logger.info({ incidentId }, 'Approval window expired')
    return { incidentId, action: 'expired', reason }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private async _update(incidentId: string, mutate: (draft: IncidentRecord) => void): Promise<void> {
    const before: IncidentStatus[] = []
    const committed = await this._options.store.update(incidentId, (draft) => {
      if (isTerminal(draft.status)) return
      before.push(draft.status)
      mutate(draft)
    })
    const [from] = before
    if (from !== undefined && from !== committed.status) {
      this._options.eventBus?.emit('incident:status-changed', { incidentId, from, to: committed.status })
    }
  }

  private _leasedElsewhere(record: IncidentRecord): boolean {
    const { lease } = this._options
    return leaseHeldByOther(record, lease?.ownerId, lease)
  }

  private _tally(result: ReconcileResult, action: ReconcileAction): void {
    result.actions.push(action)
    result[action.action] += 1
    this._options.eventBus?.emit('incident:reconciled', { incidentId: action.incidentId, action: action.action })
  }
}

export function createIncidentReconciler(options: IncidentReconcilerOptions): IncidentReconciler {
  return new IncidentReconciler(options)
}

/**
 * IncidentServiceImpl — concrete IncidentService.
 *
 * Every write goes through IncidentStore.update(): the approval commands
 * check eligibility inside the store's per-incident critical section, so a
 * command racing the pipeline either sees AWAITING_APPROVAL and wins the
 * transition, or fails fast with InvalidStateError.
 */

import {
  ConcurrentModificationError,
  InvalidStateError,
  IncidentNotFoundError,
  LeaseLostError,
} from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { IncidentStatus } from '../../core/types.js'
import { sleep, toError } from '../../utils/helpers.js'
import { childLogger, createLogger } from '../../utils/logger.js'
import {
  createIncidentRecord,
  generateIncidentId,
  toIncidentDetail,
  toIncidentSummary,
} from '../incidents/incident-factory.js'
import { grantLease, isLeasedStatus, leaseHeldByOther, refreshLease } from '../incidents/lease.js'
import type { LeaseSettings } from '../incidents/lease.js'
import type { AlertPayload } from '../incidents/schemas.js'
import { appendEvent, failIncident, isTerminal, transitionIncident } from '../incidents/state-machine.js'
import type {
  IncidentDetail,
  IncidentFilter,
  IncidentRecord,
  IncidentSummary,
  IntegrationTrace,
  MergePolicySnapshot,
} from '../incidents/types.js'
import type { IncidentStore } from '../incident-store/incident-store.js'
import { evaluateApprovalRequest, evaluateRejectionRequest } from '../merge-gate/merge-gate.js'
import type { PipelineOrchestrator } from '../pipeline-orchestrator/orchestrator.js'
import type { Clock } from '../timeline/timeline-log.js'
import type {
  CreateIncidentOptions,
  IncidentService,
  IncidentServiceOptions,
} from './incident-service.js'

const logger = createLogger('incident-service')

const DEFAULT_DRAIN_TIMEOUT_MS = 10_000

export class IncidentServiceImpl implements IncidentService {
  private readonly _store: IncidentStore
  private readonly _orchestrator: PipelineOrchestrator
  private readonly _policy: MergePolicySnapshot
  private readonly _trace: IntegrationTrace
  private readonly _staleAfterMs: number
  private readonly _clock: Clock
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _drainTimeoutMs: number
  private readonly _lease: LeaseSettings | undefined

  /** Tail of each incident's task chain */
  private readonly _tasks = new Map<string, Promise<void>>()

  constructor(options: IncidentServiceOptions) {
    this._store = options.store
    this._orchestrator = options.orchestrator
    this._policy = options.policy
    this._trace = options.trace
    this._staleAfterMs = options.staleAfterMs
    this._clock = options.clock ?? (() => new Date())
    this._eventBus = options.eventBus
    this._drainTimeoutMs = options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS
    this._lease = options.lease
  }

  // -------------------------------------------------------------------------
  // BaseService
  // -------------------------------------------------------------------------

  async initialize(): Promise<void> {
    logger.debug('Incident service ready')
  }

  async shutdown(): Promise<void> {
    if (this._tasks.size === 0) return
    logger.info({ inFlight: this._tasks.size }, 'Waiting for in-flight pipeline tasks')
    const drained = await Promise.race([
      this.waitForIdle().then(() => true),
      sleep(this._drainTimeoutMs).then(() => false),
    ])
    if (!drained) {
      logger.warn(
        { inFlight: this._tasks.size, drainTimeoutMs: this._drainTimeoutMs },
        'In-flight tasks left running; reconciliation resumes them on next start',
      )
    }
  }

  // -------------------------------------------------------------------------
  // Commands
  // -------------------------------------------------------------------------

  async createIncident(alert: AlertPayload, options: CreateIncidentOptions = {}): Promise<IncidentRecord> {
    const initial = createIncidentRecord({
      incidentId: generateIncidentId(),
      alert,
      policy: this._policy,
      trace: this._trace,
      source: options.source ?? 'api',
      clock: this._clock,
    })
    if (this._lease !== undefined) initial.lease = grantLease(this._lease)
    const record = await this._store.create(initial)
    logger.info(
      { incidentId: record.incidentId, severity: record.severity, serviceName: record.serviceName },
      'Incident created',
    )
    this._eventBus?.emit('incident:created', {
      incidentId: record.incidentId,
      severity: record.severity,
      serviceName: record.serviceName,
    })
    this._schedule(record.incidentId, () => this._orchestrator.run(record.incidentId))
    return record
  }

  async approveMerge(incidentId: string, actor = 'operator'): Promise<IncidentRecord> {
    const approved = await this._update(incidentId, (draft) => {
      const eligibility = evaluateApprovalRequest(draft)
      if (!eligibility.allowed) {
        throw new InvalidStateError(incidentId, eligibility.reason, eligibility.message, {
          status: draft.status,
          prStatus: draft.prStatus,
          approvalStatus: draft.approvalStatus,
        })
      }
      draft.approvalStatus = 'APPROVED'
      transitionIncident(
        draft,
        'MERGING',
        { eventType: 'MERGE_APPROVED', agent: 'approval', details: { approvedBy: actor } },
        this._clock,
      )
    })
    logger.info({ incidentId, actor }, 'Merge approved')
    this._schedule(incidentId, () => this._orchestrator.executeMerge(incidentId))
    return approved
  }

  async rejectMerge(incidentId: string, reason = 'rejected by operator', actor = 'operator'): Promise<IncidentRecord> {
    const rejected = await this._update(incidentId, (draft) => {
      const eligibility = evaluateRejectionRequest(draft)
      if (!eligibility.allowed) {
        throw new InvalidStateError(incidentId, eligibility.reason, eligibility.message, {
          status: draft.status,
          approvalStatus: draft.approvalStatus,
        })
      }
      draft.approvalStatus = 'REJECTED'
      appendEvent(draft, { eventType: 'MERGE_REJECTED', agent: 'approval', details: { rejectedBy: actor, reason } }, this._clock)
      failIncident(draft, 'approval', `Merge rejected: ${reason}`, this._clock, { rejectedBy: actor })
    })
    logger.info({ incidentId, actor, reason }, 'Merge rejected')
    return rejected
  }

  resumeIncident(incidentId: string): boolean {
    if (this._tasks.has(incidentId)) return false
    this._schedule(incidentId, () => this._orchestrator.run(incidentId))
    return true
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  async getIncident(incidentId: string): Promise<IncidentDetail> {
    const record = await this._store.get(incidentId)
    if (record === null) throw new IncidentNotFoundError(incidentId)
    return toIncidentDetail(record, this._staleAfterMs, this._clock())
  }

  async listIncidents(filter: IncidentFilter = {}): Promise<IncidentSummary[]> {
    const now = this._clock()
    const records = await this._store.list(filter)
    return records.map((record) => toIncidentSummary(record, this._staleAfterMs, now))
  }

  isInFlight(incidentId: string): boolean {
    return this._tasks.has(incidentId)
  }

  get inFlightCount(): number {
    return this._tasks.size
  }

  async waitForIdle(incidentId?: string): Promise<void> {
    for (;;) {
      const pending =
        incidentId === undefined ? [...this._tasks.values()] : [this._tasks.get(incidentId)].filter(isTask)
      if (pending.length === 0) return
      await Promise.all(pending)
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /** store.update() that also reports the status change it committed */
  private async _update(incidentId: string, mutate: (draft: IncidentRecord) => void): Promise<IncidentRecord> {
    const before: IncidentStatus[] = []
    const committed = await this._store.update(incidentId, (draft) => {
      before.push(draft.status)
      mutate(draft)
      const lease = this._lease
      if (lease !== undefined && !leaseHeldByOther(draft, lease.ownerId, lease)) refreshLease(draft, lease)
    })
    const [from] = before
    if (from !== undefined && from !== committed.status) {
      this._eventBus?.emit('incident:status-changed', { incidentId, from, to: committed.status })
    }
    return committed
  }

  /**
   * Append `work` to the incident's task chain. Work for one incident runs
   * strictly one after another.
   */
  private _schedule(incidentId: string, work: () => Promise<IncidentRecord>): void {
    const log = childLogger(logger, { incidentId })
    const previous = this._tasks.get(incidentId) ?? Promise.resolve()
    const tracked: Promise<void> = previous
      .then(() => this._runLeased(incidentId, work))
      .then(
        (record) => {
          log.debug({ status: record.status }, 'Pipeline task settled')
        },
        (err: unknown) => {
          if (err instanceof LeaseLostError || err instanceof ConcurrentModificationError) {
            log.warn({ err: err.message }, 'Incident taken over by another process; task stopped')
            return
          }
          return this._recordCrash(incidentId, err)
        },
      )
      .finally(() => {
        if (this._tasks.get(incidentId) === tracked) this._tasks.delete(incidentId)
      })
    this._tasks.set(incidentId, tracked)
  }

  /** Run `work` while renewing this process's lease on the incident */
  private async _runLeased(incidentId: string, work: () => Promise<IncidentRecord>): Promise<IncidentRecord> {
    const lease = this._lease
    if (lease === undefined) return work()

    const heartbeat = setInterval(() => {
      this._renewLease(incidentId, lease).catch((err: unknown) => {
        logger.warn({ incidentId, err }, 'Lease renewal failed')
      })
    }, Math.max(1, Math.floor(lease.ttlMs / 3)))
    heartbeat.unref()
    try {
      return await work()
    } finally {
      clearInterval(heartbeat)
    }
  }

  private async _renewLease(incidentId: string, lease: LeaseSettings): Promise<void> {
    await this._store.update(incidentId, (draft) => {
      if (!isLeasedStatus(draft.status) || leaseHeldByOther(draft, lease.ownerId, lease)) return
      draft.lease = grantLease(lease)
    })
  }

  /** A task rejected: fail the incident unless it already reached a terminal state */
  private async _recordCrash(incidentId: string, err: unknown): Promise<void> {
    const error = toError(err)
    logger.error({ incidentId, err: error }, 'Pipeline task crashed')
    try {
      const current = await this._store.get(incidentId)
      if (current === null || isTerminal(current.status)) return
      await this._update(incidentId, (draft) => {
        if (isTerminal(draft.status)) return
        if (leaseHeldByOther(draft, this._lease?.ownerId, this._lease)) return
        failIncident(draft, 'pipeline', `Pipeline task crashed: ${error.message}`, this._clock, { crashed: true })
      })
    } catch (updateErr) {
      logger.error({ incidentId, err: updateErr }, 'Could not record pipeline crash')
    }
  }
}

function isTask(task: Promise<void> | undefined): task is Promise<void> {
  return task !== undefined
}

export function createIncidentService(options: IncidentServiceOptions): IncidentService {
  return new IncidentServiceImpl(options)
}

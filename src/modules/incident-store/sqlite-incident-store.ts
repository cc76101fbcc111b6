/**
 * SQLite-backed IncidentStore and IdempotencyStore.
 *
 * update() serialises writers in this process through the per-incident
 * mutex and guards against writers in other processes with a version
 * compare-and-swap; a lost race raises ConcurrentModificationError and
 * nothing is written. Timeline rows are only ever appended.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  ConcurrentModificationError,
  IncidentAlreadyExistsError,
  IncidentNotFoundError,
} from '../../core/errors.js'
import type { StageName } from '../../core/types.js'
import {
  getIncidentRow,
  insertIncident,
  listIncidentRows,
  updateIncidentRow,
} from '../../persistence/queries/incidents.js'
import type { IncidentRow } from '../../persistence/queries/incidents.js'
import { getStageResult, putStageResult } from '../../persistence/queries/stage-results.js'
import { appendTimelineRows, getTimelineRows } from '../../persistence/queries/timeline.js'
import type { TimelineRow } from '../../persistence/queries/timeline.js'
import { createLogger } from '../../utils/logger.js'
import {
  IncidentColumnsSchema,
  IncidentStateSchema,
  TimelineEventSchema,
} from '../incidents/schemas.js'
import type { IncidentState } from '../incidents/schemas.js'
import type { IncidentFilter, IncidentRecord } from '../incidents/types.js'
import type { TimelineEvent } from '../timeline/types.js'
import type { IdempotencyStore, IncidentMutator, IncidentStore } from './incident-store.js'
import { KeyedMutex } from './keyed-mutex.js'

const logger = createLogger('incident-store:sqlite')

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function toRow(record: IncidentRecord, version: number): IncidentRow {
  const state: IncidentState = {
    rawAlert: record.rawAlert,
    validatedAlert: record.validatedAlert,
    rootCause: record.rootCause,
    ticket: record.ticket,
    remediation: record.remediation,
    errorMessage: record.errorMessage,
    failedStage: record.failedStage,
    stageFailures: record.stageFailures,
    policy: record.policy,
    integrationTrace: record.integrationTrace,
    resumeAttempts: record.resumeAttempts,
  }
  return {
    incident_id: record.incidentId,
    status: record.status,
    severity: record.severity,
    service_name: record.serviceName,
    approval_status: record.approvalStatus,
    pr_status: record.prStatus,
    created_at: record.createdAt,
    updated_at: record.updatedAt,
    resolved_at: record.resolvedAt,
    state_json: JSON.stringify(state),
    owner_id: record.lease?.ownerId ?? null,
    lease_expires_at: record.lease?.expiresAt ?? null,
    version,
  }
}

function toTimelineRow(incidentId: string, seq: number, event: TimelineEvent): TimelineRow {
  return {
    incident_id: incidentId,
    seq,
    event_type: event.eventType,
    timestamp: event.timestamp,
    agent: event.agent,
    details_json: JSON.stringify(event.details),
    duration_ms: event.durationMs,
    transition_from: event.transition?.from ?? null,
    transition_to: event.transition?.to ?? null,
  }
}

function fromTimelineRow(row: TimelineRow): TimelineEvent {
  return TimelineEventSchema.parse({
    eventType: row.event_type,
    timestamp: row.timestamp,
    agent: row.agent,
    details: JSON.parse(row.details_json),
    durationMs: row.duration_ms,
    transition:
      row.transition_from !== null && row.transition_to !== null
        ? { from: row.transition_from, to: row.transition_to }
        : undefined,
  })
}

function fromRow(row: IncidentRow, timeline: TimelineRow[]): IncidentRecord {
  const columns = IncidentColumnsSchema.parse({
    status: row.status,
    severity: row.severity,
    approvalStatus: row.approval_status,
    prStatus: row.pr_status,
  })
  const state = IncidentStateSchema.parse(JSON.parse(row.state_json))
  return {
    incidentId: row.incident_id,
    ...columns,
    serviceName: row.service_name,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    resolvedAt: row.resolved_at,
    ...state,
    lease:
      row.owner_id !== null && row.lease_expires_at !== null
        ? { ownerId: row.owner_id, expiresAt: row.lease_expires_at }
        : null,
    timeline: timeline.map(fromTimelineRow),
    version: row.version,
  }
}

// ---------------------------------------------------------------------------
// SqliteIncidentStore
// ---------------------------------------------------------------------------

export class SqliteIncidentStore implements IncidentStore {
  private readonly _db: BetterSqlite3Database
  private readonly _mutex = new KeyedMutex()

  constructor(db: BetterSqlite3Database) {
    this._db = db
  }

  async create(record: IncidentRecord): Promise<IncidentRecord> {
    const insert = this._db.transaction(() => {
      if (getIncidentRow(this._db, record.incidentId) !== undefined) {
        throw new IncidentAlreadyExistsError(record.incidentId)
      }
      insertIncident(this._db, toRow(record, 1))
      appendTimelineRows(
        this._db,
        record.timeline.map((event, seq) => toTimelineRow(record.incidentId, seq, event)),
      )
    })
    insert()
    return this._read(record.incidentId)
  }

  async get(incidentId: string): Promise<IncidentRecord | null> {
    const row = getIncidentRow(this._db, incidentId)
    if (row === undefined) return null
    return fromRow(row, getTimelineRows(this._db, incidentId))
  }

  async list(filter: IncidentFilter = {}): Promise<IncidentRecord[]> {
    return listIncidentRows(this._db, {
      status: filter.status,
      service_name: filter.serviceName,
      limit: filter.limit,
    }).map((row) => fromRow(row, getTimelineRows(this._db, row.incident_id)))
  }

  update(incidentId: string, mutator: IncidentMutator): Promise<IncidentRecord> {
    return this._mutex.runExclusive(incidentId, async () => {
      const current = this._read(incidentId)
      const persistedEvents = current.timeline.length
      const draft = structuredClone(current)
      await mutator(draft)
      draft.incidentId = incidentId

      const commit = this._db.transaction(() => {
        const written = updateIncidentRow(this._db, toRow(draft, current.version + 1), current.version)
        if (!written) {
          throw new ConcurrentModificationError(incidentId, current.version)
        }
        appendTimelineRows(
          this._db,
          draft.timeline
            .slice(persistedEvents)
            .map((event, offset) => toTimelineRow(incidentId, persistedEvents + offset, event)),
        )
      })

      try {
        commit()
      } catch (err) {
        if (err instanceof ConcurrentModificationError) {
          logger.warn({ incidentId, expectedVersion: current.version }, 'Lost compare-and-swap race')
        }
        throw err
      }
      return this._read(incidentId)
    })
  }

  private _read(incidentId: string): IncidentRecord {
    const row = getIncidentRow(this._db, incidentId)
    if (row === undefined) {
      throw new IncidentNotFoundError(incidentId)
    }
    return fromRow(row, getTimelineRows(this._db, incidentId))
  }
}

// ---------------------------------------------------------------------------
// SqliteIdempotencyStore
// ---------------------------------------------------------------------------

export class SqliteIdempotencyStore implements IdempotencyStore {
  private readonly _db: BetterSqlite3Database

  constructor(db: BetterSqlite3Database) {
    this._db = db
  }

  async get<T>(key: string, parse: (raw: unknown) => T): Promise<T | undefined> {
    const row = getStageResult(this._db, key)
    if (row === undefined) return undefined
    const raw: unknown = JSON.parse(row.output_json)
    return parse(raw)
  }

  async put(key: string, entry: { incidentId: string; stage: StageName; output: unknown }): Promise<void> {
    putStageResult(this._db, {
      idempotency_key: key,
      incident_id: entry.incidentId,
      stage: entry.stage,
      output_json: JSON.stringify(entry.output),
    })
  }
}

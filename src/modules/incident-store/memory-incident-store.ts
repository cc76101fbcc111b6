/**
 * In-memory IncidentStore and IdempotencyStore.
 *
 * Records are cloned on every read and write so callers never hold a
 * reference into the store.
 */

import { IncidentAlreadyExistsError, IncidentNotFoundError } from '../../core/errors.js'
import type { StageName } from '../../core/types.js'
import type { IncidentFilter, IncidentRecord } from '../incidents/types.js'
import type { IdempotencyStore, IncidentMutator, IncidentStore } from './incident-store.js'
import { KeyedMutex } from './keyed-mutex.js'
import { matchesFilter, newestFirst } from './filters.js'

interface StoredIncident {
  seq: number
  record: IncidentRecord
}

export class MemoryIncidentStore implements IncidentStore {
  private readonly _records = new Map<string, StoredIncident>()
  private readonly _mutex = new KeyedMutex()
  private _seq = 0

  async create(record: IncidentRecord): Promise<IncidentRecord> {
    if (this._records.has(record.incidentId)) {
      throw new IncidentAlreadyExistsError(record.incidentId)
    }
    const stored = { ...structuredClone(record), version: 1 }
    this._records.set(record.incidentId, { seq: ++this._seq, record: stored })
    return structuredClone(stored)
  }

  async get(incidentId: string): Promise<IncidentRecord | null> {
    const entry = this._records.get(incidentId)
    return entry === undefined ? null : structuredClone(entry.record)
  }

  async list(filter: IncidentFilter = {}): Promise<IncidentRecord[]> {
    const rows = [...this._records.values()]
      .filter((entry) => matchesFilter(entry.record, filter))
      .sort((a, b) => newestFirst(a.record, b.record) || b.seq - a.seq)
      .map((entry) => structuredClone(entry.record))
    return filter.limit !== undefined ? rows.slice(0, filter.limit) : rows
  }

  update(incidentId: string, mutator: IncidentMutator): Promise<IncidentRecord> {
    return this._mutex.runExclusive(incidentId, async () => {
      const entry = this._records.get(incidentId)
      if (entry === undefined) {
        throw new IncidentNotFoundError(incidentId)
      }
      const draft = structuredClone(entry.record)
      await mutator(draft)
      draft.incidentId = incidentId
      draft.version = entry.record.version + 1
      this._records.set(incidentId, { seq: entry.seq, record: draft })
      return structuredClone(draft)
    })
  }
}

export class MemoryIdempotencyStore implements IdempotencyStore {
  private readonly _entries = new Map<string, { incidentId: string; stage: StageName; output: unknown }>()

  async get<T>(key: string, parse: (raw: unknown) => T): Promise<T | undefined> {
    const entry = this._entries.get(key)
    return entry === undefined ? undefined : parse(structuredClone(entry.output))
  }

  async put(key: string, entry: { incidentId: string; stage: StageName; output: unknown }): Promise<void> {
    if (this._entries.has(key)) return
    this._entries.set(key, { ...entry, output: structuredClone(entry.output) })
  }
}

export function createMemoryIncidentStore(): MemoryIncidentStore {
  return new MemoryIncidentStore()
}

/**
 * IncidentStore — keyed container for incident records.
 *
 * The store is the only shared mutable resource in the system. Writers go
 * through update(), which runs the mutator against a private draft under a
 * per-incident lock and commits it atomically; a mutator that throws leaves
 * the stored record untouched.
 */

import type { StageName } from '../../core/types.js'
import type { IncidentFilter, IncidentRecord } from '../incidents/types.js'

// ---------------------------------------------------------------------------
// IncidentStore
// ---------------------------------------------------------------------------

export type IncidentMutator = (draft: IncidentRecord) => void | Promise<void>

export interface IncidentStore {
  /** @throws {IncidentAlreadyExistsError} when the id is taken */
  create(record: IncidentRecord): Promise<IncidentRecord>

  /** Snapshot of the record, or null when no incident has this id */
  get(incidentId: string): Promise<IncidentRecord | null>

  /** Snapshots matching `filter`, newest first */
  list(filter?: IncidentFilter): Promise<IncidentRecord[]>

  /**
   * Atomic read-modify-write. Returns the committed record.
   * @throws {IncidentNotFoundError} when no incident has this id
   */
  update(incidentId: string, mutator: IncidentMutator): Promise<IncidentRecord>
}

// ---------------------------------------------------------------------------
// IdempotencyStore
// ---------------------------------------------------------------------------

/**
 * Ledger of side-effecting stage results keyed by idempotency key.
 * A stage that finds its key here returns the stored result instead of
 * calling the provider again.
 */
export interface IdempotencyStore {
  /** Stored output for `key`, passed through `parse`; undefined when absent */
  get<T>(key: string, parse: (raw: unknown) => T): Promise<T | undefined>

  /** Record the output for `key`. The first write for a key wins. */
  put(key: string, entry: { incidentId: string; stage: StageName; output: unknown }): Promise<void>
}

/** Deterministic key for one side-effecting stage of one incident */
export function idempotencyKey(incidentId: string, stage: StageName): string {
  return `${incidentId}:${stage}`
}

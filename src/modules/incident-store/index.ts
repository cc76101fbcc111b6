/**
 * Barrel exports for the incident-store module.
 */

export { idempotencyKey } from './incident-store.js'
export type { IdempotencyStore, IncidentMutator, IncidentStore } from './incident-store.js'
export { KeyedMutex } from './keyed-mutex.js'
export {
  MemoryIdempotencyStore,
  MemoryIncidentStore,
  createMemoryIncidentStore,
} from './memory-incident-store.js'
export { SqliteIdempotencyStore, SqliteIncidentStore } from './sqlite-incident-store.js'

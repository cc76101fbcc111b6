/**
 * Barrel exports for the incidents module.
 */

export * from './types.js'
export {
  AlertPayloadSchema,
  AlertEntrySchema,
  IncidentStatusSchema,
  RootCauseAnalysisSchema,
  firstAlert,
} from './schemas.js'
export type { AlertPayload, AlertEntry, LogEntry } from './schemas.js'
export {
  ALLOWED_TRANSITIONS,
  appendEvent,
  canTransition,
  failIncident,
  isTerminal,
  markPrMerged,
  resolveIncident,
  transitionIncident,
} from './state-machine.js'
export type { TransitionOptions } from './state-machine.js'
export {
  computeMttrSeconds,
  createIncidentRecord,
  generateIncidentId,
  isStale,
  parseSeverity,
  toIncidentDetail,
  toIncidentSummary,
} from './incident-factory.js'
export type { NewIncidentInput } from './incident-factory.js'
export { createOwnerId, grantLease, isLeasedStatus, leaseHeldByOther, refreshLease } from './lease.js'
export type { LeaseSettings } from './lease.js'

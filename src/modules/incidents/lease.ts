/**
 * Owner leases on incidents.
 *
 * The process driving an incident's pipeline holds a lease on the record and
 * renews it while the run is in flight. Another process sharing the store
 * only takes the incident over once the lease has expired.
 */

import { randomUUID } from 'node:crypto'
import { hostname } from 'node:os'
import type { IncidentStatus } from '../../core/types.js'
import type { Clock } from '../timeline/timeline-log.js'
import type { IncidentLease, IncidentRecord } from './types.js'

export interface LeaseSettings {
  ownerId: string
  ttlMs: number
  /** Lease timestamps; wall time when omitted */
  clock?: Clock
}

/** e.g. "ops-host-1:4242:9f86d081" */
export function createOwnerId(): string {
  return `${hostname()}:${String(process.pid)}:${randomUUID().slice(0, 8)}`
}

function leaseNow(settings: Pick<LeaseSettings, 'clock'>): Date {
  return settings.clock !== undefined ? settings.clock() : new Date()
}

export function grantLease(settings: LeaseSettings): IncidentLease {
  const expiresAt = new Date(leaseNow(settings).getTime() + settings.ttlMs)
  return { ownerId: settings.ownerId, expiresAt: expiresAt.toISOString() }
}

/** Statuses in which some process is expected to be running the pipeline */
export function isLeasedStatus(status: IncidentStatus): boolean {
  return status === 'PROCESSING' || status === 'MERGING'
}

/**
 * True while an unexpired lease belongs to someone other than `ownerId`.
 * Without an `ownerId` every unexpired lease counts as foreign.
 */
export function leaseHeldByOther(
  record: Pick<IncidentRecord, 'lease'>,
  ownerId: string | undefined,
  settings: Pick<LeaseSettings, 'clock'> = {},
): boolean {
  const lease = record.lease
  if (lease === null || lease.ownerId === ownerId) return false
  return Date.parse(lease.expiresAt) > leaseNow(settings).getTime()
}

/** Extend the lease while the pipeline runs; release it once the incident leaves PROCESSING/MERGING */
export function refreshLease(draft: IncidentRecord, settings: LeaseSettings): void {
  draft.lease = isLeasedStatus(draft.status) ? grantLease(settings) : null
}

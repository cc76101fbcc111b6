import type { IncidentFilter, IncidentRecord } from '../incidents/types.js'

export function matchesFilter(record: IncidentRecord, filter: IncidentFilter): boolean {
  if (filter.status !== undefined && record.status !== filter.status) return false
  if (filter.serviceName !== undefined && record.serviceName !== filter.serviceName) return false
  return true
}

/** Sort comparator: later createdAt first */
export function newestFirst(a: IncidentRecord, b: IncidentRecord): number {
  return Date.parse(b.createdAt) - Date.parse(a.createdAt)
}

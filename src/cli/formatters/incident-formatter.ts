/**
 * Human-readable incident output for the `patchwarden incidents`, `trigger`,
 * `approve` and `reject` commands.
 */

import type { IncidentDetail, IncidentSummary } from '../../modules/incidents/types.js'
import { formatTable } from '../utils/formatting.js'
import type { TableColumn } from '../utils/formatting.js'

// ---------------------------------------------------------------------------
// renderIncidentTable
// ---------------------------------------------------------------------------

const INCIDENT_COLUMNS: TableColumn<IncidentSummary>[] = [
  { header: 'Incident', cell: (incident) => incident.incidentId },
  { header: 'Status', cell: (incident) => incident.status },
  { header: 'Severity', cell: (incident) => incident.severity },
  { header: 'Service', cell: (incident) => incident.serviceName, maxWidth: 24 },
  {
    header: 'Approval',
    cell: (incident) => (incident.isStale ? `${incident.approvalStatus} (stale)` : incident.approvalStatus),
  },
  { header: 'PR', cell: (incident) => incident.prStatus },
  {
    header: 'MTTR',
    cell: (incident) => (incident.mttrSeconds === null ? '-' : `${String(incident.mttrSeconds)}s`),
    align: 'right',
  },
]

export function renderIncidentTable(incidents: IncidentSummary[]): string {
  if (incidents.length === 0) return 'No incidents found.'
  return formatTable(incidents, INCIDENT_COLUMNS)
}

// ---------------------------------------------------------------------------
// renderIncidentDetail
// ---------------------------------------------------------------------------

/**
 * Render one incident: header, stage outputs, then the timeline.
 *
 * Output sections:
 *  - Header: Incident <id>  Status: <status>  Severity: <severity>
 *  - Service, approval/PR state and, when failed, the error and stage
 *  - Ticket and pull request links when present
 *  - Timeline, one event per line
 */
export function renderIncidentDetail(incident: IncidentDetail): string {
  const lines: string[] = []

  lines.push(`Incident ${incident.incidentId}  Status: ${incident.status}  Severity: ${incident.severity}`)
  lines.push(`Service: ${incident.serviceName}`)
  lines.push(`Approval: ${incident.approvalStatus}${incident.isStale ? ' (stale)' : ''}  PR: ${incident.prStatus}`)
  if (incident.mttrSeconds !== null) {
    lines.push(`MTTR: ${String(incident.mttrSeconds)}s`)
  }
  if (incident.errorMessage !== null) {
    lines.push(`Error (${incident.failedStage ?? 'unknown'}): ${incident.errorMessage}`)
  }

  if (incident.rootCause !== null) {
    lines.push('')
    lines.push(`Root cause: ${incident.rootCause.rootCause}`)
  }
  if (incident.ticket !== null) {
    lines.push(`Ticket: ${incident.ticket.ticketKey} ${incident.ticket.ticketUrl}`)
  }
  const prUrl = incident.remediation?.prUrl ?? null
  if (prUrl !== null) {
    lines.push(`Pull request: ${prUrl}`)
  }

  lines.push('')
  lines.push('Timeline:')
  for (const event of incident.timeline) {
    lines.push(`  ${event.timestamp}  ${event.eventType.padEnd(24)} ${event.agent}`)
  }

  return lines.join('\n')
}

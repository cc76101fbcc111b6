/**
 * Timeline query functions. Rows are append-only: nothing updates or
 * deletes an incident_timeline row once written.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

export interface TimelineRow {
  incident_id: string
  seq: number
  event_type: string
  timestamp: string
  agent: string
  details_json: string
  duration_ms: number | null
  transition_from: string | null
  transition_to: string | null
}

export function appendTimelineRows(db: BetterSqlite3Database, rows: TimelineRow[]): void {
  const stmt = db.prepare<TimelineRow>(`
    INSERT INTO incident_timeline (
      incident_id, seq, event_type, timestamp, agent, details_json,
      duration_ms, transition_from, transition_to
    ) VALUES (
      @incident_id, @seq, @event_type, @timestamp, @agent, @details_json,
      @duration_ms, @transition_from, @transition_to
    )
  `)
  for (const row of rows) {
    stmt.run(row)
  }
}

/** Events for one incident in append order */
export function getTimelineRows(db: BetterSqlite3Database, incidentId: string): TimelineRow[] {
  return db
    .prepare<[string], TimelineRow>('SELECT * FROM incident_timeline WHERE incident_id = ? ORDER BY seq ASC')
    .all(incidentId)
}

export function countTimelineRows(db: BetterSqlite3Database, incidentId: string): number {
  const row = db
    .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM incident_timeline WHERE incident_id = ?')
    .get(incidentId)
  return row?.count ?? 0
}

/**
 * Incident query functions for the SQLite persistence layer.
 *
 * Rows carry the indexed lifecycle columns; everything else on the record is
 * serialised into `state_json`. Timeline events live in incident_timeline.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

// ---------------------------------------------------------------------------
// Row types
// ---------------------------------------------------------------------------

export interface IncidentRow {
  incident_id: string
  status: string
  severity: string
  service_name: string
  approval_status: string
  pr_status: string
  created_at: string
  updated_at: string
  resolved_at: string | null
  state_json: string
  owner_id: string | null
  lease_expires_at: string | null
  version: number
}

export interface IncidentRowFilter {
  status?: string
  service_name?: string
  limit?: number
}

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

/**
 * Insert a new incident row. Fails with a SQLite constraint error when the
 * id already exists.
 */
export function insertIncident(db: BetterSqlite3Database, row: IncidentRow): void {
  db.prepare<IncidentRow>(`
    INSERT INTO incidents (
      incident_id, status, severity, service_name, approval_status, pr_status,
      created_at, updated_at, resolved_at, state_json, owner_id, lease_expires_at, version
    ) VALUES (
      @incident_id, @status, @severity, @service_name, @approval_status, @pr_status,
      @created_at, @updated_at, @resolved_at, @state_json, @owner_id, @lease_expires_at, @version
    )
  `).run(row)
}

export function getIncidentRow(db: BetterSqlite3Database, incidentId: string): IncidentRow | undefined {
  return db.prepare<[string], IncidentRow>('SELECT * FROM incidents WHERE incident_id = ?').get(incidentId)
}

/**
 * List incident rows, newest first.
 */
export function listIncidentRows(db: BetterSqlite3Database, filter: IncidentRowFilter = {}): IncidentRow[] {
  const clauses: string[] = []
  const params: Record<string, string | number> = {}

  if (filter.status !== undefined) {
    clauses.push('status = @status')
    params.status = filter.status
  }
  if (filter.service_name !== undefined) {
    clauses.push('service_name = @service_name')
    params.service_name = filter.service_name
  }

  let sql = 'SELECT * FROM incidents'
  if (clauses.length > 0) sql += ` WHERE ${clauses.join(' AND ')}`
  sql += ' ORDER BY created_at DESC, rowid DESC'
  if (filter.limit !== undefined) {
    sql += ' LIMIT @limit'
    params.limit = filter.limit
  }

  return db.prepare<Record<string, string | number>, IncidentRow>(sql).all(params)
}

/**
 * Compare-and-swap update: writes only when the stored version still equals
 * `expectedVersion`. Returns false when another writer got there first.
 */
export function updateIncidentRow(
  db: BetterSqlite3Database,
  row: IncidentRow,
  expectedVersion: number,
): boolean {
  const result = db
    .prepare<IncidentRow & { expected_version: number }>(`
      UPDATE incidents SET
        status = @status,
        severity = @severity,
        service_name = @service_name,
        approval_status = @approval_status,
        pr_status = @pr_status,
        updated_at = @updated_at,
        resolved_at = @resolved_at,
        state_json = @state_json,
        owner_id = @owner_id,
        lease_expires_at = @lease_expires_at,
        version = @version
      WHERE incident_id = @incident_id AND version = @expected_version
    `)
    .run({ ...row, expected_version: expectedVersion })
  return result.changes === 1
}

/**
 * Idempotency ledger query functions.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

export interface StageResultRow {
  idempotency_key: string
  incident_id: string
  stage: string
  output_json: string
  recorded_at: string
}

export function getStageResult(db: BetterSqlite3Database, key: string): StageResultRow | undefined {
  return db
    .prepare<[string], StageResultRow>('SELECT * FROM stage_results WHERE idempotency_key = ?')
    .get(key)
}

/**
 * Record a stage result. An existing row for the key is kept as-is.
 */
export function putStageResult(
  db: BetterSqlite3Database,
  row: Omit<StageResultRow, 'recorded_at'>,
): void {
  db.prepare<Omit<StageResultRow, 'recorded_at'>>(`
    INSERT OR IGNORE INTO stage_results (idempotency_key, incident_id, stage, output_json)
    VALUES (@idempotency_key, @incident_id, @stage, @output_json)
  `).run(row)
}

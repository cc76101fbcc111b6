/**
 * Migration 001: incidents schema.
 *
 *  - incidents: indexed lifecycle columns, stage outputs as JSON, CAS version
 *  - incident_timeline: append-only events keyed by (incident_id, seq)
 *  - stage_results: idempotency ledger for side-effecting stages
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const incidentsSchemaMigration: Migration = {
  version: 1,
  name: '001-incidents-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS incidents (
        incident_id      TEXT PRIMARY KEY,
        status           TEXT NOT NULL,
        severity         TEXT NOT NULL,
        service_name     TEXT NOT NULL,
        approval_status  TEXT NOT NULL,
        pr_status        TEXT NOT NULL,
        created_at       TEXT NOT NULL,
        updated_at       TEXT NOT NULL,
        resolved_at      TEXT,
        state_json       TEXT NOT NULL,
        version          INTEGER NOT NULL DEFAULT 1
      );

      CREATE INDEX IF NOT EXISTS idx_incidents_status ON incidents(status);
      CREATE INDEX IF NOT EXISTS idx_incidents_service ON incidents(service_name);
      CREATE INDEX IF NOT EXISTS idx_incidents_created ON incidents(created_at);

      CREATE TABLE IF NOT EXISTS incident_timeline (
        incident_id      TEXT NOT NULL REFERENCES incidents(incident_id),
        seq              INTEGER NOT NULL,
        event_type       TEXT NOT NULL,
        timestamp        TEXT NOT NULL,
        agent            TEXT NOT NULL,
        details_json     TEXT NOT NULL,
        duration_ms      REAL,
        transition_from  TEXT,
        transition_to    TEXT,
        PRIMARY KEY (incident_id, seq)
      );

      CREATE TABLE IF NOT EXISTS stage_results (
        idempotency_key  TEXT PRIMARY KEY,
        incident_id      TEXT NOT NULL,
        stage            TEXT NOT NULL,
        output_json      TEXT NOT NULL,
        recorded_at      TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX IF NOT EXISTS idx_stage_results_incident ON stage_results(incident_id);
    `)
  },
}

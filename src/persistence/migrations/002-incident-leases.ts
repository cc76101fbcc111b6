/**
 * Migration 002: owner lease columns on incidents.
 *
 * The reconciler queries these to tell a crashed run from one still driven
 * by another process sharing the database file.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const incidentLeasesMigration: Migration = {
  version: 2,
  name: '002-incident-leases',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      ALTER TABLE incidents ADD COLUMN owner_id TEXT;
      ALTER TABLE incidents ADD COLUMN lease_expires_at TEXT;

      CREATE INDEX IF NOT EXISTS idx_incidents_lease ON incidents(status, lease_expires_at);
    `)
  },
}

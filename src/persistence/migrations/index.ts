/**
 * Versioned schema migrations, tracked in `schema_migrations`.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { createLogger } from '../../utils/logger.js'
import { incidentsSchemaMigration } from './001-incidents-schema.js'
import { incidentLeasesMigration } from './002-incident-leases.js'

const logger = createLogger('persistence:migrations')

export interface Migration {
  version: number
  /** Recorded in schema_migrations.name, e.g. `001-incidents-schema` */
  name: string
  up(db: BetterSqlite3Database): void
}

export interface MigrationResult {
  /** Names applied by this call, in order */
  applied: string[]
  /** Highest version recorded after this call */
  version: number
}

/** Ordered by version */
export const MIGRATIONS: readonly Migration[] = [incidentsSchemaMigration, incidentLeasesMigration]

const TRACKING_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    version    INTEGER PRIMARY KEY,
    name       TEXT    NOT NULL,
    applied_at TEXT    NOT NULL DEFAULT (datetime('now'))
  )
`

/**
 * Apply every migration newer than the recorded version. Each migration and
 * its tracking row commit in one transaction, so a failed migration leaves
 * the schema at the previous version.
 */
export function runMigrations(db: BetterSqlite3Database): MigrationResult {
  db.exec(TRACKING_TABLE_SQL)

  const current = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations')
    .get()
  let version = current?.version ?? 0

  const record = db.prepare<[number, string]>('INSERT INTO schema_migrations (version, name) VALUES (?, ?)')
  const applied: string[] = []

  for (const migration of MIGRATIONS) {
    if (migration.version <= version) continue

    db.transaction(() => {
      migration.up(db)
      record.run(migration.version, migration.name)
    })()

    version = migration.version
    applied.push(migration.name)
    logger.info({ version, name: migration.name }, 'Migration applied')
  }

  if (applied.length === 0) logger.debug({ version }, 'Schema up to date')
  return { applied, version }
}

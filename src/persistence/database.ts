/**
 * SQLite access for the incident store.
 *
 * DatabaseWrapper owns the better-sqlite3 handle; DatabaseService adds the
 * service lifecycle (open and migrate on initialize, close on shutdown).
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { BaseService } from '../core/lifecycle.js'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

const IN_MEMORY_PATH = ':memory:'

export interface DatabaseOptions {
  /** How long a writer waits on a lock held by another connection (default 5000) */
  busyTimeoutMs?: number
}

/** Applied on every open; timeline and stage-result rows need foreign keys */
function connectionPragmas(busyTimeoutMs: number): string[] {
  return [
    'journal_mode = WAL',
    `busy_timeout = ${String(busyTimeoutMs)}`,
    'synchronous = NORMAL',
    'foreign_keys = ON',
  ]
}

// ---------------------------------------------------------------------------
// DatabaseWrapper
// ---------------------------------------------------------------------------

export class DatabaseWrapper {
  private _handle: BetterSqlite3Database | null = null
  private readonly _path: string
  private readonly _busyTimeoutMs: number

  constructor(databasePath: string, options: DatabaseOptions = {}) {
    this._path = databasePath
    this._busyTimeoutMs = options.busyTimeoutMs ?? 5000
  }

  open(): void {
    if (this._handle !== null) return

    const inMemory = this._path === IN_MEMORY_PATH
    if (!inMemory) mkdirSync(dirname(this._path), { recursive: true })

    const handle = new BetterSqlite3(this._path)
    for (const pragma of connectionPragmas(this._busyTimeoutMs)) {
      handle.pragma(pragma)
    }
    this._handle = handle

    const journalMode: unknown = handle.pragma('journal_mode', { simple: true })
    logger.info({ path: this._path, journalMode, inMemory }, 'Incident database opened')
  }

  close(): void {
    if (this._handle === null) return
    this._handle.close()
    this._handle = null
    logger.info({ path: this._path }, 'Incident database closed')
  }

  /** @throws {Error} until open() has run */
  get db(): BetterSqlite3Database {
    if (this._handle === null) {
      throw new Error(`Incident database ${this._path} is not open; call open() first`)
    }
    return this._handle
  }

  get isOpen(): boolean {
    return this._handle !== null
  }

  get path(): string {
    return this._path
  }
}

// ---------------------------------------------------------------------------
// DatabaseService
// ---------------------------------------------------------------------------

export interface DatabaseService extends BaseService {
  readonly isOpen: boolean
  readonly db: BetterSqlite3Database
  /** Highest applied migration version; 0 before initialize() */
  readonly schemaVersion: number
}

class DatabaseServiceImpl implements DatabaseService {
  private readonly _wrapper: DatabaseWrapper
  private _schemaVersion = 0

  constructor(databasePath: string, options: DatabaseOptions) {
    this._wrapper = new DatabaseWrapper(databasePath, options)
  }

  get isOpen(): boolean {
    return this._wrapper.isOpen
  }

  get db(): BetterSqlite3Database {
    return this._wrapper.db
  }

  get schemaVersion(): number {
    return this._schemaVersion
  }

  async initialize(): Promise<void> {
    this._wrapper.open()
    const result = runMigrations(this._wrapper.db)
    this._schemaVersion = result.version
    logger.debug(
      { path: this._wrapper.path, schemaVersion: result.version, applied: result.applied },
      'Incident database ready',
    )
  }

  async shutdown(): Promise<void> {
    this._wrapper.close()
  }
}

export function createDatabaseService(databasePath: string, options: DatabaseOptions = {}): DatabaseService {
  return new DatabaseServiceImpl(databasePath, options)
}

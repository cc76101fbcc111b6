import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import Database from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { ConcurrentModificationError } from '../../../core/errors.js'
import { runMigrations } from '../../../persistence/migrations/index.js'
import { getTimelineRows } from '../../../persistence/queries/timeline.js'
import { appendEvent } from '../../incidents/state-machine.js'
import { TicketRecordSchema } from '../../incidents/schemas.js'
import { SqliteIdempotencyStore, SqliteIncidentStore } from '../sqlite-incident-store.js'
import { describeIncidentStore } from './incident-store.contract.js'
import { makeIncident, steppingClock } from '../../../../test/fixtures/incidents.js'

function openMemoryDb(): BetterSqlite3Database {
  const db = new Database(':memory:')
  db.pragma('foreign_keys = ON')
  runMigrations(db)
  return db
}

describeIncidentStore('SqliteIncidentStore', () => new SqliteIncidentStore(openMemoryDb()))

describe('SqliteIncidentStore persistence', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = openMemoryDb()
  })

  afterEach(() => {
    db.close()
  })

  it('round-trips stage outputs through storage', async () => {
    const store = new SqliteIncidentStore(db)
    await store.create(makeIncident('INC-00000001'))
    await store.update('INC-00000001', (draft) => {
      draft.ticket = { ticketKey: 'SRE-00042', ticketUrl: 'https://jira.example.test/browse/SRE-00042', status: 'Open' }
      draft.prStatus = 'PENDING_CI'
    })

    const reopened = new SqliteIncidentStore(db)
    const loaded = await reopened.get('INC-00000001')
    expect(loaded?.ticket).toEqual({
      ticketKey: 'SRE-00042',
      ticketUrl: 'https://jira.example.test/browse/SRE-00042',
      status: 'Open',
    })
    expect(loaded?.prStatus).toBe('PENDING_CI')
  })

  it('keeps the lease in its own columns', async () => {
    const store = new SqliteIncidentStore(db)
    await store.create({
      ...makeIncident('INC-00000001'),
      lease: { ownerId: 'host-a:1:aaaa0001', expiresAt: '2026-03-01T10:01:00.000Z' },
    })

    const row: unknown = db.prepare('SELECT owner_id, lease_expires_at FROM incidents').get()
    expect(row).toEqual({ owner_id: 'host-a:1:aaaa0001', lease_expires_at: '2026-03-01T10:01:00.000Z' })

    const released = await store.update('INC-00000001', (draft) => {
      draft.lease = null
    })
    expect(released.lease).toBeNull()
    expect(db.prepare('SELECT owner_id FROM incidents').pluck().get()).toBeNull()
  })

  it('only appends timeline rows on update', async () => {
    const clock = steppingClock()
    const store = new SqliteIncidentStore(db)
    await store.create(makeIncident('INC-00000001', { clock }))
    await store.update('INC-00000001', (draft) => {
      appendEvent(draft, { eventType: 'ALERT_VALIDATED', agent: 'triage' }, clock)
    })

    const rows = getTimelineRows(db, 'INC-00000001')
    expect(rows.map((r) => [r.seq, r.event_type])).toEqual([
      [0, 'INCIDENT_CREATED'],
      [1, 'ALERT_VALIDATED'],
    ])
  })

  it('raises ConcurrentModificationError when another writer bumped the version', async () => {
    const store = new SqliteIncidentStore(db)
    await store.create(makeIncident('INC-00000001'))

    await expect(
      store.update('INC-00000001', (draft) => {
        // simulates a write from another process between read and commit
        db.prepare('UPDATE incidents SET version = version + 1 WHERE incident_id = ?').run('INC-00000001')
        draft.severity = 'critical'
      }),
    ).rejects.toThrow(ConcurrentModificationError)

    const loaded = await store.get('INC-00000001')
    expect(loaded?.severity).toBe('high')
    expect(loaded?.version).toBe(2)
  })
})

describe('SqliteIdempotencyStore', () => {
  it('stores and parses stage results, first write wins', async () => {
    const db = openMemoryDb()
    const ledger = new SqliteIdempotencyStore(db)
    const ticket = { ticketKey: 'SRE-00001', ticketUrl: 'https://jira.example.test/browse/SRE-00001', status: 'Open' }

    await ledger.put('INC-1:ticketing', { incidentId: 'INC-1', stage: 'ticketing', output: ticket })
    await ledger.put('INC-1:ticketing', { incidentId: 'INC-1', stage: 'ticketing', output: { ...ticket, ticketKey: 'SRE-9' } })

    await expect(ledger.get('INC-1:ticketing', (raw) => TicketRecordSchema.parse(raw))).resolves.toEqual(ticket)
    await expect(ledger.get('INC-2:ticketing', (raw) => TicketRecordSchema.parse(raw))).resolves.toBeUndefined()
    db.close()
  })
})

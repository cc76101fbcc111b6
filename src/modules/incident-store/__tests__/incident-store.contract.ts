/**
 * Behaviour shared by every IncidentStore implementation.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { IncidentAlreadyExistsError, IncidentNotFoundError, InvalidTransitionError } from '../../../core/errors.js'
import { resolveIncident, transitionIncident } from '../../incidents/state-machine.js'
import type { IncidentStore } from '../incident-store.js'
import { makeIncident, steppingClock } from '../../../../test/fixtures/incidents.js'

export function describeIncidentStore(name: string, factory: () => IncidentStore): void {
  describe(name, () => {
    let store: IncidentStore

    beforeEach(() => {
      store = factory()
    })

    it('creates and reads back a record at version 1', async () => {
      const created = await store.create(makeIncident('INC-00000001'))
      expect(created.version).toBe(1)

      const loaded = await store.get('INC-00000001')
      expect(loaded).toEqual(created)
    })

    it('returns null for an unknown id', async () => {
      await expect(store.get('INC-missing')).resolves.toBeNull()
    })

    it('rejects a duplicate id', async () => {
      await store.create(makeIncident('INC-00000001'))
      await expect(store.create(makeIncident('INC-00000001'))).rejects.toThrow(IncidentAlreadyExistsError)
    })

    it('commits a mutator and bumps the version', async () => {
      const clock = steppingClock()
      await store.create(makeIncident('INC-00000001', { clock }))

      const updated = await store.update('INC-00000001', (draft) => {
        resolveIncident(draft, 'triage', clock, { suppressed: true })
      })

      expect(updated.status).toBe('RESOLVED')
      expect(updated.version).toBe(2)
      expect(updated.timeline.map((e) => e.eventType)).toEqual(['INCIDENT_CREATED', 'INCIDENT_RESOLVED'])
      await expect(store.get('INC-00000001')).resolves.toEqual(updated)
    })

    it('leaves the record untouched when the mutator throws', async () => {
      const clock = steppingClock()
      const created = await store.create(makeIncident('INC-00000001', { clock }))

      await expect(
        store.update('INC-00000001', (draft) => {
          draft.severity = 'low'
          transitionIncident(draft, 'MERGING', { eventType: 'MERGE_STARTED', agent: 'merge' }, clock)
        }),
      ).rejects.toThrow(InvalidTransitionError)

      await expect(store.get('INC-00000001')).resolves.toEqual(created)
    })

    it('fails with IncidentNotFoundError when updating an unknown id', async () => {
      await expect(store.update('INC-missing', () => undefined)).rejects.toThrow(IncidentNotFoundError)
    })

    it('serialises concurrent writers of one incident', async () => {
      await store.create(makeIncident('INC-00000001'))

      await Promise.all(
        Array.from({ length: 5 }, () =>
          store.update('INC-00000001', async (draft) => {
            const seen = draft.resumeAttempts
            await new Promise((resolve) => setTimeout(resolve, 1))
            draft.resumeAttempts = seen + 1
          }),
        ),
      )

      const final = await store.get('INC-00000001')
      expect(final?.resumeAttempts).toBe(5)
      expect(final?.version).toBe(6)
    })

    it('lists newest first with status and service filters and a limit', async () => {
      await store.create(makeIncident('INC-00000001', { clock: steppingClock(Date.parse('2026-03-01T10:00:00Z')) }))
      await store.create(makeIncident('INC-00000002', { clock: steppingClock(Date.parse('2026-03-01T11:00:00Z')) }))
      await store.create(makeIncident('INC-00000003', { clock: steppingClock(Date.parse('2026-03-01T12:00:00Z')) }))
      await store.update('INC-00000002', (draft) => {
        resolveIncident(draft, 'triage', steppingClock(Date.parse('2026-03-01T11:05:00Z')))
        draft.serviceName = 'billing'
      })

      expect((await store.list()).map((r) => r.incidentId)).toEqual(['INC-00000003', 'INC-00000002', 'INC-00000001'])
      expect((await store.list({ status: 'PROCESSING' })).map((r) => r.incidentId)).toEqual([
        'INC-00000003',
        'INC-00000001',
      ])
      expect((await store.list({ serviceName: 'billing' })).map((r) => r.incidentId)).toEqual(['INC-00000002'])
      expect((await store.list({ limit: 1 })).map((r) => r.incidentId)).toEqual(['INC-00000003'])
    })
  })
}

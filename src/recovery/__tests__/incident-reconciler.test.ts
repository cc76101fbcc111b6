import { describe, it, expect, vi } from 'vitest'
import { IncidentReconciler } from '../incident-reconciler.js'
import type { ReconcileActionKind } from '../incident-reconciler.js'
import { createEventBus } from '../../core/event-bus.js'
import { MemoryIncidentStore } from '../../modules/incident-store/memory-incident-store.js'
import { transitionIncident } from '../../modules/incidents/state-machine.js'
import { gatedPolicy, makeIncident, steppingClock, T0 } from '../../../test/fixtures/incidents.js'
import { pipelineHarness } from '../../../test/fixtures/pipeline.js'

function fakeService(inFlight: string[] = []) {
  return {
    isInFlight: vi.fn((incidentId: string) => inFlight.includes(incidentId)),
    resumeIncident: vi.fn((_incidentId: string) => true),
  }
}

describe('IncidentReconciler', () => {
  it('resumes orphaned PROCESSING incidents and counts the attempt', async () => {
    const store = new MemoryIncidentStore()
    await store.create(makeIncident('INC-00000001'))
    await store.create(makeIncident('INC-00000002'))
    const service = fakeService(['INC-00000002'])
    const reconciler = new IncidentReconciler({
      store,
      service,
      maxResumeAttempts: 3,
      approvalTimeoutMs: 0,
      intervalMs: 0,
      clock: steppingClock(),
    })

    const result = await reconciler.reconcile()
    expect(result.resumed).toBe(1)
    expect(result.actions).toEqual([
      { incidentId: 'INC-00000001', action: 'resumed', reason: 'resume attempt 1 of 3' },
    ])
    expect(service.resumeIncident).toHaveBeenCalledWith('INC-00000001')
    const resumed = await store.get('INC-00000001')
    expect(resumed?.resumeAttempts).toBe(1)
    expect(resumed?.timeline.at(-1)?.eventType).toBe('PIPELINE_RESUMED')
    expect((await store.get('INC-00000002'))?.resumeAttempts).toBe(0)
  })

  it('fails an incident once its resume attempts are spent', async () => {
    const store = new MemoryIncidentStore()
    await store.create({ ...makeIncident('INC-00000001'), resumeAttempts: 2 })
    const service = fakeService()
    const reconciler = new IncidentReconciler({
      store,
      service,
      maxResumeAttempts: 2,
      approvalTimeoutMs: 0,
      intervalMs: 0,
      clock: steppingClock(),
    })

    const result = await reconciler.reconcile()
    expect(result.failed).toBe(1)
    expect(service.resumeIncident).not.toHaveBeenCalled()
    const failed = await store.get('INC-00000001')
    expect(failed?.status).toBe('FAILED')
    expect(failed?.failedStage).toBe('pipeline')
    expect(failed?.errorMessage).toBe('Pipeline abandoned after 2 resume attempts')
  })

  it('expires approvals held past the approval window', async () => {
    const clock = steppingClock(T0, 60_000)
    const store = new MemoryIncidentStore()
    const held = makeIncident('INC-00000001', { policy: gatedPolicy(), clock })
    transitionIncident(held, 'AWAITING_APPROVAL', { eventType: 'ESCALATED_TO_HUMAN', agent: 'merge_gate' }, clock)
    await store.create(held)
    const eventBus = createEventBus()
    const reconciled: Array<{ incidentId: string; action: ReconcileActionKind }> = []
    eventBus.on('incident:reconciled', (payload) => reconciled.push(payload))

    const reconciler = new IncidentReconciler({
      store,
      service: fakeService(),
      maxResumeAttempts: 3,
      approvalTimeoutMs: 120_000,
      intervalMs: 0,
      clock,
      eventBus,
    })
    // the window is not over yet: one clock read later is only 60s
    expect((await reconciler.reconcile()).expired).toBe(0)

    clock()
    const result = await reconciler.reconcile()
    expect(result.expired).toBe(1)
    expect(reconciled).toEqual([{ incidentId: 'INC-00000001', action: 'expired' }])
    const expired = await store.get('INC-00000001')
    expect(expired?.status).toBe('FAILED')
    expect(expired?.approvalStatus).toBe('REJECTED')
    expect(expired?.errorMessage).toBe('Approval window expired')
  })

  it('leaves an incident leased by another process until the lease expires', async () => {
    let now = T0
    const leaseClock = () => new Date(now)
    const store = new MemoryIncidentStore()
    await store.create({
      ...makeIncident('INC-00000001'),
      lease: { ownerId: 'host-a:7:0badf00d', expiresAt: new Date(T0 + 30_000).toISOString() },
    })
    const service = fakeService()
    const reconciler = new IncidentReconciler({
      store,
      service,
      maxResumeAttempts: 3,
      approvalTimeoutMs: 0,
      intervalMs: 0,
      clock: steppingClock(),
      lease: { ownerId: 'host-b:9:cafe0001', ttlMs: 60_000, clock: leaseClock },
    })

    expect((await reconciler.reconcile()).actions).toEqual([])
    expect(service.resumeIncident).not.toHaveBeenCalled()
    expect((await store.get('INC-00000001'))?.resumeAttempts).toBe(0)

    now = T0 + 30_001
    const result = await reconciler.reconcile()
    expect(result.resumed).toBe(1)
    expect(service.resumeIncident).toHaveBeenCalledWith('INC-00000001')
    const resumed = await store.get('INC-00000001')
    expect(resumed?.lease).toEqual({
      ownerId: 'host-b:9:cafe0001',
      expiresAt: new Date(T0 + 90_001).toISOString(),
    })
  })

  it('resumes an incident still leased to this process when no task is running', async () => {
    const store = new MemoryIncidentStore()
    await store.create({
      ...makeIncident('INC-00000001'),
      lease: { ownerId: 'host-b:9:cafe0001', expiresAt: '2999-01-01T00:00:00.000Z' },
    })
    const service = fakeService()
    const reconciler = new IncidentReconciler({
      store,
      service,
      maxResumeAttempts: 3,
      approvalTimeoutMs: 0,
      intervalMs: 0,
      clock: steppingClock(),
      lease: { ownerId: 'host-b:9:cafe0001', ttlMs: 60_000 },
    })

    expect((await reconciler.reconcile()).resumed).toBe(1)
    expect(service.resumeIncident).toHaveBeenCalledWith('INC-00000001')
  })

  it('drives a resumed incident to completion through the service', async () => {
    const h = pipelineHarness()
    await h.store.create(makeIncident('INC-00000001', { clock: h.clock }))
    const reconciler = new IncidentReconciler({
      store: h.store,
      service: h.service,
      maxResumeAttempts: 3,
      approvalTimeoutMs: 0,
      intervalMs: 0,
      clock: h.clock,
    })

    await reconciler.initialize()
    await h.service.waitForIdle()
    await reconciler.shutdown()
    expect((await h.store.get('INC-00000001'))?.status).toBe('RESOLVED')
  })
})

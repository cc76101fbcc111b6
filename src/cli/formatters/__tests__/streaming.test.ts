import { afterEach, describe, expect, it, vi } from 'vitest'
import { createEventBus } from '../../../core/event-bus.js'
import { emitEvent, streamIncidentEvents } from '../streaming.js'

describe('streaming', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('writes one NDJSON line per event', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    emitEvent('incident:created', { incidentId: 'INC-1' }, () => new Date('2026-03-01T10:00:00.000Z'))

    expect(write).toHaveBeenCalledWith(
      '{"event":"incident:created","timestamp":"2026-03-01T10:00:00.000Z","data":{"incidentId":"INC-1"}}\n',
    )
  })

  it('mirrors lifecycle events until stopped', () => {
    const lines: string[] = []
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      lines.push(String(chunk))
      return true
    })
    const bus = createEventBus()
    const stop = streamIncidentEvents(bus)

    bus.emit('incident:status-changed', { incidentId: 'INC-1', from: 'PROCESSING', to: 'RESOLVED' })
    bus.emit('stage:started', { incidentId: 'INC-1', stage: 'triage' })
    stop()
    bus.emit('incident:created', { incidentId: 'INC-2', severity: 'low', serviceName: 'search' })

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      event: 'incident:status-changed',
      data: { incidentId: 'INC-1', from: 'PROCESSING', to: 'RESOLVED' },
    })
  })
})

import { describe, it, expect } from 'vitest'
import {
  SignalTriageProvider,
  collectSignalHits,
  confidenceFromScore,
  scoreSignals,
  severityFromScore,
} from '../signal-triage-provider.js'
import type { AlertPayload } from '../../incidents/schemas.js'
import { sampleAlert } from '../../../../test/fixtures/incidents.js'

const provider = new SignalTriageProvider(() => new Date('2026-03-01T10:00:00.000Z'))
const ctx = { incidentId: 'INC-0000abcd' }

describe('scoreSignals', () => {
  it('adds half a point per repeat, counting at most three repeats', () => {
    expect(scoreSignals(new Map([['error_rate_high', 1]]))).toBe(3)
    expect(scoreSignals(new Map([['error_rate_high', 2]]))).toBe(3.5)
    expect(scoreSignals(new Map([['error_rate_high', 10]]))).toBe(4.5)
  })

  it('ignores unknown signals', () => {
    expect(scoreSignals(new Map([['cosmic_rays', 4]]))).toBe(0)
  })
})

describe('severityFromScore', () => {
  it('maps score bands to severities', () => {
    expect(severityFromScore(6, 'low')).toBe('critical')
    expect(severityFromScore(4, 'low')).toBe('high')
    expect(severityFromScore(2, 'low')).toBe('medium')
    expect(severityFromScore(1.5, 'low')).toBe('low')
  })

  it('never drops below the alert label', () => {
    expect(severityFromScore(0, 'critical')).toBe('critical')
  })
})

describe('confidenceFromScore', () => {
  it('grows with the score and caps at 0.95', () => {
    expect(confidenceFromScore(0)).toBe(0.45)
    expect(confidenceFromScore(3)).toBe(0.63)
    expect(confidenceFromScore(20)).toBe(0.95)
  })
})

describe('collectSignalHits', () => {
  it('reads signals, alert text and log entries', () => {
    const payload: AlertPayload = {
      status: 'firing',
      alerts: [{ labels: { alertname: 'QueueLag', severity: 'low' }, annotations: { summary: 'Consumers lagging' } }],
      signals: ['dependency_timeout', 'dependency_timeout', 'not_a_signal'],
      log_entries: [
        { event: 'health', message: 'readiness check flapping' },
        { component: 'worker', metadata: { queue_depth: 250_000 } },
        { component: 'worker', metadata: { queue_depth: 1_000 } },
      ],
    }
    expect(Object.fromEntries(collectSignalHits(payload))).toEqual({
      dependency_timeout: 2,
      health_flapping: 1,
      backlog_growth: 1,
    })
  })
})

describe('SignalTriageProvider', () => {
  it('validates a firing error-rate alert', async () => {
    const result = await provider.triage(sampleAlert(), ctx)
    expect(result).toEqual({
      isActionable: true,
      severity: 'high',
      serviceName: 'checkout-api',
      errorType: 'HighErrorRate',
      affectedEndpoints: ['/api/checkout'],
      triageReason: 'Signals detected: error_rate_high:1',
      triggeredAt: '2026-03-01T09:59:00.000Z',
      enrichment: { signalHits: { error_rate_high: 1 }, weightedScore: 3, confidence: 0.63 },
    })
  })

  it('raises severity when many signals stack up', async () => {
    const result = await provider.triage(
      {
        status: 'firing',
        alerts: [{ labels: { alertname: 'QueueLag', severity: 'low' }, annotations: {} }],
        signals: ['dependency_timeout', 'dependency_timeout', 'health_flapping'],
        log_entries: [{ metadata: { queue_depth: 300_000 } }],
      },
      ctx,
    )
    // 2.5 + 3 + 2
    expect(result.enrichment.weightedScore).toBe(7.5)
    expect(result.severity).toBe('critical')
  })

  it('marks a resolved alert without signals as not actionable', async () => {
    const result = await provider.triage(
      {
        status: 'resolved',
        alerts: [{ labels: { alertname: 'DiskWatch', severity: 'low' }, annotations: { summary: 'Disk usage normal' } }],
      },
      ctx,
    )
    expect(result.isActionable).toBe(false)
    expect(result.severity).toBe('low')
    expect(result.triageReason).toBe('No incident signals were detected.')
    expect(result.affectedEndpoints).toEqual([])
  })

  it('fills defaults for a payload without alerts', async () => {
    const result = await provider.triage({ status: 'firing' }, ctx)
    expect(result.serviceName).toBe('unknown-service')
    expect(result.errorType).toBe('UnknownAlert')
    expect(result.triggeredAt).toBe('2026-03-01T10:00:00.000Z')
  })
})

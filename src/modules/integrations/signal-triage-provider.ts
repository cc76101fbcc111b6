/**
 * Deterministic triage: scores well-known incident signals found in the
 * alert, its `signals[]` list and attached log entries.
 */

import type { Severity } from '../../core/types.js'
import { parseSeverity } from '../incidents/incident-factory.js'
import { firstAlert } from '../incidents/schemas.js'
import type { AlertPayload } from '../incidents/schemas.js'
import type { ValidatedAlert } from '../incidents/types.js'
import type { Clock } from '../timeline/timeline-log.js'
import type { CallOptions, TriageProvider } from './types.js'

export const SIGNAL_WEIGHTS: Readonly<Record<string, number>> = {
  error_rate_high: 3,
  health_flapping: 3,
  backlog_growth: 2,
  dependency_timeout: 2,
}

/** Queue depth above which a log entry counts as backlog growth */
export const BACKLOG_QUEUE_DEPTH = 200_000

const SEVERITY_RANK: Record<Severity, number> = { low: 1, medium: 2, high: 3, critical: 4 }

export type SignalHits = Map<string, number>

function bump(hits: SignalHits, signal: string): void {
  hits.set(signal, (hits.get(signal) ?? 0) + 1)
}

function joinText(values: Array<string | undefined>): string {
  return values.filter((v): v is string => v !== undefined).join(' ').toLowerCase()
}

export function collectSignalHits(payload: AlertPayload): SignalHits {
  const hits: SignalHits = new Map()

  for (const signal of payload.signals ?? []) {
    if (signal in SIGNAL_WEIGHTS) bump(hits, signal)
  }

  for (const alert of payload.alerts ?? []) {
    const text = joinText([
      alert.labels.alertname,
      alert.labels.severity,
      alert.annotations.summary,
      alert.annotations.description,
    ])
    if (text.includes('error') || text.includes('5xx')) bump(hits, 'error_rate_high')
    if (text.includes('flapping') || text.includes('alternating')) bump(hits, 'health_flapping')
    if (text.includes('timeout') || text.includes('timed out')) bump(hits, 'dependency_timeout')
  }

  for (const entry of payload.log_entries ?? []) {
    const text = joinText([entry.event, entry.message, entry.component])
    const queueDepth = entry.metadata?.queue_depth
    if (text.includes('flapping') || text.includes('alternating')) bump(hits, 'health_flapping')
    if (typeof queueDepth === 'number' && queueDepth > BACKLOG_QUEUE_DEPTH) bump(hits, 'backlog_growth')
    if (text.includes('timeout') || text.includes('timed out')) bump(hits, 'dependency_timeout')
  }

  return hits
}

/** Weight per detected signal plus 0.5 per repeat, at most three repeats counted */
export function scoreSignals(hits: SignalHits): number {
  let score = 0
  for (const [signal, count] of hits) {
    const weight = SIGNAL_WEIGHTS[signal]
    if (weight === undefined) continue
    score += weight + Math.min(Math.max(count - 1, 0), 3) * 0.5
  }
  return score
}

/** Severity implied by the score, never below the alert's own label */
export function severityFromScore(score: number, label: Severity): Severity {
  let fromScore: Severity = 'low'
  if (score >= 6) fromScore = 'critical'
  else if (score >= 4) fromScore = 'high'
  else if (score >= 2) fromScore = 'medium'
  return SEVERITY_RANK[label] > SEVERITY_RANK[fromScore] ? label : fromScore
}

export function confidenceFromScore(score: number): number {
  return Math.round(Math.min(0.95, 0.45 + score * 0.06) * 1000) / 1000
}

export class SignalTriageProvider implements TriageProvider {
  readonly name = 'signal-triage'
  private readonly _clock: Clock

  constructor(clock: Clock = () => new Date()) {
    this._clock = clock
  }

  async triage(payload: AlertPayload, _context: { incidentId: string } & CallOptions): Promise<ValidatedAlert> {
    const alert = firstAlert(payload)
    const hits = collectSignalHits(payload)
    const score = scoreSignals(hits)
    const status = (payload.status ?? 'firing').toLowerCase()
    const endpoint = alert.labels.endpoint

    const detected = [...hits.entries()].sort(([a], [b]) => a.localeCompare(b))
    const triageReason =
      detected.length > 0
        ? `Signals detected: ${detected.map(([name, count]) => `${name}:${String(count)}`).join(', ')}`
        : 'No incident signals were detected.'

    const startsAt = alert.startsAt !== undefined ? Date.parse(alert.startsAt) : Number.NaN
    return {
      isActionable: score >= 2 || status === 'firing',
      severity: severityFromScore(score, parseSeverity(alert.labels.severity)),
      serviceName: alert.labels.service ?? 'unknown-service',
      errorType: alert.labels.alertname ?? 'UnknownAlert',
      affectedEndpoints: endpoint !== undefined && endpoint !== '' ? [endpoint] : [],
      triageReason,
      triggeredAt: Number.isNaN(startsAt) ? this._clock().toISOString() : new Date(startsAt).toISOString(),
      enrichment: {
        signalHits: Object.fromEntries(hits),
        weightedScore: score,
        confidence: confidenceFromScore(score),
      },
    }
  }
}

import { describe, it, expect } from 'vitest'
import { HeuristicAnalysisProvider, inferCategory } from '../heuristic-analysis-provider.js'
import { SignalTriageProvider } from '../signal-triage-provider.js'
import type { ValidatedAlert } from '../../incidents/types.js'
import { sampleAlert } from '../../../../test/fixtures/incidents.js'

const triage = new SignalTriageProvider()
const analysis = new HeuristicAnalysisProvider({ defaultRepository: 'acme/platform-services' })

function withHits(signalHits: Record<string, number>): ValidatedAlert {
  return {
    isActionable: true,
    severity: 'high',
    serviceName: 'checkout-api',
    errorType: 'HighErrorRate',
    affectedEndpoints: [],
    triageReason: '',
    triggeredAt: '2026-03-01T09:59:00.000Z',
    enrichment: { signalHits, weightedScore: 0, confidence: 0.5 },
  }
}

describe('inferCategory', () => {
  it('prefers dependency timeouts, then backlog, then config wording', () => {
    expect(inferCategory(withHits({ dependency_timeout: 1, backlog_growth: 1 }), '')).toBe('dependency_failure')
    expect(inferCategory(withHits({ backlog_growth: 2 }), 'config drift')).toBe('resource_exhaustion')
    expect(inferCategory(withHits({}), 'Bad configuration pushed')).toBe('config_error')
    expect(inferCategory(withHits({}), 'NullPointer in handler')).toBe('code_bug')
  })
})

describe('HeuristicAnalysisProvider', () => {
  it('builds a code fix from the alert summary', async () => {
    const raw = sampleAlert()
    const validated = await triage.triage(raw, { incidentId: 'INC-0000abcd' })
    const result = await analysis.analyze(validated, { incidentId: 'INC-0000abcd', rawAlert: raw })

    expect(result.rootCause).toBe('Error rate above 5%')
    expect(result.rootCauseCategory).toBe('code_bug')
    expect(result.recommendedAction).toBe('fix_code')
    expect(result.targetRepository).toBe('acme/platform-services')
    expect(result.targetFile).toBe('remediations/checkout-api.md')
    expect(result.confidenceScore).toBe(0.63)
    expect(result.evidenceChain.map((e) => e.source)).toEqual(['alert', 'triage'])
    expect(result.proposedFix?.filePath).toBe('remediations/checkout-api.md')
    expect(result.proposedFix?.content).toContain('# Incident: INC-0000abcd')
  })

  it('honours repository and file labels and the root_cause annotation', async () => {
    const raw = sampleAlert({ repository: 'payments/checkout', file: 'deploy/values.yaml' })
    const entry = raw.alerts?.[0]
    if (entry !== undefined) entry.annotations.root_cause = 'Bad configuration pushed'
    const validated = await triage.triage(raw, { incidentId: 'INC-0000abcd' })
    const result = await analysis.analyze(validated, { incidentId: 'INC-0000abcd', rawAlert: raw })

    expect(result.rootCause).toBe('Bad configuration pushed')
    expect(result.rootCauseCategory).toBe('config_error')
    expect(result.recommendedAction).toBe('config_change')
    expect(result.targetRepository).toBe('payments/checkout')
    expect(result.targetFile).toBe('deploy/values.yaml')
  })

  it('adds one evidence entry per log line', async () => {
    const raw = sampleAlert({}, { log_entries: [{ component: 'db', message: 'connection timed out' }] })
    const validated = await triage.triage(raw, { incidentId: 'INC-0000abcd' })
    const result = await analysis.analyze(validated, { incidentId: 'INC-0000abcd', rawAlert: raw })

    expect(result.evidenceChain[2]).toEqual({
      source: 'log:db',
      timestamp: '2026-03-01T09:59:00.000Z',
      content: 'connection timed out',
    })
    expect(result.rootCauseCategory).toBe('dependency_failure')
  })
})

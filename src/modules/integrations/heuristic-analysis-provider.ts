/**
 * Heuristic root-cause analysis, used when no external reasoning engine is
 * wired. Derives the conclusion from triage signals and alert metadata.
 */

import { firstAlert, RootCauseAnalysisSchema } from '../incidents/schemas.js'
import type {
  Evidence,
  RecommendedAction,
  RootCauseAnalysis,
  RootCauseCategory,
  ValidatedAlert,
} from '../incidents/types.js'
import type { AnalysisContext, AnalysisProvider } from './types.js'

const ACTION_BY_CATEGORY: Record<RootCauseCategory, RecommendedAction> = {
  code_bug: 'fix_code',
  config_error: 'config_change',
  dependency_failure: 'config_change',
  resource_exhaustion: 'scale_up',
}

export interface HeuristicAnalysisOptions {
  /** Repository used when the alert names none, as "owner/name" */
  defaultRepository: string
}

function signalCount(alert: ValidatedAlert, signal: string): number {
  const hits = alert.enrichment.signalHits
  if (typeof hits !== 'object' || hits === null) return 0
  const count: unknown = Object.getOwnPropertyDescriptor(hits, signal)?.value
  return typeof count === 'number' ? count : 0
}

export function inferCategory(alert: ValidatedAlert, text: string): RootCauseCategory {
  if (signalCount(alert, 'dependency_timeout') > 0) return 'dependency_failure'
  if (signalCount(alert, 'backlog_growth') > 0) return 'resource_exhaustion'
  if (/\bconfig(uration)?\b/i.test(text)) return 'config_error'
  return 'code_bug'
}

export class HeuristicAnalysisProvider implements AnalysisProvider {
  readonly name = 'heuristic'
  private readonly _options: HeuristicAnalysisOptions

  constructor(options: HeuristicAnalysisOptions) {
    this._options = options
  }

  async analyze(alert: ValidatedAlert, context: AnalysisContext): Promise<RootCauseAnalysis> {
    const entry = firstAlert(context.rawAlert)
    const { labels, annotations } = entry
    const summary = annotations.root_cause ?? annotations.summary ?? `${alert.errorType} on ${alert.serviceName}`
    const category = inferCategory(alert, `${summary} ${annotations.description ?? ''}`)
    const recommendedAction = ACTION_BY_CATEGORY[category]
    const targetRepository = labels.repository ?? annotations.repository ?? this._options.defaultRepository
    const targetFile = labels.file ?? annotations.file ?? `remediations/${alert.serviceName}.md`

    const evidenceChain: Evidence[] = [
      { source: 'alert', timestamp: alert.triggeredAt, content: summary },
      { source: 'triage', timestamp: alert.triggeredAt, content: alert.triageReason },
      ...(context.rawAlert.log_entries ?? []).map((log) => ({
        source: `log:${log.component ?? 'unknown'}`,
        timestamp: alert.triggeredAt,
        content: log.message ?? log.event ?? '',
      })),
    ]

    const confidence = alert.enrichment.confidence
    return RootCauseAnalysisSchema.parse({
      rootCause: summary,
      rootCauseCategory: category,
      evidenceChain,
      confidenceScore: typeof confidence === 'number' ? confidence : 0.5,
      targetRepository,
      targetFile,
      recommendedAction,
      proposedFix: {
        filePath: targetFile,
        summary: `${recommendedAction} for ${alert.serviceName}: ${summary}`,
        content: [
          '# Automated remediation',
          `# Incident: ${context.incidentId}`,
          `# Service: ${alert.serviceName}`,
          `# Action: ${recommendedAction}`,
          `# Root cause: ${summary}`,
          '',
        ].join('\n'),
      },
    })
  }
}

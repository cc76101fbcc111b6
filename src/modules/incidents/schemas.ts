/**
 * Zod schemas for data crossing the system boundary: inbound alert payloads
 * and analysis output returned by a reasoning provider.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Alert payload (Alertmanager-style webhook body)
// ---------------------------------------------------------------------------

const StringMapSchema = z.record(z.string(), z.string())

export const AlertEntrySchema = z
  .object({
    status: z.string().optional(),
    labels: StringMapSchema.default({}),
    annotations: StringMapSchema.default({}),
    startsAt: z.string().optional(),
  })
  .passthrough()

export type AlertEntry = z.infer<typeof AlertEntrySchema>

export const LogEntrySchema = z
  .object({
    event: z.string().optional(),
    message: z.string().optional(),
    component: z.string().optional(),
    metadata: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough()

export type LogEntry = z.infer<typeof LogEntrySchema>

export const AlertPayloadSchema = z
  .object({
    status: z.string().optional(),
    alerts: z.array(AlertEntrySchema).optional(),
    signals: z.array(z.string()).optional(),
    log_entries: z.array(LogEntrySchema).optional(),
  })
  .passthrough()
  .refine((payload) => payload.alerts !== undefined || payload.status !== undefined, {
    message: 'Missing alerts/status in payload',
  })

export type AlertPayload = z.infer<typeof AlertPayloadSchema>

/** First alert in the payload, or an empty entry when the payload carries none */
export function firstAlert(payload: AlertPayload): AlertEntry {
  return payload.alerts?.[0] ?? { labels: {}, annotations: {} }
}

// ---------------------------------------------------------------------------
// Root-cause analysis
// ---------------------------------------------------------------------------

export const EvidenceSchema = z.object({
  source: z.string().min(1),
  timestamp: z.string(),
  content: z.string(),
})

export const RootCauseAnalysisSchema = z.object({
  rootCause: z.string().min(1),
  rootCauseCategory: z.enum(['code_bug', 'config_error', 'dependency_failure', 'resource_exhaustion']),
  evidenceChain: z.array(EvidenceSchema),
  confidenceScore: z.number().min(0).max(1),
  targetRepository: z.string().min(1),
  targetFile: z.string().min(1),
  recommendedAction: z.enum(['fix_code', 'rollback', 'scale_up', 'config_change']),
  proposedFix: z
    .object({
      filePath: z.string().min(1),
      content: z.string(),
      summary: z.string(),
    })
    .optional(),
})

// ---------------------------------------------------------------------------
// Persisted stage outputs
//
// Used when reading records and stage results back from storage, where the
// data last passed through JSON.
// ---------------------------------------------------------------------------

const SeveritySchema = z.enum(['critical', 'high', 'medium', 'low'])
const StageNameSchema = z.enum(['triage', 'analysis', 'ticketing', 'remediation', 'ci', 'merge', 'approval', 'pipeline'])
export const IncidentStatusSchema = z.enum(['PROCESSING', 'AWAITING_APPROVAL', 'MERGING', 'RESOLVED', 'FAILED'])

export const ValidatedAlertSchema = z.object({
  isActionable: z.boolean(),
  severity: SeveritySchema,
  serviceName: z.string(),
  errorType: z.string(),
  affectedEndpoints: z.array(z.string()),
  triageReason: z.string(),
  triggeredAt: z.string(),
  enrichment: z.record(z.string(), z.unknown()),
})

export const TicketRecordSchema = z.object({
  ticketKey: z.string().min(1),
  ticketUrl: z.string(),
  status: z.string(),
})

export const RemediationRecordSchema = z.object({
  success: z.boolean(),
  branchName: z.string().nullable(),
  prNumber: z.number().int().nullable(),
  prUrl: z.string().nullable(),
  prMerged: z.boolean(),
  errorMessage: z.string().nullable(),
})

export const MergePolicySnapshotSchema = z.object({
  requireCiPass: z.boolean(),
  requireCodeownerReview: z.boolean(),
  requirePrApproval: z.boolean(),
  mergeMethod: z.enum(['merge', 'squash', 'rebase']),
  approvalRequiredSeverities: z.array(SeveritySchema),
})

export const TimelineEventSchema = z.object({
  eventType: z.enum([
    'INCIDENT_CREATED',
    'ALERT_VALIDATED',
    'ALERT_SUPPRESSED',
    'INVESTIGATION_STARTED',
    'ROOT_CAUSE_IDENTIFIED',
    'TICKET_CREATED',
    'TICKET_FAILED',
    'PR_CREATED',
    'REMEDIATION_FAILED',
    'CI_PASSED',
    'CI_FAILED',
    'CI_TIMEOUT',
    'MERGE_GATE_EVALUATED',
    'ESCALATED_TO_HUMAN',
    'MERGE_APPROVED',
    'MERGE_REJECTED',
    'MERGE_STARTED',
    'PR_MERGED',
    'MERGE_FAILED',
    'TICKET_TRANSITIONED',
    'TICKET_TRANSITION_FAILED',
    'PIPELINE_RESUMED',
    'INCIDENT_RESOLVED',
    'INCIDENT_FAILED',
  ]),
  timestamp: z.string(),
  agent: z.string(),
  details: z.record(z.string(), z.unknown()),
  durationMs: z.number().nullable(),
  transition: z.object({ from: IncidentStatusSchema, to: IncidentStatusSchema }).optional(),
})

/** Everything on an IncidentRecord besides its indexed columns and timeline */
export const IncidentStateSchema = z.object({
  rawAlert: AlertPayloadSchema,
  validatedAlert: ValidatedAlertSchema.nullable(),
  rootCause: RootCauseAnalysisSchema.nullable(),
  ticket: TicketRecordSchema.nullable(),
  remediation: RemediationRecordSchema.nullable(),
  errorMessage: z.string().nullable(),
  failedStage: StageNameSchema.nullable(),
  stageFailures: z.array(
    z.object({
      stage: StageNameSchema,
      message: z.string(),
      kind: z.enum(['transient', 'permanent']),
      at: z.string(),
    }),
  ),
  policy: MergePolicySnapshotSchema,
  integrationTrace: z.object({
    ticketProvider: z.string(),
    codeProvider: z.string(),
    analysisProvider: z.string(),
  }),
  resumeAttempts: z.number().int().nonnegative(),
})

export type IncidentState = z.infer<typeof IncidentStateSchema>

export const IncidentColumnsSchema = z.object({
  status: IncidentStatusSchema,
  severity: SeveritySchema,
  approvalStatus: z.enum(['NOT_REQUIRED', 'PENDING', 'APPROVED', 'REJECTED']),
  prStatus: z.enum(['NOT_CREATED', 'PENDING_CI', 'CI_PASSED', 'CI_FAILED', 'MERGED']),
})

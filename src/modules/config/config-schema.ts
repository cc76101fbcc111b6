/**
 * Zod validation schemas for the Patchwarden configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings and the HTTP server
 *  - storage backend
 *  - merge gate and approval window
 *  - pipeline timing and retry policy
 *  - integration providers (jira, github)
 *  - full config document
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Global / server / storage
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

export const ServerConfigSchema = z
  .object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
  })
  .strict()

export type ServerConfig = z.infer<typeof ServerConfigSchema>

export const StorageConfigSchema = z
  .object({
    driver: z.enum(['memory', 'sqlite']),
    /** Resolved against the working directory; `:memory:` is accepted */
    sqlite_path: z.string().min(1),
  })
  .strict()

export type StorageConfig = z.infer<typeof StorageConfigSchema>

// ---------------------------------------------------------------------------
// Merge gate / approval
// ---------------------------------------------------------------------------

export const MergeGateConfigSchema = z
  .object({
    require_ci_pass: z.boolean(),
    require_codeowner_review: z.boolean(),
    require_pr_approval: z.boolean(),
    merge_method: z.enum(['merge', 'squash', 'rebase']),
    /** Severities that always wait for a human, whatever the flags say */
    approval_required_severities: z.array(z.enum(['critical', 'high', 'medium', 'low'])),
  })
  .strict()

export type MergeGateConfig = z.infer<typeof MergeGateConfigSchema>

export const ApprovalConfigSchema = z
  .object({
    /** Fail incidents waiting longer than this (0 = wait forever) */
    timeout_ms: z.number().int().min(0),
    /** Flag waiting incidents as stale after this long */
    stale_after_ms: z.number().int().positive(),
  })
  .strict()

export type ApprovalConfig = z.infer<typeof ApprovalConfigSchema>

// ---------------------------------------------------------------------------
// Pipeline / retry
// ---------------------------------------------------------------------------

export const PipelineConfigSchema = z
  .object({
    stage_timeout_ms: z.number().int().positive(),
    ci_poll_interval_ms: z.number().int().positive(),
    ci_timeout_ms: z.number().int().positive(),
    reconcile_interval_ms: z.number().int().positive(),
    max_resume_attempts: z.number().int().min(0),
    /** How long a process's claim on a running incident lasts without renewal */
    lease_ttl_ms: z.number().int().min(1_000),
  })
  .strict()

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>

export const RetryConfigSchema = z
  .object({
    max_attempts: z.number().int().min(1).max(10),
    base_delay_ms: z.number().int().min(0),
    max_delay_ms: z.number().int().min(0),
  })
  .strict()
  .refine((retry) => retry.max_delay_ms >= retry.base_delay_ms, {
    message: 'max_delay_ms must be >= base_delay_ms',
    path: ['max_delay_ms'],
  })

export type RetryConfig = z.infer<typeof RetryConfigSchema>

// ---------------------------------------------------------------------------
// Integrations
// ---------------------------------------------------------------------------

export const ProviderModeSchema = z.enum(['mock', 'api'])
export type ProviderMode = z.infer<typeof ProviderModeSchema>

export const JiraConfigSchema = z
  .object({
    mode: ProviderModeSchema,
    base_url: z.string().optional(),
    username: z.string().optional(),
    project_key: z.string().optional(),
    issue_type: z.string(),
    /** Workflow status the ticket moves to once the fix is merged */
    done_status: z.string(),
    /** Name of the environment variable that holds the API token */
    token_env: z.string(),
  })
  .strict()

export type JiraConfig = z.infer<typeof JiraConfigSchema>

export const GithubConfigSchema = z
  .object({
    mode: ProviderModeSchema,
    owner: z.string().optional(),
    /** Repository used when the analysis names none */
    default_repository: z.string().min(1),
    default_base_branch: z.string().min(1),
    api_url: z.string(),
    /** Name of the environment variable that holds the token */
    token_env: z.string(),
  })
  .strict()

export type GithubConfig = z.infer<typeof GithubConfigSchema>

export const IntegrationsConfigSchema = z
  .object({
    jira: JiraConfigSchema,
    github: GithubConfigSchema,
  })
  .strict()

export type IntegrationsConfig = z.infer<typeof IntegrationsConfigSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

/** All config format versions this release can read and validate */
export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = ['1']

export const PatchwardenConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    server: ServerConfigSchema,
    storage: StorageConfigSchema,
    merge_gate: MergeGateConfigSchema,
    approval: ApprovalConfigSchema,
    pipeline: PipelineConfigSchema,
    retry: RetryConfigSchema,
    integrations: IntegrationsConfigSchema,
  })
  .strict()

export type PatchwardenConfig = z.infer<typeof PatchwardenConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (allows partial sections during load before merging)
// ---------------------------------------------------------------------------

export const PartialPatchwardenConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    server: ServerConfigSchema.partial().optional(),
    storage: StorageConfigSchema.partial().optional(),
    merge_gate: MergeGateConfigSchema.partial().optional(),
    approval: ApprovalConfigSchema.partial().optional(),
    pipeline: PipelineConfigSchema.partial().optional(),
    retry: z
      .object({
        max_attempts: z.number().int().min(1).max(10),
        base_delay_ms: z.number().int().min(0),
        max_delay_ms: z.number().int().min(0),
      })
      .strict()
      .partial()
      .optional(),
    integrations: z
      .object({
        jira: JiraConfigSchema.partial().optional(),
        github: GithubConfigSchema.partial().optional(),
      })
      .strict()
      .optional(),
  })
  .strict()

export type PartialPatchwardenConfig = z.infer<typeof PartialPatchwardenConfigSchema>

/**
 * Built-in default values for the Patchwarden configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type { PatchwardenConfig } from './config-schema.js'

export const DEFAULT_CONFIG: PatchwardenConfig = {
  config_format_version: '1',
  global: {
    log_level: 'info',
  },
  server: {
    host: '127.0.0.1',
    port: 8080,
  },
  storage: {
    driver: 'sqlite',
    sqlite_path: '.patchwarden/incidents.db',
  },
  merge_gate: {
    require_ci_pass: true,
    require_codeowner_review: false,
    require_pr_approval: false,
    merge_method: 'squash',
    approval_required_severities: [],
  },
  approval: {
    timeout_ms: 0,
    // 30 minutes
    stale_after_ms: 1_800_000,
  },
  pipeline: {
    stage_timeout_ms: 30_000,
    ci_poll_interval_ms: 10_000,
    ci_timeout_ms: 900_000,
    reconcile_interval_ms: 60_000,
    max_resume_attempts: 3,
    lease_ttl_ms: 60_000,
  },
  retry: {
    max_attempts: 3,
    base_delay_ms: 1_000,
    max_delay_ms: 10_000,
  },
  integrations: {
    jira: {
      mode: 'mock',
      issue_type: 'Bug',
      done_status: 'Done',
      token_env: 'JIRA_API_TOKEN',
    },
    github: {
      mode: 'mock',
      default_repository: 'platform-services',
      default_base_branch: 'main',
      api_url: 'https://api.github.com',
      token_env: 'GITHUB_TOKEN',
    },
  },
}

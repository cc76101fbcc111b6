/**
 * Provider routing — picks the mock or the REST client for each integration
 * from `integrations.<name>.mode` and reports readiness for /health.
 */

import { ProviderConfigError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { GithubConfig, IntegrationsConfig, JiraConfig } from '../config/config-schema.js'
import type { Clock } from '../timeline/timeline-log.js'
import type { IntegrationTrace } from '../incidents/types.js'
import { GithubCodeProvider } from './github-provider.js'
import { HeuristicAnalysisProvider } from './heuristic-analysis-provider.js'
import type { FetchFn } from './http.js'
import { JiraTicketProvider } from './jira-provider.js'
import { MockCodeProvider, MockTicketProvider } from './mock-providers.js'
import { SignalTriageProvider } from './signal-triage-provider.js'
import type { Integrations, ProviderReadiness } from './types.js'

const logger = createLogger('integrations:router')

export interface IntegrationOptions {
  env?: NodeJS.ProcessEnv
  fetchFn?: FetchFn
  clock?: Clock
}

function isHttpUrl(value: string | undefined): boolean {
  if (value === undefined) return false
  try {
    const url = new URL(value)
    return url.protocol === 'http:' || url.protocol === 'https:'
  } catch {
    return false
  }
}

function blank(value: string | undefined): boolean {
  return value === undefined || value.trim() === ''
}

function readiness(mock: string, api: string, mode: string, missingFields: string[]): ProviderReadiness {
  if (mode === 'mock') {
    return { ready: true, mode, backend: mock, reason: 'mock_mode', missingFields: [] }
  }
  return {
    ready: missingFields.length === 0,
    mode,
    backend: api,
    reason: missingFields.length === 0 ? 'ready' : 'missing_fields',
    missingFields,
  }
}

// ---------------------------------------------------------------------------
// Readiness
// ---------------------------------------------------------------------------

export function jiraReadiness(config: JiraConfig, env: NodeJS.ProcessEnv = process.env): ProviderReadiness {
  const missing: string[] = []
  if (!isHttpUrl(config.base_url)) missing.push('base_url')
  if (blank(config.username)) missing.push('username')
  if (blank(config.project_key)) missing.push('project_key')
  if (blank(env[config.token_env])) missing.push(config.token_env)
  return readiness('jira_mock', 'jira_api', config.mode, missing)
}

export function githubReadiness(config: GithubConfig, env: NodeJS.ProcessEnv = process.env): ProviderReadiness {
  const missing: string[] = []
  if (blank(config.owner)) missing.push('owner')
  if (!isHttpUrl(config.api_url)) missing.push('api_url')
  if (blank(env[config.token_env])) missing.push(config.token_env)
  return readiness('github_mock', 'github_api', config.mode, missing)
}

export function providerReadiness(
  config: IntegrationsConfig,
  env: NodeJS.ProcessEnv = process.env,
): { jira: ProviderReadiness; github: ProviderReadiness } {
  return { jira: jiraReadiness(config.jira, env), github: githubReadiness(config.github, env) }
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Build the provider set.
 * @throws {ProviderConfigError} when an `api` provider lacks required fields
 */
export function createIntegrations(config: IntegrationsConfig, options: IntegrationOptions = {}): Integrations {
  const env = options.env ?? process.env
  const status = providerReadiness(config, env)

  for (const [provider, state] of Object.entries(status)) {
    if (!state.ready) {
      throw new ProviderConfigError(provider, state.mode, state.reason, state.missingFields)
    }
  }

  const { jira, github } = config
  const ticketing =
    jira.mode === 'api'
      ? new JiraTicketProvider({
          baseUrl: jira.base_url ?? '',
          username: jira.username ?? '',
          apiToken: env[jira.token_env] ?? '',
          projectKey: jira.project_key ?? '',
          issueType: jira.issue_type,
          fetchFn: options.fetchFn,
        })
      : new MockTicketProvider()

  const code =
    github.mode === 'api'
      ? new GithubCodeProvider({
          token: env[github.token_env] ?? '',
          owner: github.owner ?? '',
          defaultBaseBranch: github.default_base_branch,
          apiUrl: github.api_url,
          fetchFn: options.fetchFn,
        })
      : new MockCodeProvider()

  const integrations: Integrations = {
    triage: new SignalTriageProvider(options.clock),
    analysis: new HeuristicAnalysisProvider({ defaultRepository: github.default_repository }),
    ticketing,
    code,
  }
  logger.info(traceOf(integrations), 'Integrations wired')
  return integrations
}

/** Provider names recorded on each incident */
export function traceOf(integrations: Integrations): IntegrationTrace {
  return {
    ticketProvider: integrations.ticketing.name,
    codeProvider: integrations.code.name,
    analysisProvider: integrations.analysis.name,
  }
}

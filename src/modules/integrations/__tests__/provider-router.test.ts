import { describe, it, expect } from 'vitest'
import { createIntegrations, providerReadiness, traceOf } from '../provider-router.js'
import { ProviderConfigError } from '../../../core/errors.js'
import { DEFAULT_CONFIG } from '../../config/defaults.js'
import type { IntegrationsConfig } from '../../config/config-schema.js'

const apiConfig: IntegrationsConfig = {
  jira: {
    ...DEFAULT_CONFIG.integrations.jira,
    mode: 'api',
    base_url: 'https://jira.example.test',
    username: 'ops@example.test',
    project_key: 'SRE',
  },
  github: { ...DEFAULT_CONFIG.integrations.github, mode: 'api', owner: 'acme' },
}

const env = { JIRA_API_TOKEN: 'test-secret', GITHUB_TOKEN: 'test-secret' }

describe('providerReadiness', () => {
  it('reports mock providers as ready', () => {
    expect(providerReadiness(DEFAULT_CONFIG.integrations, {})).toEqual({
      jira: { ready: true, mode: 'mock', backend: 'jira_mock', reason: 'mock_mode', missingFields: [] },
      github: { ready: true, mode: 'mock', backend: 'github_mock', reason: 'mock_mode', missingFields: [] },
    })
  })

  it('lists missing fields for api providers', () => {
    const status = providerReadiness(
      { ...apiConfig, jira: { ...apiConfig.jira, base_url: 'not a url', username: ' ' } },
      { GITHUB_TOKEN: 'test-secret' },
    )
    expect(status.jira).toEqual({
      ready: false,
      mode: 'api',
      backend: 'jira_api',
      reason: 'missing_fields',
      missingFields: ['base_url', 'username', 'JIRA_API_TOKEN'],
    })
    expect(status.github.ready).toBe(true)
  })
})

describe('createIntegrations', () => {
  it('wires the mocks by default', () => {
    expect(traceOf(createIntegrations(DEFAULT_CONFIG.integrations, { env: {} }))).toEqual({
      ticketProvider: 'jira_mock',
      codeProvider: 'github_mock',
      analysisProvider: 'heuristic',
    })
  })

  it('wires the REST clients in api mode', () => {
    const integrations = createIntegrations(apiConfig, { env })
    expect(integrations.ticketing.name).toBe('jira_api')
    expect(integrations.code.name).toBe('github_api')
    expect(integrations.triage.name).toBe('signal-triage')
  })

  it('refuses an api provider without credentials', () => {
    expect(() => createIntegrations(apiConfig, { env: { JIRA_API_TOKEN: 'test-secret' } })).toThrow(ProviderConfigError)
    expect(() => createIntegrations(apiConfig, { env: { JIRA_API_TOKEN: 'test-secret' } })).toThrow(
      'github_missing_fields: mode=api; missing_or_invalid_fields=GITHUB_TOKEN',
    )
  })
})

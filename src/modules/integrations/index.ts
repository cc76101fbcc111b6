/**
 * Barrel exports for the integrations module.
 */

export type * from './types.js'
export { GithubCodeProvider, ciStateFrom, reviewStatusFrom } from './github-provider.js'
export type { GithubProviderOptions } from './github-provider.js'
export { JiraTicketProvider, incidentLabel } from './jira-provider.js'
export type { JiraProviderOptions } from './jira-provider.js'
export { HeuristicAnalysisProvider, inferCategory } from './heuristic-analysis-provider.js'
export { SignalTriageProvider, scoreSignals, severityFromScore } from './signal-triage-provider.js'
export { MockCodeProvider, MockTicketProvider, stableHash } from './mock-providers.js'
export type { MockCodeProviderOptions } from './mock-providers.js'
export { createIntegrations, githubReadiness, jiraReadiness, providerReadiness, traceOf } from './provider-router.js'
export type { IntegrationOptions } from './provider-router.js'
export { isTransientStatus, sendJson } from './http.js'
export type { FetchFn } from './http.js'

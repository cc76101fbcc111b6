/**
 * Barrel exports for the stage-adapters module.
 */

export type * from './types.js'
export { backoffDelay, classifyError, runStage } from './stage-runner.js'
export { StageAdapters, remediationBranch, ticketDescription, ticketSummary } from './stage-adapters.js'
export type { CiPollOptions, PullRequestTarget } from './stage-adapters.js'

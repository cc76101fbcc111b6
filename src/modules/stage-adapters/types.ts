/**
 * Shared types for the stage-adapters module.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { StageName } from '../../core/types.js'

export type StageErrorKind = 'transient' | 'permanent'

/** Final failure of a stage; transient only when retries ran out */
export interface StageError {
  stage: StageName
  kind: StageErrorKind
  message: string
  attempts: number
  cause: Error
}

export type StageResult<T> =
  | { ok: true; value: T; attempts: number; durationMs: number }
  | { ok: false; error: StageError; durationMs: number }

export interface RetryPolicy {
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
}

export interface StageRuntime {
  retry: RetryPolicy
  /** Upper bound on a single attempt */
  timeoutMs: number
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  /** Source of jitter in [0, 1) */
  random?: () => number
  /** Millisecond clock used for durations and polling deadlines */
  now?: () => number
  eventBus?: TypedEventBus
}

/** Outcome of waiting on the remediation PR's checks */
export interface CiVerdict {
  outcome: 'passed' | 'failed' | 'timeout'
  review: 'approved' | 'pending' | 'changes_requested' | 'unknown'
  polls: number
  waitedMs: number
  details: Record<string, unknown>
}

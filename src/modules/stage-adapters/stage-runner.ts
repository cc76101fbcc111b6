/**
 * Bounded retry around a single stage call.
 *
 * Transient failures are retried with exponential backoff and equal jitter;
 * permanent failures return at once. Every attempt gets its own timeout and
 * AbortSignal.
 */

import { TransientIntegrationError } from '../../core/errors.js'
import type { StageName } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { sleep as defaultSleep, toError } from '../../utils/helpers.js'
import type { RetryPolicy, StageErrorKind, StageResult, StageRuntime } from './types.js'

const logger = createLogger('stage-adapters:runner')

/** Integration errors keep their kind; anything else is a permanent failure */
export function classifyError(err: unknown): StageErrorKind {
  return err instanceof TransientIntegrationError ? 'transient' : 'permanent'
}

/**
 * Delay before retrying after failed attempt number `attempt` (1-based):
 * half of the capped exponential step plus up to the other half at random.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const step = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1))
  return Math.round(step / 2 + random() * (step / 2))
}

async function attemptWithTimeout<T>(
  stage: StageName,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new TransientIntegrationError(`${stage} attempt timed out after ${String(timeoutMs)}ms`, {
        provider: stage,
        timeoutMs,
      })
      // Reject before aborting so the race settles with the timeout
      reject(error)
      controller.abort(error)
    }, timeoutMs)
  })
  try {
    return await Promise.race([fn(controller.signal), timeout])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * Run `fn` for `stage` of `incidentId` under the runtime's retry policy.
 * Never throws: the outcome is a StageResult.
 */
export async function runStage<T>(
  stage: StageName,
  incidentId: string,
  fn: (signal: AbortSignal) => Promise<T>,
  runtime: StageRuntime,
): Promise<StageResult<T>> {
  const sleep = runtime.sleep ?? defaultSleep
  const now = runtime.now ?? Date.now
  const { maxAttempts } = runtime.retry
  const startedAt = now()

  runtime.eventBus?.emit('stage:started', { incidentId, stage })

  for (let attempt = 1; ; attempt++) {
    try {
      const value = await attemptWithTimeout(stage, runtime.timeoutMs, fn)
      const durationMs = now() - startedAt
      runtime.eventBus?.emit('stage:completed', { incidentId, stage, durationMs })
      logger.debug({ incidentId, stage, attempt, durationMs }, 'Stage call succeeded')
      return { ok: true, value, attempts: attempt, durationMs }
    } catch (err) {
      const cause = toError(err)
      const kind = classifyError(err)

      if (kind === 'transient' && attempt < maxAttempts) {
        const delayMs = backoffDelay(attempt, runtime.retry, runtime.random)
        logger.warn({ incidentId, stage, attempt, maxAttempts, delayMs, err: cause.message }, 'Transient stage failure; retrying')
        runtime.eventBus?.emit('stage:retrying', { incidentId, stage, attempt, maxAttempts, delayMs })
        await sleep(delayMs)
        continue
      }

      const durationMs = now() - startedAt
      logger.error({ incidentId, stage, attempt, kind, err: cause.message }, 'Stage call failed')
      runtime.eventBus?.emit('stage:failed', { incidentId, stage, error: cause.message, kind })
      return {
        ok: false,
        error: { stage, kind, message: cause.message, attempts: attempt, cause },
        durationMs,
      }
    }
  }
}

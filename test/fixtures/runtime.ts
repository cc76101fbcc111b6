/**
 * Virtual-time stage runtime: sleeps advance a counter instead of waiting.
 */

import type { StageRuntime } from '../../src/modules/stage-adapters/types.js'
import type { TypedEventBus } from '../../src/core/event-bus.js'

export interface VirtualRuntime {
  runtime: StageRuntime
  sleeps: number[]
  elapsed: () => number
}

export function virtualRuntime(overrides: Partial<StageRuntime> = {}, eventBus?: TypedEventBus): VirtualRuntime {
  let now = 0
  const sleeps: number[] = []
  const runtime: StageRuntime = {
    retry: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 10_000 },
    timeoutMs: 5_000,
    sleep: async (ms: number) => {
      sleeps.push(ms)
      now += ms
    },
    now: () => now,
    random: () => 0,
    eventBus,
    ...overrides,
  }
  return { runtime, sleeps, elapsed: () => now }
}

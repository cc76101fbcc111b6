import { describe, it, expect, vi, afterEach } from 'vitest'
import { setupGracefulShutdown } from '../shutdown-handler.js'

const cleanups: Array<() => void> = []

afterEach(() => {
  for (const cleanup of cleanups.splice(0)) cleanup()
})

function install(shutdown: () => Promise<void>) {
  const before = process.listeners('SIGTERM')
  const exit = vi.fn<(code: number) => void>()
  const cleanup = setupGracefulShutdown({ shutdown, exit })
  cleanups.push(cleanup)
  const [handler] = process.listeners('SIGTERM').filter((listener) => !before.includes(listener))
  return { exit, cleanup, handler }
}

describe('setupGracefulShutdown', () => {
  it('registers one SIGTERM and one SIGINT listener and removes them on cleanup', () => {
    const sigint = process.listenerCount('SIGINT')
    const sigterm = process.listenerCount('SIGTERM')
    const { cleanup } = install(async () => {})

    expect(process.listenerCount('SIGINT')).toBe(sigint + 1)
    expect(process.listenerCount('SIGTERM')).toBe(sigterm + 1)
    cleanup()
    expect(process.listenerCount('SIGINT')).toBe(sigint)
    expect(process.listenerCount('SIGTERM')).toBe(sigterm)
  })

  it('tears down once and exits 0', async () => {
    const shutdown = vi.fn(async () => {})
    const { exit, handler } = install(shutdown)

    handler?.('SIGTERM')
    handler?.('SIGTERM')
    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(0))
    expect(shutdown).toHaveBeenCalledTimes(1)
    expect(exit).toHaveBeenCalledTimes(1)
  })

  it('exits 1 when teardown fails', async () => {
    const { exit, handler } = install(async () => {
      throw new Error('database busy')
    })

    handler?.('SIGTERM')
    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(1))
  })
})

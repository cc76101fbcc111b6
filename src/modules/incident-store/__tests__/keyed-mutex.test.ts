import { describe, it, expect } from 'vitest'
import { KeyedMutex } from '../keyed-mutex.js'

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined
  const promise = new Promise<void>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

describe('KeyedMutex', () => {
  it('runs callers for the same key one at a time in arrival order', async () => {
    const mutex = new KeyedMutex()
    const order: string[] = []
    const gate = deferred()

    const first = mutex.runExclusive('INC-1', async () => {
      order.push('first:start')
      await gate.promise
      order.push('first:end')
    })
    const second = mutex.runExclusive('INC-1', () => {
      order.push('second')
    })

    await Promise.resolve()
    expect(order).toEqual(['first:start'])
    gate.resolve()
    await Promise.all([first, second])

    expect(order).toEqual(['first:start', 'first:end', 'second'])
    expect(mutex.isLocked('INC-1')).toBe(false)
  })

  it('does not make different keys wait on each other', async () => {
    const mutex = new KeyedMutex()
    const gate = deferred()
    const held = mutex.runExclusive('INC-1', () => gate.promise)

    const other = await mutex.runExclusive('INC-2', () => 'done')

    expect(other).toBe('done')
    expect(mutex.isLocked('INC-1')).toBe(true)
    gate.resolve()
    await held
  })

  it('releases the lock when the holder throws', async () => {
    const mutex = new KeyedMutex()
    await expect(
      mutex.runExclusive('INC-1', () => {
        throw new Error('boom')
      }),
    ).rejects.toThrow('boom')

    await expect(mutex.runExclusive('INC-1', () => 42)).resolves.toBe(42)
  })
})

/**
 * KeyedMutex — one FIFO lock per key.
 *
 * Callers for the same key run strictly one after another; callers for
 * different keys never wait on each other. Entries are dropped once their
 * queue drains, so the map only holds keys with work in flight.
 */

export class KeyedMutex {
  private readonly _tails = new Map<string, Promise<void>>()

  /**
   * Run `fn` once every earlier holder of `key` has finished.
   * The lock is released whether `fn` resolves or throws.
   */
  async runExclusive<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const previous = this._tails.get(key) ?? Promise.resolve()
    let release: () => void = () => undefined
    const held = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = previous.then(() => held)
    this._tails.set(key, tail)

    await previous
    try {
      return await fn()
    } finally {
      release()
      if (this._tails.get(key) === tail) {
        this._tails.delete(key)
      }
    }
  }

  /** Whether any caller currently holds or waits for `key` */
  isLocked(key: string): boolean {
    return this._tails.has(key)
  }
}

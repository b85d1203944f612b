/**
 * Shared - Async Mutex
 *
 * Promise-chain-based mutual exclusion lock. Serializes the async steps of
 * a file handle (open, save, relocation) so identity, dirty state and the
 * watch subscription are never seen half-updated between two awaits.
 */
export class AsyncMutex {
  #queue: Promise<void> = Promise.resolve()
  #pending = 0

  /**
   * Execute `fn` while holding the lock.
   *
   * Calls run one at a time in submission (FIFO) order.
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    let release: () => void = () => undefined
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })

    const previous = this.#queue
    this.#queue = gate
    this.#pending++

    await previous
    try {
      return await fn()
    } finally {
      this.#pending--
      release()
    }
  }

  get isLocked(): boolean {
    return this.#pending > 0
  }

  /** Resolves after everything submitted so far has run. */
  async idle(): Promise<void> {
    await this.runExclusive(() => undefined)
  }
}

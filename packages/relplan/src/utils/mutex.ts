/**
 * In-process mutex. Waiters are resumed in arrival order; the lock is
 * handed directly to the next waiter so nobody can barge in between.
 */
export class Mutex {
  private queue: Array<() => void> = []
  private locked = false

  get isLocked(): boolean {
    return this.locked
  }

  /** Number of callers waiting for the lock */
  get pending(): number {
    return this.queue.length
  }

  /**
   * Resolves once the caller holds the lock. The returned function releases
   * it; calling it more than once has no further effect.
   */
  async acquire(): Promise<() => void> {
    if (this.locked) {
      await new Promise<void>((resolve) => {
        this.queue.push(resolve)
      })
    } else {
      this.locked = true
    }

    let released = false
    return () => {
      if (released) return
      released = true
      this.release()
    }
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire()
    try {
      return await fn()
    } finally {
      release()
    }
  }

  private release(): void {
    const next = this.queue.shift()
    if (next) {
      next()
    } else {
      this.locked = false
    }
  }
}

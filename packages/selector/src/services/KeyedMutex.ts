/**
 * KeyedMutex
 * - Simple per-key FIFO mutex queues
 * - One logical resource (a cache key, a router checkpoint) maps to one key
 */
export class KeyedMutex {
  private queues: Map<string, Array<() => void>> = new Map()

  /** Acquire a lock for a key (FIFO). Resolves when lock is held. */
  private acquire(key: string): Promise<void> {
    const queue = this.queues.get(key) || []

    const p = new Promise<void>((resolve) => queue.push(resolve))
    this.queues.set(key, queue)

    // If we're the only waiter, acquire immediately
    if (queue.length === 1) {
      queue[0]()
    }

    return p
  }

  /** Release a lock for a key. */
  private release(key: string) {
    const queue = this.queues.get(key)
    if (!queue || queue.length === 0) return
    // Remove current holder
    queue.shift()
    if (queue.length === 0) {
      this.queues.delete(key)
    } else {
      // Wake next waiter
      queue[0]()
    }
  }

  /** Run `fn` while holding the lock for `key`; the lock is released even when `fn` throws. */
  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    await this.acquire(key)
    try {
      return await fn()
    } finally {
      this.release(key)
    }
  }

  /** Number of holders plus waiters for a key. */
  pending(key: string): number {
    return this.queues.get(key)?.length ?? 0
  }
}

export default KeyedMutex

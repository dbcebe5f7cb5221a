import { CacheBackend, CacheEntry, Clock } from './CacheBackend'

/**
 * Process-local cache. Expiry is fixed at write time and checked lazily on read;
 * there is no background sweep.
 */
export class InMemoryCache implements CacheBackend {
  private entries: Map<string, CacheEntry> = new Map()
  private readonly now: Clock

  constructor(opts: { clock?: Clock } = {}) {
    this.now = opts.clock ?? Date.now
  }

  async get(key: string): Promise<unknown | undefined> {
    const entry = this.entries.get(key)
    if (!entry) return undefined
    if (entry.expiresAt !== undefined && entry.expiresAt <= this.now()) {
      // expired
      this.entries.delete(key)
      return undefined
    }
    return entry.value
  }

  async set(key: string, value: unknown, ttlSeconds?: number | null): Promise<void> {
    const expiresAt = ttlSeconds === undefined || ttlSeconds === null ? undefined : this.now() + ttlSeconds * 1000
    this.entries.set(key, { value, expiresAt })
  }

  get size(): number {
    return this.entries.size
  }
}

export default InMemoryCache

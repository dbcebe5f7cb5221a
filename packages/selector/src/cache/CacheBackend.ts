/**
 * Key/value store with an optional per-entry TTL.
 * A `ttlSeconds` of undefined or null means the entry never expires.
 */
export interface CacheBackend {
  get(key: string): Promise<unknown | undefined>
  set(key: string, value: unknown, ttlSeconds?: number | null): Promise<void>
}

export type CacheEntry = {
  value: unknown
  /** epoch ms; undefined never expires */
  expiresAt?: number
}

export type Clock = () => number

import Redis from 'ioredis'
import { CacheBackend } from './CacheBackend'

/** The subset of the ioredis client the cache uses. */
export interface RedisCommands {
  get(key: string): Promise<string | null>
  set(key: string, value: string): Promise<unknown>
  setex(key: string, seconds: number, value: string): Promise<unknown>
  del(key: string): Promise<unknown>
}

/**
 * Redis-backed cache storing JSON text. Values that JSON cannot represent directly are
 * reduced first: class instances to their own fields, everything else to its string form.
 */
export class RedisCache implements CacheBackend {
  constructor(private readonly client: RedisCommands) {}

  async get(key: string): Promise<unknown | undefined> {
    const raw = await this.client.get(key)
    if (raw === null) return undefined
    try {
      return JSON.parse(raw)
    } catch {
      // written by something else, or truncated: a miss, never an error
      return undefined
    }
  }

  async set(key: string, value: unknown, ttlSeconds?: number | null): Promise<void> {
    const payload = encodeValue(value)
    if (ttlSeconds === undefined || ttlSeconds === null) {
      await this.client.set(key, payload)
    } else if (ttlSeconds > 0) {
      await this.client.setex(key, Math.ceil(ttlSeconds), payload)
    } else {
      // already expired on arrival
      await this.client.del(key)
    }
  }
}

export function encodeValue(value: unknown): string {
  const encoded = JSON.stringify(value, (_key, v: unknown) => {
    if (v === null || typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') return v
    if (typeof v === 'object') {
      if (v instanceof Map) return Object.fromEntries(v)
      if (v instanceof Set) return Array.from(v)
      return v
    }
    if (v === undefined) return v
    return String(v)
  })
  // top-level undefined has no JSON form
  return encoded === undefined ? 'null' : encoded
}

export function redisCacheFromUrl(url: string): RedisCache {
  return new RedisCache(new Redis(url))
}

export default RedisCache

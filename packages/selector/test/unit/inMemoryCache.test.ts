import { InMemoryCache } from '../../src/cache/InMemoryCache'

describe('InMemoryCache', () => {
  let now: number
  let cache: InMemoryCache

  beforeEach(() => {
    now = 1_700_000_000_000
    cache = new InMemoryCache({ clock: () => now })
  })

  it('ttl of zero expires immediately; no ttl persists', async () => {
    await cache.set('key', 'value', 0)
    await cache.set('key-persist', 'value', null)
    await cache.set('key-default', 'value')

    expect(await cache.get('key')).toBeUndefined()
    expect(await cache.get('key-persist')).toBe('value')
    expect(await cache.get('key-default')).toBe('value')
    expect(await cache.get('missing')).toBeUndefined()
  })

  it('returns the value until now passes expiry', async () => {
    await cache.set('k', { a: 1 }, 10)
    now += 9_999
    expect(await cache.get('k')).toEqual({ a: 1 })
    now += 1
    expect(await cache.get('k')).toBeUndefined()
  })

  it('drops expired entries on read', async () => {
    await cache.set('k', 'v', 1)
    expect(cache.size).toBe(1)
    now += 1_000
    await cache.get('k')
    expect(cache.size).toBe(0)
  })

  it('overwrites value and expiry', async () => {
    await cache.set('k', 'old', 1)
    await cache.set('k', 'new')
    now += 60_000
    expect(await cache.get('k')).toBe('new')
  })
})

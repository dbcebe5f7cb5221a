import { Candidate } from '@freeroute/dto'
import { CacheBackend, Clock } from '../cache/CacheBackend'
import { parseCandidateList, selectEligible } from '../validators/catalogValidator'
import { KeyedMutex } from './KeyedMutex'
import { logCacheLookup, logRefresh, errorMessage } from '../utils/logger'
import { countCacheLookup, countRefresh, setCandidateCount } from '../utils/metrics'

/** Upstream catalog call: a descriptor list or a `{ data: [...] }` envelope. */
export type CatalogFetcher = () => Promise<unknown>

export type FreshnessCacheOptions = {
  ttlSeconds?: number
  cache?: CacheBackend
  cacheKey?: string
  clock?: Clock
  mutex?: KeyedMutex
}

/**
 * FreshnessCache
 * - Serves the eligible (zero-price) candidates of an upstream catalog
 * - Consults the shared cache backend first, then the in-process copy, then upstream
 * - Each refresh runs under the lock for its cache key
 */
export class FreshnessCache {
  readonly ttlSeconds: number
  readonly cacheKey: string
  private readonly cache?: CacheBackend
  private readonly now: Clock
  private readonly mutex: KeyedMutex

  private candidates?: Candidate[]
  private lastRefresh?: number

  constructor(private readonly fetchCatalog: CatalogFetcher, opts: FreshnessCacheOptions = {}) {
    this.ttlSeconds = opts.ttlSeconds ?? 3600
    this.cacheKey = opts.cacheKey ?? 'catalog:free_candidates'
    this.cache = opts.cache
    this.now = opts.clock ?? Date.now
    this.mutex = opts.mutex ?? new KeyedMutex()
  }

  get lastRefreshedAt(): number | undefined {
    return this.lastRefresh
  }

  /** In-process copy, without any I/O. */
  current(): Candidate[] | undefined {
    return this.candidates ? [...this.candidates] : undefined
  }

  async refresh(force = false): Promise<Candidate[]> {
    return this.mutex.runExclusive(this.cacheKey, async () => {
      const now = this.now()
      if (!force) {
        const cached = await this.cachedCandidates(now)
        if (cached) return [...cached]
      }

      const started = Date.now()
      let result: ReturnType<typeof selectEligible>
      try {
        result = selectEligible(await this.fetchCatalog())
      } catch (e) {
        countRefresh('error')
        logRefresh({ key: this.cacheKey, forced: force, fetched: 0, eligible: 0, error: errorMessage(e) })
        throw e
      }

      this.candidates = result.candidates
      this.lastRefresh = now
      if (this.cache) await this.cache.set(this.cacheKey, result.candidates, this.ttlSeconds)

      countRefresh('ok')
      setCandidateCount(result.candidates.length)
      logRefresh({
        key: this.cacheKey,
        forced: force,
        fetched: result.fetched,
        eligible: result.candidates.length,
        latency_ms: Date.now() - started
      })
      return [...result.candidates]
    })
  }

  private async cachedCandidates(now: number): Promise<Candidate[] | undefined> {
    if (this.cache) {
      const raw = await this.cache.get(this.cacheKey)
      if (raw !== undefined) {
        const list = parseCandidateList(raw)
        countCacheLookup('backend', list ? 'hit' : 'invalid')
        logCacheLookup({ key: this.cacheKey, source: 'backend', result: list ? 'hit' : 'invalid' })
        if (list) {
          // the shared cache wins over in-process freshness tracking
          this.candidates = list
          this.lastRefresh = now
          return list
        }
      } else {
        countCacheLookup('backend', 'miss')
        logCacheLookup({ key: this.cacheKey, source: 'backend', result: 'miss' })
      }
    }

    if (this.candidates && this.lastRefresh !== undefined && now - this.lastRefresh < this.ttlSeconds * 1000) {
      countCacheLookup('memory', 'hit')
      logCacheLookup({ key: this.cacheKey, source: 'memory', result: 'hit' })
      return this.candidates
    }
    countCacheLookup('memory', 'miss')
    logCacheLookup({ key: this.cacheKey, source: 'memory', result: 'miss' })
    return undefined
  }
}

export default FreshnessCache

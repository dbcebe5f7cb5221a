/*
 * Wiring for embedders: builds the cache backend, checkpoint store, freshness cache and
 * selection service from Settings. The upstream catalog call is supplied by the caller.
 */

import { CacheBackend } from './cache/CacheBackend'
import { redisCacheFromUrl } from './cache/RedisCache'
import { CheckpointStore } from './storage/CheckpointStore'
import { FileCheckpointStore } from './storage/FileCheckpointStore'
import { S3CheckpointStore } from './storage/S3CheckpointStore'
import { CatalogFetcher, FreshnessCache } from './services/FreshnessCache'
import { SelectionService } from './services/SelectionService'
import { Settings, loadSettings } from './config'

export type SelectorDeps = {
  cache?: CacheBackend
  store?: CheckpointStore
}

export function cacheFromSettings(settings: Settings): CacheBackend | undefined {
  return settings.cacheUrl ? redisCacheFromUrl(settings.cacheUrl) : undefined
}

export function storeFromSettings(settings: Settings): CheckpointStore {
  if (settings.checkpointBucket) {
    return new S3CheckpointStore({ bucket: settings.checkpointBucket, prefix: settings.checkpointPrefix })
  }
  return new FileCheckpointStore(settings.checkpointDir)
}

/** Explicit deps win over the ones derived from settings. */
export function createSelectionService(
  fetchCatalog: CatalogFetcher,
  settings: Settings = loadSettings(),
  deps: SelectorDeps = {}
): SelectionService {
  const catalog = new FreshnessCache(fetchCatalog, {
    ttlSeconds: settings.catalogTtlSeconds,
    cacheKey: settings.catalogCacheKey,
    cache: deps.cache ?? cacheFromSettings(settings),
  })
  return new SelectionService(catalog, {
    store: deps.store ?? storeFromSettings(settings),
    checkpointKey: settings.checkpointKey,
    exploration: settings.exploration,
    minPulls: settings.minPulls,
  })
}

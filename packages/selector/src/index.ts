/**
 * Selector public surface: cache backends, checkpoint stores, the freshness cache,
 * the UCB1 router and the composed selection service.
 */
export * from './cache/CacheBackend'
export * from './cache/InMemoryCache'
export * from './cache/RedisCache'
export * from './storage/CheckpointStore'
export * from './storage/FileCheckpointStore'
export * from './storage/S3CheckpointStore'
export * from './storage/InMemoryCheckpointStore'
export * from './validators/catalogValidator'
export * from './validators/checkpointValidator'
export * from './services/KeyedMutex'
export * from './services/FreshnessCache'
export * from './services/UCBRouter'
export * from './services/SelectionService'
export * from './bootstrap'
export * from './config'
export { setLogger } from './utils/logger'
export { setRegistry, getRegistry } from './utils/metrics'

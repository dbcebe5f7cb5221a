import pino from 'pino'

type CacheLookupPayload = {
  key: string
  source: 'backend' | 'memory'
  result: 'hit' | 'miss' | 'invalid'
}

type RefreshPayload = {
  key: string
  forced: boolean
  fetched: number
  eligible: number
  latency_ms?: number
  error?: string
}

type SelectionPayload = {
  candidate: string
  total_pulls: number
  score: number
}

type RewardPayload = {
  candidate: string
  reward: number
  pulls: number
  mean_reward: number
}

type CheckpointPayload = {
  key: string
  op: 'load' | 'save'
  ok: boolean
  entries?: number
  error?: string
}

// create default logger; tests can replace via setLogger
let logger: pino.BaseLogger = pino({ level: process.env.LOG_LEVEL || 'info' })

export function setLogger(l: pino.BaseLogger) {
  logger = l
}

export function getLogger(): pino.BaseLogger {
  return logger
}

export function logCacheLookup(payload: CacheLookupPayload): void {
  logger.debug({ event: 'cache.lookup', ...payload })
}

export function logRefresh(payload: RefreshPayload): void {
  const base = { event: 'catalog.refresh', ...payload }
  if (payload.error) logger.warn(base)
  else logger.info(base)
}

export function logSelection(payload: SelectionPayload): void {
  // Infinity is not representable in JSON
  const score = Number.isFinite(payload.score) ? payload.score : String(payload.score)
  logger.debug({ event: 'router.select', candidate: payload.candidate, total_pulls: payload.total_pulls, score })
}

export function logReward(payload: RewardPayload): void {
  logger.info({ event: 'router.reward', ...payload })
}

export function logCheckpoint(payload: CheckpointPayload): void {
  const base = { event: 'router.checkpoint', ...payload }
  if (!payload.ok) logger.warn(base)
  else logger.debug(base)
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

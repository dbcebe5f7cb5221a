import { Registry, Counter, Gauge } from 'prom-client'

let registry: Registry
let cacheLookupCounter: Counter<string>
let refreshCounter: Counter<string>
let candidateGauge: Gauge<string>
let selectionCounter: Counter<string>
let rewardCounter: Counter<string>
let checkpointCounter: Counter<string>

function initMetrics(reg?: Registry) {
  registry = reg ?? new Registry()

  cacheLookupCounter = new Counter({
    name: 'catalog_cache_lookups_total',
    help: 'Catalog cache lookups by source and result',
    labelNames: ['source', 'result'],
    registers: [registry]
  })

  refreshCounter = new Counter({
    name: 'catalog_refresh_total',
    help: 'Upstream catalog fetches by outcome',
    labelNames: ['outcome'],
    registers: [registry]
  })

  candidateGauge = new Gauge({
    name: 'catalog_candidates',
    help: 'Eligible candidates in the latest catalog fetch',
    registers: [registry]
  })

  selectionCounter = new Counter({
    name: 'router_selections_total',
    help: 'Router selections by candidate',
    labelNames: ['candidate'],
    registers: [registry]
  })

  rewardCounter = new Counter({
    name: 'router_rewards_total',
    help: 'Rewards recorded by candidate',
    labelNames: ['candidate'],
    registers: [registry]
  })

  checkpointCounter = new Counter({
    name: 'router_checkpoint_writes_total',
    help: 'Checkpoint writes by outcome',
    labelNames: ['outcome'],
    registers: [registry]
  })
}

// initialize default metrics on module load
initMetrics()

export function setRegistry(reg: Registry) {
  initMetrics(reg)
}

export function countCacheLookup(source: 'backend' | 'memory', result: 'hit' | 'miss' | 'invalid') {
  cacheLookupCounter.labels({ source, result }).inc()
}

export function countRefresh(outcome: 'ok' | 'error') {
  refreshCounter.labels({ outcome }).inc()
}

export function setCandidateCount(n: number) {
  candidateGauge.set(n)
}

export function countSelection(candidate: string) {
  selectionCounter.labels({ candidate }).inc()
}

export function countReward(candidate: string) {
  rewardCounter.labels({ candidate }).inc()
}

export function countCheckpointWrite(outcome: 'ok' | 'error') {
  checkpointCounter.labels({ outcome }).inc()
}

export function getRegistry(): Registry {
  return registry
}

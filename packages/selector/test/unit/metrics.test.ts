import { Registry } from 'prom-client'
import * as metrics from '../../src/utils/metrics'
import { UCBRouter } from '../../src/services/UCBRouter'
import { InMemoryCheckpointStore } from '../../src/storage/InMemoryCheckpointStore'

describe('metrics wrapper', () => {
  let reg: Registry

  beforeEach(() => {
    reg = new Registry()
    metrics.setRegistry(reg)
  })

  async function sample(name: string, labels: Record<string, string>): Promise<number | undefined> {
    const content = await reg.getMetricsAsJSON()
    const metric = content.find(m => m.name === name)
    const found = metric?.values.find(s => Object.entries(labels).every(([k, v]) => s.labels[k] === v))
    return found?.value
  }

  test('cache lookups are counted by source and result', async () => {
    metrics.countCacheLookup('backend', 'miss')
    metrics.countCacheLookup('backend', 'miss')
    metrics.countCacheLookup('memory', 'hit')
    expect(await sample('catalog_cache_lookups_total', { source: 'backend', result: 'miss' })).toBe(2)
    expect(await sample('catalog_cache_lookups_total', { source: 'memory', result: 'hit' })).toBe(1)
  })

  test('router activity is counted per candidate', async () => {
    const router = await UCBRouter.create([{ id: 'a' }, { id: 'b' }], { store: new InMemoryCheckpointStore() })
    router.select()
    await router.recordReward('b', 1)

    expect(await sample('router_selections_total', { candidate: 'a' })).toBe(1)
    expect(await sample('router_rewards_total', { candidate: 'b' })).toBe(1)
    expect(await sample('router_checkpoint_writes_total', { outcome: 'ok' })).toBe(1)
  })

  test('candidate gauge tracks the latest fetch', async () => {
    metrics.setCandidateCount(7)
    expect(await sample('catalog_candidates', {})).toBe(7)
    expect(metrics.getRegistry()).toBe(reg)
  })
})

import { Candidate, CandidateStats } from '@freeroute/dto'
import { FreshnessCache } from './FreshnessCache'
import { KeyedMutex } from './KeyedMutex'
import { RouterOptions, UCBRouter } from './UCBRouter'

const ROUTER_LOCK = 'selection:router'

/**
 * SelectionService
 * Catalog -> eligible candidates -> router. The router is rebuilt (and its checkpoint reloaded)
 * whenever the refreshed candidate ids differ from the ones it was built with.
 */
export class SelectionService {
  private router?: UCBRouter
  private routerIds = ''
  private readonly routerOptions: RouterOptions
  private readonly mutex: KeyedMutex

  constructor(readonly catalog: FreshnessCache, routerOptions: RouterOptions = {}) {
    this.mutex = routerOptions.mutex ?? new KeyedMutex()
    // routers built over time share one lock so their checkpoint writes never interleave
    this.routerOptions = { ...routerOptions, mutex: this.mutex }
  }

  async candidates(force = false): Promise<Candidate[]> {
    return this.catalog.refresh(force)
  }

  async select(): Promise<Candidate> {
    const router = await this.currentRouter()
    return router.select()
  }

  /** Learned stats of the current router, stale ids included; empty before the first build. */
  snapshot(): Record<string, CandidateStats> {
    return this.router ? this.router.snapshot() : {}
  }

  /** Rewards and router rebuilds are serialized, so a reward always lands on the router that persists it. */
  async recordReward(candidateId: string, reward: number): Promise<void> {
    await this.mutex.runExclusive(ROUTER_LOCK, async () => {
      const router = this.router ?? await this.rebuild(await this.catalog.refresh(false))
      await router.recordReward(candidateId, reward)
    })
  }

  private async currentRouter(): Promise<UCBRouter> {
    const candidates = await this.catalog.refresh(false)
    return this.mutex.runExclusive(ROUTER_LOCK, async () => this.rebuild(candidates))
  }

  // caller holds ROUTER_LOCK
  private async rebuild(candidates: Candidate[]): Promise<UCBRouter> {
    const ids = candidates.map(c => c.id).join('\n')
    if (this.router && ids === this.routerIds) return this.router
    // the previous router's stats carry over; a checkpoint, when there is one, is overlaid on top
    this.router = await UCBRouter.create(candidates, {
      ...this.routerOptions,
      initialState: this.router?.snapshot() ?? this.routerOptions.initialState,
    })
    this.routerIds = ids
    return this.router
  }
}

export default SelectionService

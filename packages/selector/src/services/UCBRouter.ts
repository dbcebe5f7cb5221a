import { Candidate, CandidateStats, RouterPhase } from '@freeroute/dto'
import { ReasonedError } from '@freeroute/reasons'
import { accumulate, emptyStats, meanReward, stableArgmax, totalPulls, ucb1Score } from '@freeroute/math'
import { CheckpointStore } from '../storage/CheckpointStore'
import { decodeCheckpoint, encodeCheckpoint } from '../validators/checkpointValidator'
import { KeyedMutex } from './KeyedMutex'
import { logCheckpoint, logReward, logSelection, errorMessage } from '../utils/logger'
import { countCheckpointWrite, countReward, countSelection } from '../utils/metrics'

export type RouterOptions = {
  store?: CheckpointStore
  checkpointKey?: string
  /** candidates with fewer observations than this are always tried first */
  minPulls?: number
  exploration?: number
  mutex?: KeyedMutex
  /** stats to start from before the checkpoint is overlaid (e.g. a previous router's snapshot) */
  initialState?: Record<string, CandidateStats>
}

export type ScoredCandidate = {
  candidate: Candidate
  score: number
  stats: CandidateStats
}

/**
 * UCBRouter
 * UCB1 bandit over a fixed, ordered candidate list. Learned stats are reloaded from the
 * checkpoint store on creation and the whole snapshot is re-persisted after every reward.
 *
 * Use `UCBRouter.create` to construct; it loads the checkpoint before the router is handed out.
 */
export class UCBRouter {
  readonly candidates: readonly Candidate[]
  readonly checkpointKey: string
  readonly minPulls: number
  readonly exploration: number
  private readonly store?: CheckpointStore
  private readonly mutex: KeyedMutex
  private state: Map<string, CandidateStats> = new Map()
  private _phase: RouterPhase = RouterPhase.UNINITIALIZED

  private constructor(candidates: readonly Candidate[], opts: RouterOptions) {
    assertCandidates(candidates)
    this.candidates = [...candidates]
    this.store = opts.store
    this.checkpointKey = opts.checkpointKey ?? 'router_state.json'
    this.minPulls = opts.minPulls ?? 1
    this.exploration = opts.exploration ?? 1.4
    this.mutex = opts.mutex ?? new KeyedMutex()
    for (const c of this.candidates) this.state.set(c.id, emptyStats())
    for (const [id, st] of Object.entries(opts.initialState ?? {})) {
      this.state.set(id, { pulls: st.pulls, reward_sum: st.reward_sum })
    }
  }

  static async create(candidates: readonly Candidate[], opts: RouterOptions = {}): Promise<UCBRouter> {
    const router = new UCBRouter(candidates, opts)
    await router.load()
    return router
  }

  get phase(): RouterPhase {
    return this._phase
  }

  /** Pick the next candidate to call. Does not touch persisted state. */
  select(): Candidate {
    if (this.candidates.length === 0) throw ReasonedError.of('ROUTER_NO_CANDIDATES')

    const ranked = this.scores()
    const total = this.totalPulls()
    // cold start: ln(0) is undefined, so the first listed candidate goes first
    const idx = total === 0 ? 0 : stableArgmax(ranked.map(r => r.score))
    const chosen = ranked[idx]

    countSelection(chosen.candidate.id)
    logSelection({ candidate: chosen.candidate.id, total_pulls: total, score: chosen.score })
    return chosen.candidate
  }

  /** UCB1 score of every live candidate, in candidate order. */
  scores(): ScoredCandidate[] {
    const total = this.totalPulls()
    return this.candidates.map(candidate => {
      const stats = this.statsFor(candidate.id)
      const score = total === 0
        ? Number.POSITIVE_INFINITY
        : ucb1Score(meanReward(stats), stats.pulls, total, this.exploration, this.minPulls)
      return { candidate, score, stats: { ...stats } }
    })
  }

  /**
   * Record the observed reward for a candidate and persist the full snapshot.
   * Unknown ids are admitted with fresh stats. Calls are serialized per checkpoint key.
   */
  async recordReward(candidateId: string, reward: number): Promise<void> {
    if (typeof reward !== 'number' || !Number.isFinite(reward)) {
      throw ReasonedError.of('ROUTER_INVALID_REWARD', { context: { candidate: candidateId, reward: String(reward) } })
    }

    await this.mutex.runExclusive(this.checkpointKey, async () => {
      let stats = this.state.get(candidateId)
      if (!stats) {
        stats = emptyStats()
        this.state.set(candidateId, stats)
      }
      accumulate(stats, reward)
      this._phase = RouterPhase.UPDATED

      countReward(candidateId)
      logReward({ candidate: candidateId, reward, pulls: stats.pulls, mean_reward: meanReward(stats) })
      await this.save()
    })
  }

  /** Copy of the stats for one id (zero stats for an unseen id). */
  stats(candidateId: string): CandidateStats {
    return { ...this.statsFor(candidateId) }
  }

  /** Deep copy of the full state map, stale ids included. */
  snapshot(): Record<string, CandidateStats> {
    const out: Record<string, CandidateStats> = {}
    for (const [id, s] of this.state) out[id] = { ...s }
    return out
  }

  private statsFor(id: string): CandidateStats {
    return this.state.get(id) ?? emptyStats()
  }

  // stale ids kept for a later catalog do not count toward N
  private totalPulls(): number {
    return totalPulls(this.candidates.map(c => this.statsFor(c.id)))
  }

  // read under the checkpoint lock so a save still in flight on this key lands first
  private async load(): Promise<void> {
    const store = this.store
    if (store) {
      await this.mutex.runExclusive(this.checkpointKey, async () => {
        let raw: Uint8Array | undefined
        try {
          raw = await store.load(this.checkpointKey)
        } catch (e) {
          // unavailable store: start empty
          logCheckpoint({ key: this.checkpointKey, op: 'load', ok: false, error: errorMessage(e) })
        }
        if (raw) {
          const loaded = decodeCheckpoint(raw, this.checkpointKey)
          for (const [id, s] of loaded) this.state.set(id, s)
          logCheckpoint({ key: this.checkpointKey, op: 'load', ok: true, entries: loaded.size })
        }
      })
    }
    this._phase = RouterPhase.LOADED
  }

  private async save(): Promise<void> {
    if (!this.store) return
    const data = encodeCheckpoint(this.candidates, this.state)
    try {
      await this.store.save(this.checkpointKey, data)
    } catch (e) {
      countCheckpointWrite('error')
      logCheckpoint({ key: this.checkpointKey, op: 'save', ok: false, error: errorMessage(e) })
      throw e
    }
    countCheckpointWrite('ok')
    logCheckpoint({ key: this.checkpointKey, op: 'save', ok: true, entries: this.state.size })
  }
}

function assertCandidates(candidates: readonly Candidate[]): void {
  const seen = new Set<string>()
  for (const c of candidates) {
    if (typeof c.id !== 'string' || c.id === '' || seen.has(c.id)) {
      throw ReasonedError.of('ROUTER_INVALID_CANDIDATES', { context: { id: String(c.id) } })
    }
    seen.add(c.id)
  }
}

export default UCBRouter

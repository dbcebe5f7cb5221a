/** An item the router chooses among (e.g. a routable model). */
export interface Candidate {
  id: string
  metadata?: Record<string, unknown> | null
}

/** Running reward statistics for one candidate. Field names match the checkpoint wire format. */
export interface CandidateStats {
  pulls: number
  reward_sum: number
}

/** Whole-state snapshot written after every reward. `experts` is the historical wire name for candidates. */
export interface CheckpointPayload {
  experts: Array<{ id: string; metadata: Record<string, unknown> | null }>
  state: Record<string, CandidateStats>
}

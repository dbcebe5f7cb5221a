/**
 * stats.ts
 * Running reward statistics in the checkpoint's field naming.
 */

export type RewardStats = {
  pulls: number
  reward_sum: number
}

export function emptyStats(): RewardStats {
  return { pulls: 0, reward_sum: 0 }
}

/** reward_sum / pulls, or 0 before the first pull. */
export function meanReward(stats: RewardStats): number {
  return stats.pulls > 0 ? stats.reward_sum / stats.pulls : 0
}

/** Applies one observation in place and returns the same object. */
export function accumulate(stats: RewardStats, reward: number): RewardStats {
  stats.pulls += 1
  stats.reward_sum += reward
  return stats
}

export function totalPulls(all: Iterable<RewardStats>): number {
  let total = 0
  for (const s of all) total += s.pulls
  return total
}

/**
 * scoring.ts
 * UCB1 scoring primitives for candidate ranking; pure functions only (no I/O, no side-effects).
 */

/**
 * ucb1Score
 * mean + c * sqrt(ln(N) / n), with N the pulls across all live candidates and n this candidate's pulls.
 * Candidates with fewer than `minPulls` observations score +Infinity (forced exploration).
 */
export function ucb1Score(mean: number, pulls: number, totalPulls: number, exploration: number, minPulls = 1): number {
  if (pulls < minPulls || pulls <= 0) return Number.POSITIVE_INFINITY
  return mean + exploration * Math.sqrt(Math.log(totalPulls) / pulls)
}

/**
 * stableArgmax
 * Index of the largest score; ties resolve to the earliest index. Returns -1 for an empty list.
 */
export function stableArgmax(scores: readonly number[]): number {
  let best = -1
  for (let i = 0; i < scores.length; i++) {
    if (best === -1 || scores[i] > scores[best]) best = i
  }
  return best
}

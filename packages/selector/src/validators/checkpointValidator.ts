/* Encodes and decodes the router checkpoint:
   {"experts": [{"id", "metadata"}], "state": {"<id>": {"pulls", "reward_sum"}}} */

import { z } from 'zod'
import { Candidate, CandidateStats, CheckpointPayload } from '@freeroute/dto'
import { ReasonedError } from '@freeroute/reasons'

const StatsSchema = z.object({
  pulls: z.number().int().min(0),
  reward_sum: z.number(),
})

export const CheckpointSchema = z.object({
  experts: z
    .array(z.object({ id: z.string(), metadata: z.record(z.unknown()).nullable().optional() }))
    .default([]),
  state: z.record(StatsSchema).default({}),
})

export function encodeCheckpoint(candidates: readonly Candidate[], state: ReadonlyMap<string, CandidateStats>): Uint8Array {
  const payload: CheckpointPayload = {
    experts: candidates.map(c => ({ id: c.id, metadata: c.metadata ?? null })),
    state: {},
  }
  for (const [id, s] of state) payload.state[id] = { pulls: s.pulls, reward_sum: s.reward_sum }
  return new TextEncoder().encode(JSON.stringify(payload))
}

/** Decoded state map; an empty blob decodes as no state. Invalid bytes raise CHECKPOINT_CORRUPT. */
export function decodeCheckpoint(raw: Uint8Array, key: string): Map<string, CandidateStats> {
  if (raw.length === 0) return new Map()
  let parsed: unknown
  try {
    parsed = JSON.parse(new TextDecoder().decode(raw))
  } catch (e) {
    throw ReasonedError.of('CHECKPOINT_CORRUPT', { context: { key } }, e)
  }
  const res = CheckpointSchema.safeParse(parsed)
  if (!res.success) {
    throw ReasonedError.of('CHECKPOINT_CORRUPT', { context: { key, issue: res.error.issues[0].message } }, res.error)
  }
  const state = new Map<string, CandidateStats>()
  for (const [id, s] of Object.entries(res.data.state)) state.set(id, { pulls: s.pulls, reward_sum: s.reward_sum })
  return state
}

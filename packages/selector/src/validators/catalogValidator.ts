/* Normalizes upstream catalog descriptors into Candidates and applies the zero-price eligibility filter.
   Descriptors may be plain mappings, Maps or objects exposing named fields; all three read the same. */

import { z } from 'zod'
import { Candidate } from '@freeroute/dto'
import { ReasonedError } from '@freeroute/reasons'

export type Pricing = {
  prompt?: number
  completion?: number
}

export const CandidateListSchema = z.array(
  z.object({
    id: z.string().min(1),
    metadata: z.record(z.unknown()).nullable().optional(),
  })
)

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

/** Reads a named member from a mapping or an object; undefined for anything else. */
export function readField(source: unknown, key: string): unknown {
  if (source === null || source === undefined) return undefined
  if (source instanceof Map) return source.get(key)
  if (typeof source === 'object' || typeof source === 'function') return Reflect.get(source, key)
  return undefined
}

/** Numeric price, or undefined when the value is not a number or a decimal string. Booleans are not prices. */
export function toPrice(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isNaN(value) ? undefined : value
  if (typeof value === 'bigint') return Number(value)
  if (typeof value === 'string') {
    const t = value.trim()
    return DECIMAL.test(t) ? Number(t) : undefined
  }
  return undefined
}

export function readPricing(descriptor: unknown): Pricing | undefined {
  const pricing = readField(descriptor, 'pricing')
  if (pricing === null || pricing === undefined) return undefined
  return {
    prompt: toPrice(readField(pricing, 'prompt')),
    completion: toPrice(readField(pricing, 'completion')),
  }
}

/** Eligible iff both prompt and completion prices resolve to numbers equal to zero. */
export function isFree(descriptor: unknown): boolean {
  const pricing = readPricing(descriptor)
  if (!pricing) return false
  if (pricing.prompt === undefined || pricing.completion === undefined) return false
  return pricing.prompt === 0 && pricing.completion === 0
}

function ownFields(source: unknown): Record<string, unknown> {
  if (source instanceof Map) {
    const out: Record<string, unknown> = {}
    for (const [k, v] of source) if (typeof k === 'string') out[k] = v
    return out
  }
  if (source !== null && typeof source === 'object') return Object.fromEntries(Object.entries(source))
  return {}
}

function candidateId(descriptor: unknown): string | undefined {
  for (const field of ['id', 'canonical_slug']) {
    const v = readField(descriptor, field)
    if (typeof v === 'string' && v.trim() !== '') return v
  }
  return undefined
}

export function toCandidate(descriptor: unknown): Candidate | undefined {
  const id = candidateId(descriptor)
  if (!id) return undefined
  const metadata = ownFields(descriptor)
  delete metadata.id
  const pricing = readPricing(descriptor)
  if (pricing) metadata.pricing = pricing
  return { id, metadata }
}

/** Accepts a bare descriptor list or a `{ data: [...] }` envelope. */
export function extractDescriptors(response: unknown): unknown[] {
  if (Array.isArray(response)) return response
  const data = readField(response, 'data')
  if (Array.isArray(data)) return data
  throw ReasonedError.of('CATALOG_INVALID_RESPONSE', { context: { type: response === null ? 'null' : typeof response } })
}

/** Eligible candidates in upstream order, first occurrence winning on duplicate ids. */
export function selectEligible(response: unknown): { fetched: number; candidates: Candidate[] } {
  const descriptors = extractDescriptors(response)
  const seen = new Set<string>()
  const candidates: Candidate[] = []
  for (const d of descriptors) {
    if (!isFree(d)) continue
    const c = toCandidate(d)
    if (!c || seen.has(c.id)) continue
    seen.add(c.id)
    candidates.push(c)
  }
  return { fetched: descriptors.length, candidates }
}

export function parseCandidateList(value: unknown): Candidate[] | undefined {
  const res = CandidateListSchema.safeParse(value)
  return res.success ? res.data : undefined
}

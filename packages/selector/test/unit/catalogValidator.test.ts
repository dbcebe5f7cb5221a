import { isFree, toPrice, toCandidate, selectEligible, extractDescriptors, parseCandidateList } from '../../src/validators/catalogValidator'
import { isReasoned } from '@freeroute/reasons'

class ModelPricing {
  constructor(readonly prompt: string, readonly completion: string) {}
}

class ModelDescriptor {
  constructor(readonly id: string, readonly pricing: ModelPricing) {}
}

describe('eligibility', () => {
  const table: Array<{ name: string; descriptor: unknown; expect: boolean }> = [
    { name: 'zero numbers', descriptor: { id: 'a', pricing: { prompt: 0, completion: 0 } }, expect: true },
    { name: 'zero strings', descriptor: { id: 'a', pricing: { prompt: '0', completion: '0.000' } }, expect: true },
    { name: 'paid prompt', descriptor: { id: 'a', pricing: { prompt: 0.001, completion: 0 } }, expect: false },
    { name: 'paid completion string', descriptor: { id: 'a', pricing: { prompt: '0', completion: '0.0002' } }, expect: false },
    { name: 'missing pricing', descriptor: { id: 'a' }, expect: false },
    { name: 'null pricing', descriptor: { id: 'a', pricing: null }, expect: false },
    { name: 'missing completion', descriptor: { id: 'a', pricing: { prompt: 0 } }, expect: false },
    { name: 'non-numeric price', descriptor: { id: 'a', pricing: { prompt: 'free', completion: '0' } }, expect: false },
    { name: 'boolean price', descriptor: { id: 'a', pricing: { prompt: false, completion: false } }, expect: false },
    { name: 'object with fields', descriptor: new ModelDescriptor('a', new ModelPricing('0', '0')), expect: true },
    { name: 'Map pricing', descriptor: { id: 'a', pricing: new Map<string, number | string>([['prompt', 0], ['completion', '0']]) }, expect: true },
    { name: 'not an object', descriptor: 'a', expect: false },
  ]
  for (const row of table) {
    it(`${row.name} -> ${row.expect}`, () => {
      expect(isFree(row.descriptor)).toBe(row.expect)
    })
  }
})

describe('toPrice', () => {
  it('parses numbers and decimal strings only', () => {
    expect(toPrice(0)).toBe(0)
    expect(toPrice(' 1e-3 ')).toBe(0.001)
    expect(toPrice('-0')).toBe(-0)
    expect(toPrice('')).toBeUndefined()
    expect(toPrice('0x0')).toBeUndefined()
    expect(toPrice(NaN)).toBeUndefined()
    expect(toPrice(null)).toBeUndefined()
    expect(toPrice(true)).toBeUndefined()
  })
})

describe('toCandidate', () => {
  it('keeps descriptor fields as metadata with normalized pricing', () => {
    expect(toCandidate({ id: 'vendor/model:free', name: 'Model', context_length: 8192, pricing: { prompt: '0', completion: '0' } })).toEqual({
      id: 'vendor/model:free',
      metadata: { name: 'Model', context_length: 8192, pricing: { prompt: 0, completion: 0 } },
    })
  })

  it('reads fields from objects', () => {
    expect(toCandidate(new ModelDescriptor('vendor/obj', new ModelPricing('0', '0')))).toEqual({
      id: 'vendor/obj',
      metadata: { pricing: { prompt: 0, completion: 0 } },
    })
  })

  it('falls back to canonical_slug and drops descriptors without an id', () => {
    expect(toCandidate({ canonical_slug: 'vendor/slug' })?.id).toBe('vendor/slug')
    expect(toCandidate({ id: '  ' })).toBeUndefined()
    expect(toCandidate({ name: 'anonymous' })).toBeUndefined()
  })
})

describe('selectEligible', () => {
  const free = (id: string) => ({ id, pricing: { prompt: '0', completion: '0' } })

  it('filters, keeps upstream order and first duplicate', () => {
    const res = selectEligible([
      free('b'),
      { id: 'paid', pricing: { prompt: '0.5', completion: '0.5' } },
      free('a'),
      { ...free('b'), name: 'second b' },
    ])
    expect(res.fetched).toBe(4)
    expect(res.candidates.map(c => c.id)).toEqual(['b', 'a'])
    expect(res.candidates[0].metadata).toEqual({ pricing: { prompt: 0, completion: 0 } })
  })

  it('accepts a { data } envelope', () => {
    expect(extractDescriptors({ data: [free('x')] })).toEqual([free('x')])
  })

  it('rejects responses without a descriptor list', () => {
    let err: unknown
    try { extractDescriptors({ models: [] }) } catch (e) { err = e }
    expect(isReasoned(err, 'CATALOG_INVALID_RESPONSE')).toBe(true)
  })
})

describe('parseCandidateList', () => {
  it('accepts cached candidate arrays and rejects anything else', () => {
    expect(parseCandidateList([{ id: 'a', metadata: null }, { id: 'b' }])).toEqual([{ id: 'a', metadata: null }, { id: 'b' }])
    expect(parseCandidateList([{ id: '' }])).toBeUndefined()
    expect(parseCandidateList('garbage')).toBeUndefined()
    expect(parseCandidateList({ id: 'a' })).toBeUndefined()
  })
})

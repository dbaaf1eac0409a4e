import { describe, it, expect } from 'vitest'
import { classify, labelStates, segmentsFromStates } from '../lib/segments.js'
import { posteriorDecode } from '../lib/posterior.js'
import { defaultModel } from '../lib/prebuilt.js'

const model = defaultModel()

describe('classify', () => {
  it('labels the sample sequence', () => {
    expect(classify(model, 'ATCGGATCGCG')).toBe('LLHHHLLHHHH')
  })

  it('returns an empty string for an empty sequence', () => {
    expect(classify(model, '')).toBe('')
  })

  it('accepts a custom label alphabet and threshold', () => {
    expect(classify(model, 'ATCGGATCGCG', { labels: { low: '-', high: '+' } })).toBe('--+++--++++')
    expect(classify(model, 'ATCGGATCGCG', { threshold: 0 })).toBe('HHHHHHHHHHH')
  })
})

describe('labelStates', () => {
  it('maps 1 to H and 0 to L', () => {
    expect(labelStates([1, 0, 0, 1])).toBe('HLLH')
    expect(labelStates([])).toBe('')
  })
})

describe('segmentsFromStates', () => {
  it('collects maximal runs of state 1 with exclusive ends', () => {
    expect(segmentsFromStates([0, 1, 1, 0, 1])).toEqual([{ start: 1, end: 3 }, { start: 4, end: 5 }])
  })

  it('handles all-low and all-high input', () => {
    expect(segmentsFromStates([0, 0, 0])).toEqual([])
    expect(segmentsFromStates([1, 1])).toEqual([{ start: 0, end: 2 }])
    expect(segmentsFromStates([])).toEqual([])
  })

  it('slices the high regions of the sample sequence', () => {
    const seq = 'ATCGGATCGCG'
    const spans = segmentsFromStates(posteriorDecode(model, seq, 0.5))
    expect(spans).toEqual([{ start: 2, end: 5 }, { start: 7, end: 11 }])
    expect(spans.map(s => seq.slice(s.start, s.end))).toEqual(['CGG', 'CGCG'])
  })
})

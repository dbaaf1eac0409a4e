import { describe, it, expect } from 'vitest'
import { encodeSequence, symbolIndex } from '../lib/symbols.js'
import { InvalidSymbolError } from '../lib/errors.js'

describe('symbolIndex', () => {
  it('maps A, C, G, T to 0..3', () => {
    expect(['A', 'C', 'G', 'T'].map(c => symbolIndex(c))).toEqual([0, 1, 2, 3])
  })

  it('falls back to the index of A for unknown characters by default', () => {
    expect(symbolIndex('N')).toBe(symbolIndex('A'))
    expect(symbolIndex('a')).toBe(0)
    expect(symbolIndex('')).toBe(0)
  })

  it('throws InvalidSymbolError under the strict policy', () => {
    expect(() => symbolIndex('N', 'strict')).toThrow(InvalidSymbolError)
    expect(() => symbolIndex('N', 'strict')).toThrow('Invalid symbol "N"')
    expect(symbolIndex('G', 'strict')).toBe(2)
  })
})

describe('encodeSequence', () => {
  it('encodes a whole sequence', () => {
    expect(encodeSequence('GATTACA')).toEqual([2, 0, 3, 3, 0, 1, 0])
    expect(encodeSequence('')).toEqual([])
  })

  it('reports the offending position in strict mode', () => {
    let caught: unknown
    try {
      encodeSequence('ACXGT', 'strict')
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(InvalidSymbolError)
    if (caught instanceof InvalidSymbolError) {
      expect(caught.symbol).toBe('X')
      expect(caught.position).toBe(2)
      expect(caught.message).toBe('Invalid symbol "X" at position 2')
    }
  })

  it('keeps the fallback for the same input in lenient mode', () => {
    expect(encodeSequence('ACXGT')).toEqual([0, 1, 0, 2, 3])
  })
})

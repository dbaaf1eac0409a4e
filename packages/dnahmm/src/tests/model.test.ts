import { describe, it, expect } from 'vitest'
import { construct } from '../lib/model.js'
import { defaultModel } from '../lib/prebuilt.js'
import { isValidModel, validateModel } from '../lib/validators.js'
import { DnaHmmError, InvalidModelError } from '../lib/errors.js'

describe('defaultModel', () => {
  it('holds the L/H preset', () => {
    const m = defaultModel()
    expect(m.transitions).toEqual([[0.6, 0.4], [0.5, 0.5]])
    expect(m.initial).toEqual([0.5, 0.5])
    expect(m.emissions).toEqual([[0.3, 0.2, 0.2, 0.3], [0.2, 0.3, 0.3, 0.2]])
  })

  it('is frozen all the way down', () => {
    const m = defaultModel()
    expect(Object.isFrozen(m)).toBe(true)
    expect(Object.isFrozen(m.transitions)).toBe(true)
    expect(Object.isFrozen(m.transitions[1])).toBe(true)
    expect(Object.isFrozen(m.initial)).toBe(true)
    expect(Object.isFrozen(m.emissions[0])).toBe(true)
  })

  it('returns a fresh instance per call', () => {
    expect(defaultModel()).not.toBe(defaultModel())
    expect(defaultModel()).toEqual(defaultModel())
  })
})

describe('construct', () => {
  it('with no arguments equals the preset', () => {
    expect(construct()).toEqual(defaultModel())
  })

  it('fills omitted arguments from the preset', () => {
    const m = construct([[0.9, 0.1], [0.2, 0.8]])
    expect(m.transitions).toEqual([[0.9, 0.1], [0.2, 0.8]])
    expect(m.initial).toEqual([0.5, 0.5])
    expect(m.emissions).toEqual(defaultModel().emissions)
  })

  it('copies its input so later mutation has no effect', () => {
    const row0 = [0.9, 0.1]
    const m = construct([row0, [0.2, 0.8]])
    row0[0] = 0
    expect(m.transitions[0][0]).toBe(0.9)
  })

  it('rejects a row that does not sum to 1', () => {
    let caught: unknown
    try {
      construct([[0.5, 0.4], [0.5, 0.5]])
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(InvalidModelError)
    expect(caught).toBeInstanceOf(DnaHmmError)
    if (caught instanceof InvalidModelError) {
      expect(caught.issues).toEqual(['transitions.0: must sum to 1'])
      expect(caught.message).toBe('Invalid HMM model: transitions.0: must sum to 1')
      expect(caught.name).toBe('InvalidModelError')
    }
  })

  it('rejects probabilities outside [0, 1]', () => {
    let caught: unknown
    try {
      construct(undefined, [1.5, -0.5])
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(InvalidModelError)
    if (caught instanceof InvalidModelError) {
      expect(caught.issues).toHaveLength(2)
      expect(caught.issues[0]!.startsWith('initial.0: ')).toBe(true)
      expect(caught.issues[1]!.startsWith('initial.1: ')).toBe(true)
    }
  })

  it('rejects wrong dimensions', () => {
    expect(() => construct(undefined, undefined, [[0.25, 0.25, 0.5], [0.25, 0.25, 0.25, 0.25]])).toThrow(InvalidModelError)
    expect(() => construct([[1], [1]])).toThrow(InvalidModelError)
    expect(() => construct(undefined, [0.2, 0.3, 0.5])).toThrow(InvalidModelError)
  })

  it('accepts rows within rounding of 1', () => {
    const m = construct(undefined, undefined, [[0.1, 0.2, 0.3, 0.4], [0.7, 0.1, 0.1, 0.1]])
    expect(m.emissions[1]).toEqual([0.7, 0.1, 0.1, 0.1])
  })
})

describe('validateModel', () => {
  it('reports the model root for a non-object', () => {
    expect(() => validateModel(42)).toThrow(/^Invalid HMM model: model: /)
  })

  it('isValidModel mirrors validateModel', () => {
    expect(isValidModel(defaultModel())).toBe(true)
    expect(isValidModel({ transitions: [[1, 0], [0, 1]], initial: [1, 0] })).toBe(false)
  })
})

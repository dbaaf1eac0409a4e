import { construct, defaultModel, type HmmModel } from 'dnahmm'

export interface ModelPreset {
  id: string
  name: string
  model: HmmModel
}

export const defaultPreset: ModelPreset = { id: 'default', name: 'L/H preset', model: defaultModel() }

/**
 * Models offered in the demo's model picker.
 * 'sticky' stays in its current state longer and separates the emissions more.
 */
export const modelPresets: ModelPreset[] = [
  defaultPreset,
  {
    id: 'sticky',
    name: 'Sticky GC-rich',
    model: construct(
      [[0.9, 0.1], [0.2, 0.8]],
      [0.6, 0.4],
      [[0.4, 0.1, 0.1, 0.4], [0.1, 0.4, 0.4, 0.1]]
    )
  }
]

export const sampleSequence = 'ATCGGATCGCG'

import {
  evaluate, evaluateLog2, evaluationProbability,
  posteriorDecode, viterbiDecode, labelStates, segmentsFromStates,
  InvalidSymbolError,
  type HiddenState, type HmmModel, type SequenceOptions, type StateSpan
} from 'dnahmm'

export type Decoder = 'posterior' | 'viterbi'

export interface Analysis {
  sequence: string
  states: HiddenState[]
  labels: string
  spans: StateSpan[]
  logLikelihood: number
  log2Likelihood: number
  probability: number
}

export type AnalysisResult =
  | { kind: 'empty' }
  | { kind: 'invalid'; message: string }
  | { kind: 'ok'; analysis: Analysis }

// The input box rejects anything outside ACGT rather than silently reading it as A
const strict: SequenceOptions = { symbolPolicy: 'strict' }

/**
 * Normalises the typed input (trim, upper-case) and runs decode + evaluation on it.
 */
export function analyzeSequence(model: HmmModel, input: string, decoder: Decoder, threshold: number): AnalysisResult {
  const sequence = input.trim().toUpperCase()
  if (!sequence) return { kind: 'empty' }

  try {
    const states = decoder === 'viterbi'
      ? viterbiDecode(model, sequence, strict)
      : posteriorDecode(model, sequence, threshold, strict)
    return {
      kind: 'ok',
      analysis: {
        sequence,
        states,
        labels: labelStates(states),
        spans: segmentsFromStates(states),
        logLikelihood: evaluate(model, sequence, strict),
        log2Likelihood: evaluateLog2(model, sequence, strict),
        probability: evaluationProbability(model, sequence, strict)
      }
    }
  } catch (err) {
    if (err instanceof InvalidSymbolError) {
      return { kind: 'invalid', message: `Only A, C, G and T are allowed (found ${JSON.stringify(err.symbol)} at position ${err.position + 1})` }
    }
    throw err
  }
}

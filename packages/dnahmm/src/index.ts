// Curated public API
export type {
  HiddenState, SymbolIndex, StatePair, EmissionRow, TransitionMatrix, EmissionMatrix, HmmModel,
  SymbolPolicy, SequenceOptions, DecodeOptions, ClassifyOptions, LabelAlphabet, ForwardTable, StateSpan
} from './lib/types.js';
export { DnaHmmError, InvalidModelError, InvalidSymbolError } from './lib/errors.js';
export { construct } from './lib/model.js';
export { defaultModel, defaultLabels, DEFAULT_THRESHOLD } from './lib/prebuilt.js';
export { validateModel, isValidModel, hmmModelSchema, ROW_SUM_TOLERANCE } from './lib/validators.js';
export { ALPHABET, symbolIndex, encodeSequence } from './lib/symbols.js';
export {
  evaluate, evaluateLog2, evaluationProbability,
  forwardScaled, backwardScaled, logLikelihoodFromTable
} from './lib/forward.js';
export { posteriorDecode, posteriorProbabilities } from './lib/posterior.js';
export { viterbiDecode } from './lib/viterbi.js';
export { classify, labelStates, segmentsFromStates } from './lib/segments.js';
export { randomSequence, seededRandom } from './lib/random.js';

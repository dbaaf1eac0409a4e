/**
 * Latent state of a sequence position. 0 is the low ("L") state, 1 the high ("H") state.
 */
export type HiddenState = 0 | 1;

/** Index of an observed symbol in the emission matrix: A=0, C=1, G=2, T=3. */
export type SymbolIndex = 0 | 1 | 2 | 3;

/** One value per hidden state. */
export type StatePair = readonly [number, number];

/** One value per observed symbol, in A, C, G, T order. */
export type EmissionRow = readonly [number, number, number, number];

export type TransitionMatrix = readonly [StatePair, StatePair];
export type EmissionMatrix = readonly [EmissionRow, EmissionRow];

/**
 * A two-state, four-symbol HMM. Instances returned by `construct` and
 * `defaultModel` are frozen and validated; treat them as read-only values.
 */
export interface HmmModel {
  /** `transitions[i][j]` = P(state j at t+1 | state i at t) */
  readonly transitions: TransitionMatrix;
  /** `initial[i]` = P(state i at t=0) */
  readonly initial: StatePair;
  /** `emissions[i][k]` = P(symbol k | state i) */
  readonly emissions: EmissionMatrix;
}

/**
 * How characters outside A/C/G/T are treated.
 * 'fallback' maps them to the index of 'A' (legacy behaviour);
 * 'strict' throws an InvalidSymbolError.
 */
export type SymbolPolicy = 'fallback' | 'strict';

export interface SequenceOptions {
  symbolPolicy?: SymbolPolicy; // defaults to 'fallback'
}

export interface DecodeOptions extends SequenceOptions {
  debug?: boolean; // print one diagnostic line per decode
}

/** Characters used for state 0 and state 1 when formatting a decode. */
export interface LabelAlphabet {
  low: string;
  high: string;
}

export interface ClassifyOptions extends DecodeOptions {
  threshold?: number; // defaults to 0.5
  labels?: LabelAlphabet;
}

/**
 * Scaled forward table. `alpha[t]` sums to 1 wherever `scales[t]` is non-zero.
 */
export interface ForwardTable {
  alpha: StatePair[];
  scales: number[];
}

// Maximal run of state-1 positions; end is exclusive so `seq.slice(start, end)` yields the run
export interface StateSpan {
  start: number;
  end: number;
}

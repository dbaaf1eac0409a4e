import type { ForwardTable, HmmModel, SequenceOptions, StatePair, SymbolIndex } from './types.js';
import { encodeSequence } from './symbols.js';

function initialStep(model: HmmModel, o: SymbolIndex): StatePair {
  const { initial, emissions } = model;
  return [initial[0] * emissions[0][o], initial[1] * emissions[1][o]];
}

function recursionStep(model: HmmModel, prev: StatePair, o: SymbolIndex): StatePair {
  const [fromLow, fromHigh] = model.transitions;
  const { emissions } = model;
  return [
    (prev[0] * fromLow[0] + prev[1] * fromHigh[0]) * emissions[0][o],
    (prev[0] * fromLow[1] + prev[1] * fromHigh[1]) * emissions[1][o]
  ];
}

/**
 * Scaled forward pass over already-encoded symbols.
 *
 * A step whose normaliser is 0 keeps its (all-zero) row and records a scale of 0.
 * Every later row is then zero as well, so nothing downstream divides by zero.
 */
export function forwardFromSymbols(model: HmmModel, obs: readonly SymbolIndex[]): ForwardTable {
  const alpha: StatePair[] = [];
  const scales: number[] = [];
  let prev: StatePair | null = null;
  for (const o of obs) {
    const raw: StatePair = prev === null ? initialStep(model, o) : recursionStep(model, prev, o);
    const s = raw[0] + raw[1];
    const row: StatePair = s === 0 ? raw : [raw[0] / s, raw[1] / s];
    alpha.push(row);
    scales.push(s);
    prev = row;
  }
  return { alpha, scales };
}

/**
 * Scaled backward pass, divided step by step by the forward scales so that
 * `alpha[t][i] * beta[t][i]` stays on the same scale at every position.
 * A zero forward scale yields a zero row instead of a division by zero.
 */
export function backwardFromSymbols(model: HmmModel, obs: readonly SymbolIndex[], scales: readonly number[]): StatePair[] {
  const n = obs.length;
  if (n === 0) return [];
  const { transitions, emissions } = model;
  let next: StatePair = [1, 1];
  const reversed: StatePair[] = [next];
  for (let t = n - 2; t >= 0; t--) {
    const o = obs[t + 1]!;
    const scale = scales[t + 1]!;
    let cur: StatePair;
    if (scale === 0) {
      cur = [0, 0];
    } else {
      const e0 = emissions[0][o];
      const e1 = emissions[1][o];
      cur = [
        (transitions[0][0] * e0 * next[0] + transitions[0][1] * e1 * next[1]) / scale,
        (transitions[1][0] * e0 * next[0] + transitions[1][1] * e1 * next[1]) / scale
      ];
    }
    reversed.push(cur);
    next = cur;
  }
  return reversed.reverse();
}

// Streams the forward recursion without keeping the table; stops at the first zero normaliser
function sumLogScales(model: HmmModel, sequence: string, options: SequenceOptions, log: (x: number) => number): number {
  const obs = encodeSequence(sequence, options.symbolPolicy);
  if (obs.length === 0) return -Infinity;
  let logp = 0;
  let prev: StatePair | null = null;
  for (const o of obs) {
    const raw: StatePair = prev === null ? initialStep(model, o) : recursionStep(model, prev, o);
    const s = raw[0] + raw[1];
    if (s === 0) return -Infinity;
    prev = [raw[0] / s, raw[1] / s];
    logp += log(s);
  }
  return logp;
}

/**
 * Natural-log likelihood of `sequence` under `model`, by the scaled forward algorithm.
 * Returns `-Infinity` for an empty sequence and for a sequence the model cannot emit.
 */
export function evaluate(model: HmmModel, sequence: string, options: SequenceOptions = {}): number {
  return sumLogScales(model, sequence, options, Math.log);
}

/** Same as `evaluate`, in base 2. */
export function evaluateLog2(model: HmmModel, sequence: string, options: SequenceOptions = {}): number {
  return sumLogScales(model, sequence, options, Math.log2);
}

/**
 * P(sequence | model) as a plain probability. Underflows to 0 for long sequences;
 * use `evaluate` when the magnitude matters.
 */
export function evaluationProbability(model: HmmModel, sequence: string, options: SequenceOptions = {}): number {
  return 2 ** evaluateLog2(model, sequence, options);
}

export function forwardScaled(model: HmmModel, sequence: string, options: SequenceOptions = {}): ForwardTable {
  return forwardFromSymbols(model, encodeSequence(sequence, options.symbolPolicy));
}

export function backwardScaled(model: HmmModel, sequence: string, scales: readonly number[], options: SequenceOptions = {}): StatePair[] {
  return backwardFromSymbols(model, encodeSequence(sequence, options.symbolPolicy), scales);
}

/**
 * Recovers the log-likelihood from a forward table: the sum of the log scales,
 * or `-Infinity` when the table is empty or contains a zero scale.
 */
export function logLikelihoodFromTable(table: ForwardTable): number {
  if (table.scales.length === 0) return -Infinity;
  let logp = 0;
  for (const s of table.scales) {
    if (s === 0) return -Infinity;
    logp += Math.log(s);
  }
  return logp;
}

import type { DecodeOptions, HiddenState, HmmModel, SequenceOptions, StatePair } from './types.js';
import { encodeSequence } from './symbols.js';
import { backwardFromSymbols, forwardFromSymbols, logLikelihoodFromTable } from './forward.js';

function posteriorHigh(a: StatePair, b: StatePair): number {
  const g0 = a[0] * b[0];
  const g1 = a[1] * b[1];
  const s = g0 + g1;
  // impossible position: no evidence for state 1
  if (s === 0) return 0;
  return g1 / s;
}

/**
 * Per-position posterior probability of state 1 (high), from the scaled
 * forward and backward tables. Positions the model cannot explain get 0.
 */
export function posteriorProbabilities(model: HmmModel, sequence: string, options: SequenceOptions = {}): number[] {
  const obs = encodeSequence(sequence, options.symbolPolicy);
  if (obs.length === 0) return [];
  const { alpha, scales } = forwardFromSymbols(model, obs);
  const beta = backwardFromSymbols(model, obs, scales);
  return alpha.map((a, t) => posteriorHigh(a, beta[t]!));
}

/**
 * Posterior (soft) decoding: position t is state 1 when P(state 1 | sequence) >= threshold.
 *
 * A threshold of 0 marks every position high; anything above 1 marks every position low.
 */
export function posteriorDecode(model: HmmModel, sequence: string, threshold: number, options: DecodeOptions = {}): HiddenState[] {
  const obs = encodeSequence(sequence, options.symbolPolicy);
  if (obs.length === 0) return [];

  const table = forwardFromSymbols(model, obs);
  const beta = backwardFromSymbols(model, obs, table.scales);
  const states = table.alpha.map((a, t): HiddenState => (posteriorHigh(a, beta[t]!) >= threshold ? 1 : 0));

  if (options.debug) {
    const high = states.reduce<number>((acc, s) => acc + s, 0);
    console.debug(`[dnahmm] posteriorDecode n=${obs.length} logLikelihood=${logLikelihoodFromTable(table)} threshold=${threshold} high=${high}`);
  }

  return states;
}

import type { HiddenState, HmmModel, SequenceOptions, StatePair } from './types.js';
import { encodeSequence } from './symbols.js';

type BackPointer = readonly [HiddenState, HiddenState];

/**
 * Most likely state path (Viterbi), scored in log2 space.
 *
 * Ties between predecessors keep the lower state index; a tie at the last
 * position resolves to state 1. Zero probabilities score as -Infinity and
 * simply never win a comparison.
 */
export function viterbiDecode(model: HmmModel, sequence: string, options: SequenceOptions = {}): HiddenState[] {
  const obs = encodeSequence(sequence, options.symbolPolicy);
  const n = obs.length;
  if (n === 0) return [];

  const { transitions, initial, emissions } = model;
  const o0 = obs[0]!;
  let v: StatePair = [
    Math.log2(initial[0]) + Math.log2(emissions[0][o0]),
    Math.log2(initial[1]) + Math.log2(emissions[1][o0])
  ];
  const back: BackPointer[] = [[0, 0]];

  for (let t = 1; t < n; t++) {
    const o = obs[t]!;
    const scores: [number, number] = [-Infinity, -Infinity];
    const from: [HiddenState, HiddenState] = [0, 0];
    for (const j of [0, 1] as const) {
      for (const i of [0, 1] as const) {
        const score = v[i] + Math.log2(transitions[i][j]) + Math.log2(emissions[j][o]);
        if (score > scores[j]) {
          scores[j] = score;
          from[j] = i;
        }
      }
    }
    v = scores;
    back.push(from);
  }

  const states: HiddenState[] = new Array<HiddenState>(n).fill(0);
  let state: HiddenState = v[0] > v[1] ? 0 : 1;
  states[n - 1] = state;
  for (let t = n - 2; t >= 0; t--) {
    state = back[t + 1]![state];
    states[t] = state;
  }
  return states;
}

import type { ClassifyOptions, HiddenState, HmmModel, LabelAlphabet, StateSpan } from './types.js';
import { DEFAULT_THRESHOLD, defaultLabels } from './prebuilt.js';
import { posteriorDecode } from './posterior.js';

export function labelStates(states: readonly HiddenState[], labels: LabelAlphabet = defaultLabels): string {
  let out = '';
  for (const s of states) out += s === 1 ? labels.high : labels.low;
  return out;
}

/**
 * Posterior-decodes `sequence` and renders it as a label string, one label per
 * position ('H' for state 1, 'L' for state 0 unless `options.labels` says otherwise).
 */
export function classify(model: HmmModel, sequence: string, options: ClassifyOptions = {}): string {
  const states = posteriorDecode(model, sequence, options.threshold ?? DEFAULT_THRESHOLD, options);
  return labelStates(states, options.labels);
}

/**
 * Maximal runs of state 1, in order. `end` is exclusive.
 */
export function segmentsFromStates(states: readonly HiddenState[]): StateSpan[] {
  const spans: StateSpan[] = [];
  let start = -1;
  states.forEach((s, t) => {
    if (s === 1 && start < 0) start = t;
    if (s === 0 && start >= 0) {
      spans.push({ start, end: t });
      start = -1;
    }
  });
  if (start >= 0) spans.push({ start, end: states.length });
  return spans;
}

/**
 * Pre-built configuration: the L/H model used for GC-rich region labelling.
 * Callers are free to construct their own model instead.
 *
 * States: 0 = L (low), 1 = H (high).
 * Transitions: L->L 0.6, L->H 0.4, H->L 0.5, H->H 0.5. Start: 0.5 / 0.5.
 * Emissions: L favours A/T (0.3 each), H favours C/G (0.3 each).
 */

import type { HmmModel, LabelAlphabet } from './types.js';
import { freezeModel } from './validators.js';

export function defaultModel(): HmmModel {
  return freezeModel({
    transitions: [
      [0.6, 0.4],
      [0.5, 0.5]
    ],
    initial: [0.5, 0.5],
    emissions: [
      [0.3, 0.2, 0.2, 0.3], // L
      [0.2, 0.3, 0.3, 0.2]  // H
    ]
  });
}

export const defaultLabels: LabelAlphabet = Object.freeze({ low: 'L', high: 'H' });

export const DEFAULT_THRESHOLD = 0.5;

import type { HmmModel } from './types.js';
import { defaultModel } from './prebuilt.js';
import { freezeModel, validateModel } from './validators.js';

type Rows = ReadonlyArray<ReadonlyArray<number>>;

/**
 * Builds a validated, frozen model. Omitted arguments take the values of
 * `defaultModel()`, so `construct()` is the preset itself.
 *
 * @param transitions 2x2 row-stochastic matrix, `transitions[i][j]` = P(j | i)
 * @param initial     start distribution over the two states
 * @param emissions   2x4 row-stochastic matrix over A, C, G, T
 * @throws InvalidModelError when a shape, range or row-sum check fails
 */
export function construct(transitions?: Rows, initial?: ReadonlyArray<number>, emissions?: Rows): HmmModel {
  const preset = defaultModel();
  const model = validateModel({
    transitions: transitions ?? preset.transitions,
    initial: initial ?? preset.initial,
    emissions: emissions ?? preset.emissions
  });
  return freezeModel(model);
}

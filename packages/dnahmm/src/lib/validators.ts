import { z } from 'zod';
import type { EmissionRow, HmmModel, StatePair } from './types.js';
import { InvalidModelError } from './errors.js';

// Rows may drift from 1 by accumulated decimal rounding, nothing more
export const ROW_SUM_TOLERANCE = 1e-6;

function sumsToOne(row: readonly number[]): boolean {
  const total = row.reduce((acc, p) => acc + p, 0);
  return Math.abs(total - 1) <= ROW_SUM_TOLERANCE;
}

const probability = z.number().finite().min(0).max(1);

export const stateRowSchema = z
  .tuple([probability, probability])
  .refine(sumsToOne, { message: 'must sum to 1' });

export const emissionRowSchema = z
  .tuple([probability, probability, probability, probability])
  .refine(sumsToOne, { message: 'must sum to 1' });

export const hmmModelSchema = z.object({
  transitions: z.tuple([stateRowSchema, stateRowSchema]),
  initial: stateRowSchema,
  emissions: z.tuple([emissionRowSchema, emissionRowSchema])
});

/**
 * Checks shape, range and row sums of a candidate model.
 * Returns a fresh plain copy on success, throws InvalidModelError otherwise.
 */
export function validateModel(candidate: unknown): HmmModel {
  const result = hmmModelSchema.safeParse(candidate);
  if (result.success) return result.data;
  const issues = result.error.issues.map(issue => {
    const where = issue.path.length > 0 ? issue.path.join('.') : 'model';
    return `${where}: ${issue.message}`;
  });
  throw new InvalidModelError(issues);
}

export function isValidModel(candidate: unknown): candidate is HmmModel {
  return hmmModelSchema.safeParse(candidate).success;
}

function freezePair(row: StatePair): StatePair {
  return Object.freeze([row[0], row[1]] as const);
}

function freezeEmissionRow(row: EmissionRow): EmissionRow {
  return Object.freeze([row[0], row[1], row[2], row[3]] as const);
}

/** Deep-copies a model into frozen tuples so no caller can mutate it afterwards. */
export function freezeModel(model: HmmModel): HmmModel {
  return Object.freeze({
    transitions: Object.freeze([freezePair(model.transitions[0]), freezePair(model.transitions[1])] as const),
    initial: freezePair(model.initial),
    emissions: Object.freeze([freezeEmissionRow(model.emissions[0]), freezeEmissionRow(model.emissions[1])] as const)
  });
}

/**
 * Errors thrown by dnahmm. Every one of them is a `DnaHmmError`, so callers can
 * separate engine failures from unrelated runtime errors with one `instanceof`.
 *
 * Impossible sequences are not errors: they evaluate to `-Infinity`.
 */

export class DnaHmmError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DnaHmmError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown by `construct` when the matrices have the wrong shape, hold values
 * outside [0, 1], or have rows that do not sum to 1.
 *
 * @example
 * ```ts
 * try {
 *   construct([[0.5, 0.4], [0.5, 0.5]]);
 * } catch (err) {
 *   if (err instanceof InvalidModelError) console.error(err.issues);
 * }
 * ```
 */
export class InvalidModelError extends DnaHmmError {
  /** One human-readable line per failed check, prefixed with the offending path. */
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid HMM model: ${issues.join('; ')}`);
    this.name = 'InvalidModelError';
    this.issues = issues;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown under the 'strict' symbol policy for a character outside A/C/G/T.
 */
export class InvalidSymbolError extends DnaHmmError {
  readonly symbol: string;
  /** Offset of the symbol in the input sequence, or -1 when mapped on its own. */
  readonly position: number;

  constructor(symbol: string, position: number) {
    super(position >= 0
      ? `Invalid symbol ${JSON.stringify(symbol)} at position ${position}`
      : `Invalid symbol ${JSON.stringify(symbol)}`);
    this.name = 'InvalidSymbolError';
    this.symbol = symbol;
    this.position = position;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

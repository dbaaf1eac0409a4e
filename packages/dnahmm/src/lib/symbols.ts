import type { SymbolIndex, SymbolPolicy } from './types.js';
import { InvalidSymbolError } from './errors.js';

export const ALPHABET = 'ACGT';

const symbolTable: Record<string, SymbolIndex> = { A: 0, C: 1, G: 2, T: 3 };

/**
 * Maps one character to its emission column. Lookup is case-sensitive.
 * Unknown characters map to 0 under the 'fallback' policy.
 */
export function symbolIndex(ch: string, policy: SymbolPolicy = 'fallback', position = -1): SymbolIndex {
  const idx = symbolTable[ch];
  if (idx !== undefined) return idx;
  if (policy === 'strict') throw new InvalidSymbolError(ch, position);
  return 0;
}

export function encodeSequence(seq: string, policy: SymbolPolicy = 'fallback'): SymbolIndex[] {
  const out: SymbolIndex[] = [];
  for (let t = 0; t < seq.length; t++) {
    out.push(symbolIndex(seq.charAt(t), policy, t));
  }
  return out;
}

import { ALPHABET } from './symbols.js';

/**
 * Uniformly random sequence over A/C/G/T. Pass a seeded `random` for reproducible output.
 */
export function randomSequence(length: number, random: () => number = Math.random): string {
  let out = '';
  for (let i = 0; i < length; i++) {
    const k = Math.min(ALPHABET.length - 1, Math.floor(random() * ALPHABET.length));
    out += ALPHABET.charAt(k);
  }
  return out;
}

/**
 * Deterministic [0, 1) source (32-bit linear congruential generator) for
 * reproducible benchmarks and tests. Not suitable for anything security related.
 */
export function seededRandom(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    s = (Math.imul(s, 1664525) + 1013904223) >>> 0;
    return s / 2 ** 32;
  };
}

/**
 * Seed hashing helpers.
 *
 * Session ids and stream names are strings; the generator wants a uint32.
 * The mixing steps are the MurmurHash3 32-bit finalizer.
 */

/**
 * Hash a string to a uint32. Same input, same output, on every engine.
 *
 * @example
 * ```ts
 * hashString('session-3'); // stable across runs
 * ```
 */
export function hashString(str: string): number {
  let h = 0;

  for (let i = 0; i < str.length; i++) {
    h = Math.imul(h ^ str.charCodeAt(i), 0x5bd1e995);
    h ^= h >>> 15;
  }

  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;

  return h >>> 0;
}

/**
 * Turn a configured seed (string or number) into a non-zero uint32.
 * Negative and fractional numbers are folded into range.
 */
export function normalizeSeed(seed: string | number): number {
  if (typeof seed === 'string') {
    return hashString(seed);
  }

  return (Math.floor(Math.abs(seed)) >>> 0) || 1;
}

/** Mix two uint32 seeds into a third; used to derive per-stream seeds. */
export function combineSeed(seed1: number, seed2: number): number {
  let combined = seed1 ^ seed2;
  combined = Math.imul(combined, 0x9e3779b9);
  combined ^= combined >>> 16;
  combined = Math.imul(combined, 0x85ebca6b);
  combined ^= combined >>> 13;

  return combined >>> 0;
}

/**
 * Mulberry32 — 32-bit state, period 2^32.
 *
 * Plenty for drawing a couple of points per episode; the point is that a
 * seed reproduces the exact sequence of targets and starting positions.
 */

export interface PrngState {
  state: number;
}

export function createPrng(seed: number): PrngState {
  return { state: seed >>> 0 };
}

/** Next uint32. Mutates `prng`. */
export function nextUint32(prng: PrngState): number {
  let z = (prng.state += 0x6d2b79f5);
  z = Math.imul(z ^ (z >>> 15), z | 1);
  z ^= z + Math.imul(z ^ (z >>> 7), z | 61);
  return (z ^ (z >>> 14)) >>> 0;
}

/** Next float in [0, 1). Mutates `prng`. */
export function nextFloat(prng: PrngState): number {
  return nextUint32(prng) / 0x100000000;
}

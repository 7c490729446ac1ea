/**
 * RngStream — one independent sequence of random numbers.
 *
 * Each bridge session and each harness run gets its own stream so that
 * episodes in one never shift the draws of another.
 */

import { createPrng, nextFloat, type PrngState } from './prng';
import { hashString, combineSeed } from './hash';

export class RngStream {
  private readonly prng: PrngState;
  private readonly originalSeed: number;

  /**
   * @param seed - uint32 seed for this stream
   * @param label - name used in log lines and fork labels
   */
  constructor(seed: number, public readonly label?: string) {
    this.originalSeed = seed >>> 0;
    this.prng = createPrng(this.originalSeed);
  }

  /** Float in [0, 1). */
  float(): number {
    return nextFloat(this.prng);
  }

  /**
   * Float in [min, max).
   *
   * @throws {Error} If the bounds are not finite or `min > max`
   */
  uniform(min: number, max: number): number {
    if (!Number.isFinite(min) || !Number.isFinite(max) || min > max) {
      throw new Error(`uniform(min, max) requires finite min <= max, got min=${min}, max=${max}`);
    }

    return min + this.float() * (max - min);
  }

  /**
   * Derive an independent child stream.
   *
   * The child depends on this stream's seed and the label only, not on how
   * many values have been drawn so far.
   *
   * @example
   * ```ts
   * const sessions = rng.stream('sessions');
   * const a = sessions.fork('a1b2');
   * ```
   */
  fork(label: string | number): RngStream {
    const labelSeed = typeof label === 'string' ? hashString(label) : label >>> 0;
    const forkedLabel = this.label ? `${this.label}/${label}` : String(label);

    return new RngStream(combineSeed(this.originalSeed, labelSeed), forkedLabel);
  }

  getSeed(): number {
    return this.originalSeed;
  }
}

/**
 * Seeded randomness for episode setup.
 *
 * A master seed yields named streams; the same seed and the same sequence of
 * episode starts always produce the same targets and starting points.
 *
 * @example
 * ```ts
 * const rng = createRng(42);
 * const points = rng.stream('points');
 * const x = points.float();
 * ```
 */

import { normalizeSeed, hashString, combineSeed } from './hash';
import { RngStream } from './streams';

export class Rng {
  private readonly masterSeed: number;
  private readonly streams = new Map<string, RngStream>();

  constructor(seed: string | number) {
    this.masterSeed = normalizeSeed(seed);
  }

  /** Get or create the stream called `name`. */
  stream(name: string): RngStream {
    let stream = this.streams.get(name);

    if (!stream) {
      stream = new RngStream(combineSeed(this.masterSeed, hashString(name)), name);
      this.streams.set(name, stream);
    }

    return stream;
  }

  getMasterSeed(): number {
    return this.masterSeed;
  }
}

export function createRng(seed: string | number): Rng {
  return new Rng(seed);
}

/** A seed for runs that did not configure one. */
export function randomSeed(): number {
  return Math.floor(Math.random() * 0xffffffff) + 1;
}

export { RngStream };
export { normalizeSeed, hashString, combineSeed } from './hash';

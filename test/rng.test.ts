/**
 * Tests for the seeded RNG used to place episode points
 */

import { createRng, combineSeed, hashString, normalizeSeed, randomSeed, RngStream } from '../src/rng';

describe('hashString', () => {
  it('should produce consistent hashes for the same string', () => {
    expect(hashString('session-1')).toBe(hashString('session-1'));
  });

  it('should produce different hashes for different strings', () => {
    expect(hashString('session-1')).not.toBe(hashString('session-2'));
  });

  it('should produce uint32 values', () => {
    const hash = hashString('points');
    expect(Number.isInteger(hash)).toBe(true);
    expect(hash).toBeGreaterThanOrEqual(0);
    expect(hash).toBeLessThanOrEqual(0xffffffff);
  });
});

describe('normalizeSeed', () => {
  it('should keep positive integers', () => {
    expect(normalizeSeed(12345)).toBe(12345);
  });

  it('should floor fractional seeds', () => {
    expect(normalizeSeed(123.9)).toBe(123);
  });

  it('should fold negative seeds', () => {
    expect(normalizeSeed(-100)).toBe(100);
  });

  it('should map zero to 1', () => {
    expect(normalizeSeed(0)).toBe(1);
  });

  it('should hash string seeds', () => {
    expect(normalizeSeed('abc')).toBe(hashString('abc'));
  });
});

describe('combineSeed', () => {
  it('should be deterministic and order-sensitive enough to separate streams', () => {
    expect(combineSeed(1, 2)).toBe(combineSeed(1, 2));
    expect(combineSeed(1, 2)).not.toBe(combineSeed(1, 3));
  });
});

describe('Rng', () => {
  it('should normalize the master seed', () => {
    expect(createRng(42).getMasterSeed()).toBe(42);
    expect(createRng('move-a-point').getMasterSeed()).toBe(hashString('move-a-point'));
  });

  it('should return the same stream instance for a name', () => {
    const rng = createRng(42);
    expect(rng.stream('points')).toBe(rng.stream('points'));
  });

  it('should reproduce sequences from the same seed', () => {
    const a = createRng(42).stream('points');
    const b = createRng(42).stream('points');
    for (let i = 0; i < 20; i++) {
      expect(a.float()).toBe(b.float());
    }
  });

  it('should give different names different sequences', () => {
    const rng = createRng(42);
    const a = rng.stream('a');
    const b = rng.stream('b');
    const seqA = Array.from({ length: 5 }, () => a.float());
    const seqB = Array.from({ length: 5 }, () => b.float());
    expect(seqA).not.toEqual(seqB);
  });
});

describe('RngStream', () => {
  it('should draw floats in [0, 1)', () => {
    const stream = new RngStream(7);
    for (let i = 0; i < 1000; i++) {
      const x = stream.float();
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });

  it('should draw uniform values in [min, max)', () => {
    const stream = new RngStream(7);
    for (let i = 0; i < 1000; i++) {
      const x = stream.uniform(-2, 3);
      expect(x).toBeGreaterThanOrEqual(-2);
      expect(x).toBeLessThan(3);
    }
  });

  it('should reject inverted or non-finite bounds', () => {
    const stream = new RngStream(7);
    expect(() => stream.uniform(1, 0)).toThrow('uniform(min, max) requires finite min <= max');
    expect(() => stream.uniform(0, Infinity)).toThrow();
  });

  it('should fork independently of how much the parent has drawn', () => {
    const fresh = new RngStream(99, 'sessions');
    const used = new RngStream(99, 'sessions');
    used.float();
    used.float();

    const a = fresh.fork('abc');
    const b = used.fork('abc');
    expect(a.getSeed()).toBe(b.getSeed());
    expect(a.float()).toBe(b.float());
    expect(a.label).toBe('sessions/abc');
  });

  it('should fork different labels into different streams', () => {
    const parent = new RngStream(99);
    expect(parent.fork('a').getSeed()).not.toBe(parent.fork('b').getSeed());
    expect(parent.fork(3).label).toBe('3');
  });
});

describe('randomSeed', () => {
  it('should return a positive uint32', () => {
    for (let i = 0; i < 100; i++) {
      const seed = randomSeed();
      expect(Number.isInteger(seed)).toBe(true);
      expect(seed).toBeGreaterThanOrEqual(1);
      expect(seed).toBeLessThanOrEqual(0xffffffff);
    }
  });
});

import { PointEnv } from '../src/env';
import { goUpPolicy, randomPolicy, runEpisode, seekTargetPolicy } from '../src/harness';
import { createRng } from '../src/rng';
import { MAX_STEPS, point, withinPrecision, type Point, type PointSampler } from '../src/sim';

function scriptedSampler(points: Point[]): PointSampler {
  let i = 0;
  return () => points[i++ % points.length];
}

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => { });
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('runEpisode', () => {
  it('should walk straight up to a target above the start', () => {
    const env = new PointEnv({ sampler: scriptedSampler([point(0.5, 0.9), point(0.5, 0.1)]) });

    const record = runEpisode(env, goUpPolicy);

    expect(record.steps).toBe(7);
    expect(record.rewards).toHaveLength(7);
    expect(record.observations).toHaveLength(8);
    expect(record.rewards[6]).toBe(MAX_STEPS - 7);
    expect(record.totalReward).toBeCloseTo(record.rewards.reduce((a, b) => a + b, 0), 12);
  });

  it('should record the starting observation first', () => {
    const env = new PointEnv({ sampler: scriptedSampler([point(0.5, 0.9), point(0.5, 0.1)]) });
    const record = runEpisode(env, goUpPolicy);

    const first = record.observations[0];
    expect(first).toEqual({ dx: 0, dy: 0.9 - 0.1 });
  });

  it('should stop once the iteration backstop is hit', () => {
    const env = new PointEnv({ sampler: scriptedSampler([point(0.5, 0.9), point(0.5, 0.1)]) });
    expect(() => runEpisode(env, goUpPolicy, { maxIterations: 3 }))
      .toThrow('Simulation ran longer than 3 steps. Stopping.');
  });

  it('should always reach the target with seekTargetPolicy', () => {
    const env = new PointEnv({ seed: 'seek' });

    for (let i = 0; i < 100; i++) {
      const record = runEpisode(env, seekTargetPolicy);
      const { current, target } = env.getState();

      expect(withinPrecision(current, target)).toBe(true);
      expect(record.steps).toBeLessThan(MAX_STEPS);
      expect(record.rewards[record.rewards.length - 1]).toBe(MAX_STEPS - record.steps);
    }
  });

  it('should reach the target with seekTargetPolicy under the absolute encoding', () => {
    const env = new PointEnv({ seed: 'seek-abs', observation: 'absolute' });
    runEpisode(env, seekTargetPolicy);

    const { current, target } = env.getState();
    expect(withinPrecision(current, target)).toBe(true);
  });

  it('should end random episodes within the step budget', () => {
    const env = new PointEnv({ seed: 'random-walk' });
    const policy = randomPolicy(createRng('policy').stream('directions'));

    for (let i = 0; i < 50; i++) {
      const record = runEpisode(env, policy);
      expect(record.steps).toBeGreaterThanOrEqual(1);
      expect(record.steps).toBeLessThanOrEqual(MAX_STEPS);
    }
    expect(env.numEpisodes).toBe(50);
  });
});

describe('policies', () => {
  it('should point seekTargetPolicy at the target', () => {
    expect(seekTargetPolicy({ dx: 0, dy: 1 }).direction_radians).toBeCloseTo(Math.PI / 2, 12);
    expect(seekTargetPolicy({ dx: -1, dy: 0 }).direction_radians).toBeCloseTo(Math.PI, 12);
  });

  it('should draw random directions in [0, 2PI)', () => {
    const policy = randomPolicy(createRng(1).stream('directions'));
    for (let i = 0; i < 200; i++) {
      const { direction_radians } = policy({ dx: 0, dy: 0 });
      expect(direction_radians).toBeGreaterThanOrEqual(0);
      expect(direction_radians).toBeLessThan(2 * Math.PI);
    }
  });
});

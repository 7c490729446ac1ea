import { getConfig, resetConfigCache } from '../src/config';
import { ConfigurationError } from '../src/errors';

const OVERRIDES = ['SIM_OBJECTIVE', 'SIM_OBSERVATION', 'SIM_SEED', 'LOG_LEVEL'] as const;

let saved: Record<string, string | undefined>;

beforeEach(() => {
  saved = {};
  for (const key of OVERRIDES) {
    saved[key] = process.env[key];
    delete process.env[key];
  }
  resetConfigCache();
  jest.spyOn(console, 'error').mockImplementation(() => { });
});

afterEach(() => {
  for (const key of OVERRIDES) {
    const value = saved[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  resetConfigCache();
  jest.restoreAllMocks();
});

describe('getConfig', () => {
  it('should return the validated defaults', () => {
    const config = getConfig();

    expect(config.environment.objective).toBe('reward_shaped');
    expect(config.environment.observation).toBe('relative');
    expect(config.environment.seed).toBe(42);
    expect(config.environment.progressInterval).toBe(100);
    expect(config.server.maxSessions).toBe(64);
    expect(config.runtime.logLevel).toBe('info');
  });

  it('should derive the arena diagonal and the per-episode reach', () => {
    const { derived } = getConfig();

    expect(derived.maxReachableDistance).toBeCloseTo(Math.SQRT2, 12);
    expect(derived.stepBudgetDistance).toBeCloseTo(2, 12);
    expect(derived.stepBudgetDistance).toBeGreaterThan(derived.maxReachableDistance);
  });

  it('should cache the config until the cache is reset', () => {
    const first = getConfig();
    expect(getConfig()).toBe(first);

    resetConfigCache();
    expect(getConfig()).not.toBe(first);
  });

  it('should deep-freeze the config', () => {
    const config = getConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.environment)).toBe(true);
    expect(Object.isFrozen(config.derived)).toBe(true);
  });

  it('should apply environment overrides', () => {
    process.env.SIM_OBJECTIVE = 'distance_penalty';
    process.env.SIM_OBSERVATION = 'absolute';
    process.env.LOG_LEVEL = 'debug';

    const config = getConfig();
    expect(config.environment.objective).toBe('distance_penalty');
    expect(config.environment.observation).toBe('absolute');
    expect(config.runtime.logLevel).toBe('debug');
  });

  it('should read numeric seeds as numbers and anything else as strings', () => {
    process.env.SIM_SEED = '1234';
    expect(getConfig().environment.seed).toBe(1234);

    resetConfigCache();
    process.env.SIM_SEED = 'nightly-run';
    expect(getConfig().environment.seed).toBe('nightly-run');
  });

  it('should fail with ConfigurationError on an unknown objective', () => {
    process.env.SIM_OBJECTIVE = 'sparse_bonus';

    expect(() => getConfig()).toThrow(ConfigurationError);
    expect(console.error).toHaveBeenCalledTimes(1);
    const report = jest.mocked(console.error).mock.calls[0][0];
    expect(report).toContain('environment.objective');
    expect(report).toContain('Received: sparse_bonus');
  });

  it('should fail on an unknown log level', () => {
    process.env.LOG_LEVEL = 'verbose';
    expect(() => getConfig()).toThrow('Configuration validation failed. See error details above.');
  });
});

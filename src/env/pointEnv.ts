/**
 * PointEnv — episode protocol over the point simulator.
 *
 * Adds what the engine leaves out: a MAX_STEPS budget on top of
 * spatial termination, the observation encoding, the reward objective and
 * an episode counter for progress logging. One instance drives one engine;
 * nothing here is shared between instances.
 */

import { z } from 'zod';
import { ConfigurationError, EpisodeNotStartedError } from '../errors';
import { createLogger, LOG_LEVELS, type Logger, type LogLevel } from '../logging';
import { createRng, randomSeed } from '../rng';
import {
  createPointSim,
  createUniformSampler,
  MAX_STEPS,
  type EpisodeState,
  type PointSampler,
  type PointSim,
} from '../sim';
import { parseAction } from './action';
import {
  encodeObservation,
  OBSERVATION_ENCODINGS,
  type Observation,
  type ObservationEncoding,
} from './observation';
import { getRewardPolicy, REWARD_OBJECTIVES, type RewardObjective, type RewardPolicy } from './reward';

// ── Options ─────────────────────────────────────────────────────────

export const EnvOptionsSchema = z.object({
  objective: z.enum(REWARD_OBJECTIVES).default('reward_shaped'),
  observation: z.enum(OBSERVATION_ENCODINGS).default('relative'),
  progressInterval: z.number().int().min(1).default(100),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  seed: z.union([z.number().int(), z.string().min(1)]).optional(),
});

export interface PointEnvOptions {
  /** Reward objective (default 'reward_shaped') */
  objective?: RewardObjective;
  /** Observation encoding (default 'relative') */
  observation?: ObservationEncoding;
  /** Log a progress line every this many episodes (default 100) */
  progressInterval?: number;
  logLevel?: LogLevel;
  /** Seed for the default uniform sampler; ignored when `sampler` is given */
  seed?: string | number;
  /** Custom point source, e.g. a scripted one in tests */
  sampler?: PointSampler;
}

// ── Protocol types ──────────────────────────────────────────────────

export interface StepResult {
  observation: Observation;
  reward: number;
  terminal: boolean;
}

/** Free-form episode parameters from the harness. Accepted, not used. */
export type EpisodeParameters = Record<string, unknown>;

// ── Environment ─────────────────────────────────────────────────────

export class PointEnv {
  readonly objective: RewardObjective;
  readonly encoding: ObservationEncoding;

  private readonly sim: PointSim;
  private readonly policy: RewardPolicy;
  private readonly progressInterval: number;
  private readonly log: Logger;
  private episodes = 0;

  constructor(options: PointEnvOptions = {}) {
    const { sampler, ...settings } = options;
    const parsed = EnvOptionsSchema.safeParse(settings);

    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Invalid environment options: ${detail}`);
    }

    const { objective, observation, progressInterval, logLevel, seed } = parsed.data;

    this.objective = objective;
    this.encoding = observation;
    this.policy = getRewardPolicy(objective);
    this.progressInterval = progressInterval;
    this.log = createLogger('PointEnv', logLevel);
    this.sim = createPointSim(
      sampler ?? createUniformSampler(createRng(seed ?? randomSeed()).stream('points')),
    );
  }

  /** Episodes started by this environment. */
  get numEpisodes(): number {
    return this.episodes;
  }

  /**
   * Reset the simulation and return the first observation.
   * `parameters` exists for harness compatibility and is ignored.
   */
  episodeStart(parameters?: EpisodeParameters): Observation {
    this.sim.reset();
    this.episodes++;

    const { initialDistance } = this.sim.getState();
    this.log.debug(
      `Episode ${this.episodes} start: distance ${initialDistance.toFixed(3)}` +
      (parameters ? ` (parameters: ${Object.keys(parameters).join(', ') || 'none'})` : '')
    );

    if (this.episodes % this.progressInterval === 0) {
      this.log.info(`${this.episodes} episodes`);
    }

    return this.observation();
  }

  /** Spatial arrival, or the step budget is spent (`steps >= MAX_STEPS`). */
  isTerminal(): boolean {
    return this.sim.isTerminal() || this.sim.getState().steps >= MAX_STEPS;
  }

  step(action: unknown): StepResult {
    const { direction_radians } = parseAction(action);

    if (!this.sim.hasEpisode()) {
      throw new EpisodeNotStartedError('step()');
    }

    const previous = this.sim.getState().current;
    this.sim.advance(direction_radians);

    const state = this.sim.getState();
    const observation = this.observation();
    const terminal = this.isTerminal();
    const reward = this.policy.reward({
      previous,
      current: state.current,
      target: state.target,
      steps: state.steps,
      terminal,
    });

    if (terminal) {
      this.reportEpisode(state);
    }

    return { observation, reward, terminal };
  }

  observation(): Observation {
    return encodeObservation(this.encoding, this.sim.getState());
  }

  getState(): EpisodeState {
    return this.sim.getState();
  }

  private reportEpisode({ initialDistance, steps }: EpisodeState): void {
    const summary = `Initial distance: ${initialDistance.toFixed(3)}. Took ${steps} steps.`;

    if (this.policy.reportsEpisodes) {
      this.log.info(summary);
    } else {
      this.log.debug(summary);
    }
  }
}

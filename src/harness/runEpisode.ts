/**
 * runEpisode — drive one episode from start to terminal with a policy.
 *
 * The environment guarantees termination within MAX_STEPS; `maxIterations`
 * is a backstop for environments configured some other way.
 */

import type { Observation, PointEnv } from '../env';
import type { Policy } from './policies';

export interface RunEpisodeOptions {
  /** Abort after this many steps (default 1000) */
  maxIterations?: number;
}

export interface EpisodeRecord {
  /** Every observation, starting with the one from episodeStart() */
  observations: Observation[];
  /** One reward per step */
  rewards: number[];
  steps: number;
  totalReward: number;
}

export function runEpisode(
  env: PointEnv,
  policy: Policy,
  options: RunEpisodeOptions = {},
): EpisodeRecord {
  const { maxIterations = 1000 } = options;

  const observations: Observation[] = [env.episodeStart()];
  const rewards: number[] = [];
  let terminal = false;

  while (!terminal) {
    if (rewards.length >= maxIterations) {
      throw new Error(`Simulation ran longer than ${maxIterations} steps. Stopping.`);
    }

    const result = env.step(policy(observations[observations.length - 1]));
    observations.push(result.observation);
    rewards.push(result.reward);
    terminal = result.terminal;
  }

  return {
    observations,
    rewards,
    steps: rewards.length,
    totalReward: rewards.reduce((sum, r) => sum + r, 0),
  };
}

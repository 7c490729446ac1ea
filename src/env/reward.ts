/**
 * Reward policies — one per objective, selected by configuration.
 *
 * Pure functions of a single transition. The adapter decides `terminal`
 * (spatial arrival or exhausted step budget) and passes it in.
 */

import { distance, MAX_STEPS, STEP_SIZE, type Point } from '../sim';

export type RewardObjective = 'reward_shaped' | 'distance_penalty' | 'prediction';

export const REWARD_OBJECTIVES = [
  'reward_shaped',
  'distance_penalty',
  'prediction',
] as const satisfies readonly RewardObjective[];

export interface RewardTransition {
  readonly previous: Point;
  readonly current: Point;
  readonly target: Point;
  /** Steps taken so far, including this one */
  readonly steps: number;
  readonly terminal: boolean;
}

export interface RewardPolicy {
  readonly objective: RewardObjective;
  /** Whether the adapter should log a summary line at info level when an episode ends */
  readonly reportsEpisodes: boolean;
  reward(transition: RewardTransition): number;
}

/**
 * Per-step shaping term. Max 1, min -3.
 *
 * Progress toward the target is normalized by STEP_SIZE into [-1, 1]. Net
 * approach is squared; no progress or retreat costs 2 * progress - 1.
 */
export function shapeReward(current: Point, previous: Point, target: Point): number {
  const progress = (distance(previous, target) - distance(current, target)) / STEP_SIZE;

  if (progress > 0) {
    return progress ** 2;
  }
  return 2 * progress - 1;
}

export const RewardShaped: RewardPolicy = {
  objective: 'reward_shaped',
  reportsEpisodes: false,
  reward({ previous, current, target, steps, terminal }) {
    // Negative once the budget is overrun; 0 at exactly MAX_STEPS.
    if (terminal) {
      return MAX_STEPS - steps;
    }
    return shapeReward(current, previous, target);
  },
};

export const DistancePenalty: RewardPolicy = {
  objective: 'distance_penalty',
  reportsEpisodes: false,
  reward({ current, target }) {
    return -distance(current, target) - 1;
  },
};

export const Prediction: RewardPolicy = {
  objective: 'prediction',
  reportsEpisodes: true,
  reward() {
    return 0;
  },
};

export const REWARD_POLICIES: Record<RewardObjective, RewardPolicy> = {
  reward_shaped: RewardShaped,
  distance_penalty: DistancePenalty,
  prediction: Prediction,
};

export function getRewardPolicy(objective: RewardObjective): RewardPolicy {
  return REWARD_POLICIES[objective];
}

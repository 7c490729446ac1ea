export {
  // Environment
  PointEnv,
  EnvOptionsSchema,
  type PointEnvOptions,
  type StepResult,
  type EpisodeParameters,
} from './pointEnv';

export {
  // Actions
  ActionSchema,
  parseAction,
  type Action,
} from './action';

export {
  // Observations
  OBSERVATION_ENCODINGS,
  encodeObservation,
  isRelativeObservation,
  targetOffset,
  type Observation,
  type ObservationEncoding,
  type ObservationByEncoding,
  type RelativeObservation,
  type AbsoluteObservation,
} from './observation';

export {
  // Rewards
  REWARD_OBJECTIVES,
  REWARD_POLICIES,
  RewardShaped,
  DistancePenalty,
  Prediction,
  shapeReward,
  getRewardPolicy,
  type RewardObjective,
  type RewardPolicy,
  type RewardTransition,
} from './reward';

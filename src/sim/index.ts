export {
  // Constants
  STEP_SIZE,
  PRECISION,
  MAX_STEPS,
  MAX_RESET_ATTEMPTS,
  ARENA_SIZE,
} from './constants';

export {
  // Types
  type Point,

  // Math
  point,
  add,
  scale,
  offset,
  distance,
  fromAngle,
} from './geometry';

export {
  // Types
  type PointSampler,
  type EpisodeState,
  type PointSim,

  // Factory
  createPointSim,
  createUniformSampler,
  withinPrecision,
} from './pointSim';

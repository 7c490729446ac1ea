/**
 * Reference policies for exercising the environment without a trained model.
 */

import type { Action, Observation } from '../env';
import { targetOffset } from '../env';
import type { RngStream } from '../rng';

export type Policy = (observation: Observation) => Action;

/** Ignores the observation and picks a uniform direction in [0, 2π). */
export function randomPolicy(stream: RngStream): Policy {
  return () => ({ direction_radians: stream.uniform(0, 2 * Math.PI) });
}

/** Always moves in +y. */
export const goUpPolicy: Policy = () => ({ direction_radians: Math.PI / 2 });

/** Heads straight for the target; works with either observation encoding. */
export const seekTargetPolicy: Policy = (observation) => {
  const { dx, dy } = targetOffset(observation);
  return { direction_radians: Math.atan2(dy, dx) };
};

/**
 * Observation encodings.
 *
 * `relative` (default) exposes only the offset to the target, so a policy
 * trained in one corner of the arena transfers to any other. `absolute`
 * exposes both points as-is.
 */

import type { EpisodeState } from '../sim';

export interface RelativeObservation {
  /** target.x - current.x */
  dx: number;
  /** target.y - current.y */
  dy: number;
}

export interface AbsoluteObservation {
  current_x: number;
  current_y: number;
  target_x: number;
  target_y: number;
}

export interface ObservationByEncoding {
  relative: RelativeObservation;
  absolute: AbsoluteObservation;
}

export type ObservationEncoding = keyof ObservationByEncoding;

export type Observation = ObservationByEncoding[ObservationEncoding];

export const OBSERVATION_ENCODINGS = ['relative', 'absolute'] as const satisfies readonly ObservationEncoding[];

type ObservationEncoder<E extends ObservationEncoding> = (state: EpisodeState) => ObservationByEncoding[E];

const ENCODERS: { [E in ObservationEncoding]: ObservationEncoder<E> } = {
  relative: ({ current, target }) => ({
    dx: target.x - current.x,
    dy: target.y - current.y,
  }),
  absolute: ({ current, target }) => ({
    current_x: current.x,
    current_y: current.y,
    target_x: target.x,
    target_y: target.y,
  }),
};

export function encodeObservation<E extends ObservationEncoding>(
  encoding: E,
  state: EpisodeState,
): ObservationByEncoding[E] {
  const encoder: ObservationEncoder<E> = ENCODERS[encoding];
  return encoder(state);
}

export function isRelativeObservation(observation: Observation): observation is RelativeObservation {
  return 'dx' in observation;
}

/** Offset from agent to target, whichever encoding produced `observation`. */
export function targetOffset(observation: Observation): { dx: number; dy: number } {
  if (isRelativeObservation(observation)) {
    return { dx: observation.dx, dy: observation.dy };
  }
  return {
    dx: observation.target_x - observation.current_x,
    dy: observation.target_y - observation.current_y,
  };
}

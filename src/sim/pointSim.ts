/**
 * PointSim — position state and dynamics for one agent chasing one target.
 *
 * Each episode:
 *   1. reset() draws a target and a start point at least PRECISION apart
 *   2. advance(direction) moves the agent STEP_SIZE toward `direction`
 *   3. isTerminal() reports whether the agent is within PRECISION of the target
 *
 * The engine knows nothing about rewards, step budgets or observations.
 */

import { InvariantViolationError, EpisodeNotStartedError } from '../errors';
import type { RngStream } from '../rng';
import { ARENA_SIZE, MAX_RESET_ATTEMPTS, PRECISION, STEP_SIZE } from './constants';
import { add, distance, fromAngle, scale, type Point } from './geometry';

// ── Types ───────────────────────────────────────────────────────────

/** Source of episode points. Called twice per draw: target first, then start. */
export type PointSampler = () => Point;

export interface EpisodeState {
  /** Agent position */
  readonly current: Point;
  /** Agent position before the latest advance (equals `current` after reset) */
  readonly previous: Point;
  /** Goal position, fixed for the episode */
  readonly target: Point;
  /** Moves since the last reset */
  readonly steps: number;
  /** distance(current, target) right after reset */
  readonly initialDistance: number;
}

export interface PointSim {
  /** Start a new episode. Throws InvariantViolationError if no valid draw is found. */
  reset(): void;
  /** Move STEP_SIZE in `directionRadians`. Any real value is accepted. */
  advance(directionRadians: number): void;
  /** Spatial termination only: distance(current, target) < PRECISION. */
  isTerminal(): boolean;
  /** Snapshot of the episode. Points are immutable, so the snapshot never changes. */
  getState(): EpisodeState;
  /** Whether reset() has run at least once. */
  hasEpisode(): boolean;
}

// ── Samplers ────────────────────────────────────────────────────────

/** Uniform points in [0, ARENA_SIZE)² drawn from `stream`. */
export function createUniformSampler(stream: RngStream): PointSampler {
  return () => ({
    x: stream.uniform(0, ARENA_SIZE),
    y: stream.uniform(0, ARENA_SIZE),
  });
}

/** Strict: a point exactly PRECISION away has not reached the target. */
export function withinPrecision(a: Point, b: Point): boolean {
  return distance(a, b) < PRECISION;
}

// ── Engine ──────────────────────────────────────────────────────────

export function createPointSim(sampler: PointSampler): PointSim {
  let state: EpisodeState | null = null;

  function requireState(operation: string): EpisodeState {
    if (state === null) {
      throw new EpisodeNotStartedError(operation);
    }
    return state;
  }

  return {
    reset(): void {
      for (let attempt = 0; attempt < MAX_RESET_ATTEMPTS; attempt++) {
        const target = sampler();
        const current = sampler();
        const separation = distance(current, target);

        if (separation > PRECISION) {
          state = {
            current,
            previous: current,
            target,
            steps: 0,
            initialDistance: separation,
          };
          return;
        }
      }

      throw new InvariantViolationError(
        `reset() found no start point farther than PRECISION=${PRECISION} from the target ` +
        `after ${MAX_RESET_ATTEMPTS} draws`
      );
    },

    advance(directionRadians: number): void {
      const prev = requireState('advance()');
      const current = add(prev.current, scale(fromAngle(directionRadians), STEP_SIZE));

      state = {
        ...prev,
        previous: prev.current,
        current,
        steps: prev.steps + 1,
      };
    },

    isTerminal(): boolean {
      const { current, target } = requireState('isTerminal()');
      return withinPrecision(current, target);
    },

    getState(): EpisodeState {
      return requireState('getState()');
    },

    hasEpisode(): boolean {
      return state !== null;
    },
  };
}

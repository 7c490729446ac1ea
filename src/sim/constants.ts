/**
 * Simulation constants.
 *
 * The farthest two points in the unit square are ~1.41 apart, and
 * MAX_STEPS * STEP_SIZE = 2.0, so a good policy always has room to arrive.
 */

/** Distance moved per step. */
export const STEP_SIZE = 0.1;

/** The target counts as reached when strictly closer than this. */
export const PRECISION = 0.15;

/** Step budget per episode. */
export const MAX_STEPS = 20;

/** Redraws allowed in reset before giving up on the separation invariant. */
export const MAX_RESET_ATTEMPTS = 1000;

/** Side of the square episode points are drawn from: [0, 1) on each axis. */
export const ARENA_SIZE = 1;

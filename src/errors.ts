/**
 * Error kinds raised by the simulator.
 *
 * Every error carries a `kind` so callers across a process boundary (the
 * HTTP bridge, a trainer) can branch without `instanceof`.
 */

export type SimErrorKind =
  | 'InvalidAction'
  | 'ConfigurationError'
  | 'InvariantViolation'
  | 'EpisodeNotStarted';

export abstract class SimError extends Error {
  abstract readonly kind: SimErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The action is missing its direction or the direction is not a finite number. */
export class InvalidActionError extends SimError {
  readonly kind = 'InvalidAction' as const;
}

/** Unknown objective, unknown observation encoding, or invalid app config. Fatal. */
export class ConfigurationError extends SimError {
  readonly kind = 'ConfigurationError' as const;
}

/** Episode setup could not reach a valid state. Signals mis-tuned constants. */
export class InvariantViolationError extends SimError {
  readonly kind = 'InvariantViolation' as const;
}

export class EpisodeNotStartedError extends SimError {
  readonly kind = 'EpisodeNotStarted' as const;

  constructor(operation: string) {
    super(`${operation} called before the first episode start`);
  }
}

export function isSimError(value: unknown): value is SimError {
  return value instanceof SimError;
}

/**
 * Session Registry — one PointEnv per bridge client.
 *
 * Call `initSessions(options)` once at server startup, then use
 * `getSessions()` from routes. Every session gets its own environment and
 * its own RNG stream forked from the master seed, so sessions never see each
 * other's episodes.
 */

import { randomUUID } from 'node:crypto';
import { PointEnv, type ObservationEncoding, type RewardObjective } from '../env';
import { createLogger, type Logger, type LogLevel } from '../logging';
import { createRng, type Rng } from '../rng';
import { createUniformSampler } from '../sim';

// ── Types ───────────────────────────────────────────────────────────

export interface SessionRegistryOptions {
  objective: RewardObjective;
  observation: ObservationEncoding;
  seed: string | number;
  progressInterval: number;
  maxSessions: number;
  logLevel: LogLevel;
}

export interface Session {
  readonly id: string;
  readonly env: PointEnv;
  readonly createdAt: Date;
}

export interface SessionRegistry {
  /** Open a session. Returns null when `maxSessions` are already open. */
  create(): Session | null;
  get(id: string): Session | undefined;
  /** Close a session. Returns false if it did not exist. */
  close(id: string): boolean;
  size(): number;
  clear(): void;
}

// ── Registry ────────────────────────────────────────────────────────

export function createSessionRegistry(
  options: SessionRegistryOptions,
  newId: () => string = randomUUID,
): SessionRegistry {
  const rng: Rng = createRng(options.seed);
  const log: Logger = createLogger('Sessions', options.logLevel);
  const sessions = new Map<string, Session>();

  return {
    create(): Session | null {
      if (sessions.size >= options.maxSessions) {
        log.warn(`Refusing new session: ${sessions.size}/${options.maxSessions} open`);
        return null;
      }

      const id = newId();
      const env = new PointEnv({
        objective: options.objective,
        observation: options.observation,
        progressInterval: options.progressInterval,
        logLevel: options.logLevel,
        sampler: createUniformSampler(rng.stream('sessions').fork(id)),
      });

      const session: Session = { id, env, createdAt: new Date() };
      sessions.set(id, session);
      log.info(`Opened ${id} (${sessions.size}/${options.maxSessions})`);

      return session;
    },

    get(id: string): Session | undefined {
      return sessions.get(id);
    },

    close(id: string): boolean {
      const session = sessions.get(id);
      if (!session) return false;

      sessions.delete(id);
      log.info(`Closed ${id} after ${session.env.numEpisodes} episodes`);
      return true;
    },

    size(): number {
      return sessions.size;
    },

    clear(): void {
      sessions.clear();
    },
  };
}

// ── Module-level singleton ──────────────────────────────────────────

let registry: SessionRegistry | null = null;

/**
 * Initialize the registry. Call once at server startup.
 * Throws if already initialized.
 */
export function initSessions(options: SessionRegistryOptions, newId?: () => string): SessionRegistry {
  if (registry !== null) {
    throw new Error('Session registry is already initialized. Restart the server to re-initialize.');
  }

  registry = createSessionRegistry(options, newId);
  return registry;
}

/** The registry, or null before initSessions(). */
export function getSessions(): SessionRegistry | null {
  return registry;
}

/**
 * Reset registry state. Intended for testing only.
 * @internal
 */
export function _resetSessionRegistry(): void {
  if (registry !== null) {
    registry.clear();
    registry = null;
  }
}

import { z } from 'zod';
import { OBSERVATION_ENCODINGS, REWARD_OBJECTIVES } from '../env';
import { LOG_LEVELS } from '../logging';

export const EnvironmentConfigSchema = z.object({
  objective: z.enum(REWARD_OBJECTIVES).describe('Reward objective for every session'),
  observation: z.enum(OBSERVATION_ENCODINGS).describe('Observation encoding for every session'),
  seed: z.union([z.number().int(), z.string().min(1)]).optional().describe('Master seed; omit for a random one'),
  progressInterval: z.number().int().min(1).describe('Episodes between progress log lines (>= 1)'),
}).strict();

export const ServerConfigSchema = z.object({
  maxSessions: z.number().int().min(1).max(10_000).describe('Concurrent bridge sessions (1-10000)'),
}).strict();

export const RuntimeConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).describe('Logging level'),
}).strict();

export const AppConfigSchema = z.object({
  environment: EnvironmentConfigSchema,
  server: ServerConfigSchema,
  runtime: RuntimeConfigSchema,
}).strict();

export type AppConfigInput = z.input<typeof AppConfigSchema>;
export type AppConfig = z.output<typeof AppConfigSchema>;

export interface DerivedConfig {
  /** Diagonal of the arena: the farthest a target can start */
  maxReachableDistance: number;
  /** MAX_STEPS * STEP_SIZE: the farthest an agent can travel in one episode */
  stepBudgetDistance: number;
}

export interface ValidatedConfig {
  environment: AppConfig['environment'];
  server: AppConfig['server'];
  runtime: AppConfig['runtime'];
  derived: DerivedConfig;
}

import type { AppConfigInput } from './schema';

export const config: AppConfigInput = {
  environment: {
    objective: 'reward_shaped',
    observation: 'relative',
    seed: 42,
    progressInterval: 100,
  },

  server: {
    maxSessions: 64,
  },

  runtime: {
    logLevel: 'info',
  },
};

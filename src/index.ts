import dotenv from 'dotenv';
import { createApp } from './app';
import { getConfig } from './config';
import { createLogger } from './logging';
import { randomSeed } from './rng';
import { initSessions } from './sessions';
import { MAX_STEPS, PRECISION, STEP_SIZE } from './sim';

dotenv.config();

const config = getConfig();
const log = createLogger('Server', config.runtime.logLevel);
const seed = config.environment.seed ?? randomSeed();

log.info('=== Move-a-Point Configuration ===');
log.info(`Objective: ${config.environment.objective}`);
log.info(`Observation: ${config.environment.observation}`);
log.info(`Seed: ${seed}${config.environment.seed === undefined ? ' (random)' : ''}`);
log.info(`Dynamics: step ${STEP_SIZE}, precision ${PRECISION}, budget ${MAX_STEPS} steps`);
log.info(`Reach: ${config.derived.stepBudgetDistance.toFixed(2)} per episode vs ${config.derived.maxReachableDistance.toFixed(2)} max separation`);
log.info(`Max Sessions: ${config.server.maxSessions}`);
log.info(`Log Level: ${config.runtime.logLevel}`);
log.info('==================================');

initSessions({
  objective: config.environment.objective,
  observation: config.environment.observation,
  seed,
  progressInterval: config.environment.progressInterval,
  maxSessions: config.server.maxSessions,
  logLevel: config.runtime.logLevel,
});

const app = createApp();
const PORT = process.env.PORT || 3001;

app.listen(PORT, () => {
  log.info(`Server is running on port ${PORT}`);
  log.info(`Health check available at http://localhost:${PORT}/api/health-check`);
});

import { config } from './config';
import { AppConfigSchema, type AppConfigInput, type ValidatedConfig, type DerivedConfig } from './schema';
import { ZodError } from 'zod';
import { ConfigurationError } from '../errors';
import { ARENA_SIZE, MAX_STEPS, STEP_SIZE } from '../sim';

let cachedConfig: ValidatedConfig | null = null;

/**
 * Environment variables that override the static config. Read at call time,
 * so dotenv must have loaded before the first getConfig(). Values stay raw
 * strings here; the schema rejects anything it does not know.
 */
function applyEnvOverrides(base: AppConfigInput, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const seed = env.SIM_SEED;

  return {
    ...base,
    environment: {
      ...base.environment,
      ...(env.SIM_OBJECTIVE !== undefined ? { objective: env.SIM_OBJECTIVE } : {}),
      ...(env.SIM_OBSERVATION !== undefined ? { observation: env.SIM_OBSERVATION } : {}),
      ...(seed !== undefined ? { seed: /^-?\d+$/.test(seed) ? Number(seed) : seed } : {}),
    },
    runtime: {
      ...base.runtime,
      ...(env.LOG_LEVEL !== undefined ? { logLevel: env.LOG_LEVEL } : {}),
    },
  };
}

function computeDerived(): DerivedConfig {
  return {
    maxReachableDistance: Math.hypot(ARENA_SIZE, ARENA_SIZE),
    stepBudgetDistance: MAX_STEPS * STEP_SIZE,
  };
}

export function formatZodError(error: ZodError): string {
  const lines = ['Configuration validation failed:', ''];

  for (const issue of error.issues) {
    const path = issue.path.join('.') || 'root';

    if (issue.code === 'invalid_type') {
      lines.push(
        `  ❌ ${path}:`,
        `     Expected: ${issue.expected}`,
        `     Received: ${issue.received}`,
        ''
      );
    } else if (issue.code === 'invalid_enum_value') {
      lines.push(
        `  ❌ ${path}:`,
        `     Expected one of: ${issue.options.join(', ')}`,
        `     Received: ${String(issue.received)}`,
        ''
      );
    } else if (issue.code === 'unrecognized_keys') {
      lines.push(
        `  ❌ ${path}:`,
        `     Unrecognized keys: ${issue.keys.join(', ')}`,
        `     (This may be a typo or unsupported field)`,
        ''
      );
    } else {
      lines.push(
        `  ❌ ${path}:`,
        `     ${issue.message}`,
        ''
      );
    }
  }

  lines.push('Please fix the configuration and restart the server.');

  return lines.join('\n');
}

function deepFreeze<T extends object>(obj: T): T {
  Object.freeze(obj);

  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return obj;
}

export function getConfig(): ValidatedConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  try {
    const validated = AppConfigSchema.parse(applyEnvOverrides(config, process.env));

    cachedConfig = deepFreeze({
      ...validated,
      derived: computeDerived(),
    });

    return cachedConfig;
  } catch (error) {
    if (error instanceof ZodError) {
      const formattedError = formatZodError(error);
      console.error(formattedError);
      throw new ConfigurationError('Configuration validation failed. See error details above.');
    }
    throw error;
  }
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

export type { AppConfig, AppConfigInput, DerivedConfig, ValidatedConfig } from './schema';

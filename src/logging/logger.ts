/**
 * Tagged console logging.
 *
 * Lines look like `[PointEnv] Initial distance: 0.523. Took 7 steps.` and go
 * through the matching console method. Messages below the configured level
 * are dropped.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

export interface Logger {
  readonly tag: string;
  readonly level: LogLevel;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const SINKS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export function createLogger(tag: string, level: LogLevel = 'info'): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  function emit(at: LogLevel, message: string, details: unknown[]): void {
    if (LOG_LEVELS.indexOf(at) < threshold) return;
    SINKS[at](`[${tag}] ${message}`, ...details);
  }

  return {
    tag,
    level,
    debug: (message, ...details) => emit('debug', message, details),
    info: (message, ...details) => emit('info', message, details),
    warn: (message, ...details) => emit('warn', message, details),
    error: (message, ...details) => emit('error', message, details),
  };
}

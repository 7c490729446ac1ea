export { type LogLevel, type Logger, LOG_LEVELS, createLogger } from './logger';

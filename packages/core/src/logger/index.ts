export type { LogDestination, Logger, LogLevel } from './logger';
export { createLogger, isLogLevel, logger, resolveLogLevel } from './logger';

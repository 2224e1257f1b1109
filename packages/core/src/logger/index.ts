export { createLogger, isLogLevel, resolveLogLevel } from './logger';
export type { Logger, LogLevel } from './logger';

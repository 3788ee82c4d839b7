export { createLogger, getRootLogger, moduleLogger } from './logger.js';
export type { Logger, LogLevel, LoggerConfig } from './logger.js';

export { config } from './config';
export type { Config, LoggingConfig, InjectorConfig } from './config';
export { logger, createComponentLogger, flushLogs } from './logger';

export { config } from './config';
export type { Config, LoggingConfig, ToolchainConfig } from './config';
export { logger, createComponentLogger, flushLogs } from './logger';
export * from './errors';

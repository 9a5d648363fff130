// Library entry point for the AWS lab provisioner
export * from './types/index.js';
export * from './errors/index.js';
export * from './config/index.js';
export * from './provisioning/index.js';
export * from './orchestration/index.js';
export { StateStore, isStateKey, stripAnsi } from './state/state-store.js';
export type { StateStoreOptions } from './state/state-store.js';
export { Logger, LOG_LEVELS, formatTimestamp } from './logging/logger.js';
export type { LogLevel, LoggerOptions, SessionDetails } from './logging/logger.js';
export { TemplateEngine, createTemplateEngine } from './templates/template-engine.js';
export type * from './templates/types.js';

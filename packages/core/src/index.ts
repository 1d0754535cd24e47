export * from './built-in-suites.js';
export * from './config-bridge.js';
export * from './constants.js';
export * from './declarations.js';
export * from './engine.js';
export * from './environment.js';
export * from './error-classifier.js';
export * from './features.js';
export * from './junit.js';
export * from './logger.js';
export * from './naming.js';
export * from './orchestrator.js';
export * from './result-parser.js';
export * from './runner-adapter.js';
export * from './schema.js';
export * from './secrets.js';
export * from './settings.js';
export * from './state-store.js';
export * from './suite-registry.js';
export type * from './types.js';

/**
 * Library entry point.
 */
export * from './charts/index.js';
export * from './config/index.js';
export * from './llm/index.js';
export * from './tools/index.js';
export * from './research/index.js';
export * from './render/index.js';
export * from './utils/errors.js';
export * from './utils/result.js';
export { createLogger, type Logger } from './utils/logger.js';

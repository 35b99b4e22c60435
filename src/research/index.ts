export * from './citations.js';
export * from './collection-loop.js';
export * from './conversation.js';
export * from './discussion.js';
export * from './manager.js';
export * from './report-generator.js';
export * from './visualization.js';

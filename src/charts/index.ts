export * from './types.js';
export * from './mermaid.js';
export * from './tools.js';

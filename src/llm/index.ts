export * from './types.js';
export * from './ollama.js';
export * from './gateway.js';

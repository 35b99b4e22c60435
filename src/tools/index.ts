export * from './definitions.js';
export * from './dispatcher.js';
export * from './handlers.js';
export * from './images.js';
export * from './search.js';
export * from './web-reader.js';
export * from './write.js';

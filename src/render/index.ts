export * from './markdown.js';
export * from './pdf.js';
export * from './report.js';

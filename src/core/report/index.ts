export * from './violation.js';
export * from './format.js';
export * from './report.js';

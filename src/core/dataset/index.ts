export * from './table.js';
export * from './loader.js';

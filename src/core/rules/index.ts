/**
 * Constraint rules barrel file.
 */
export * from './types.js';
export * from './base.js';
export * from './registry.js';
export * from './type-check.js';
export * from './range.js';
export * from './allowed.js';
export * from './pattern.js';
export * from './unique.js';

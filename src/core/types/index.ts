export * from './value-types.js';

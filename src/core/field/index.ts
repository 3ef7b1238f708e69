export * from './types.js';
export * from './field-spec.js';

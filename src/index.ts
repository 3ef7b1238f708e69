/**
 * datacontracts - declarative validation for tabular data.
 * Main library exports barrel file.
 */

// Contracts
export * from './core/contract/index.js';

// Fields and rules
export * from './core/field/index.js';
export * from './core/rules/index.js';
export * from './core/types/index.js';

// Datasets
export * from './core/dataset/index.js';

// Evaluation and reports
export * from './core/evaluator/index.js';
export * from './core/report/index.js';

// Configuration
export * from './core/config/index.js';

// Utilities
export * from './utils/index.js';

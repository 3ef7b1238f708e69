/**
 * Error types and codes.
 *
 * Two categories never mix: usage errors (a misconfigured contract, a dataset
 * that is not tabular, a broken config file) are thrown at the point of
 * misuse, while data violations are only ever surfaced together through
 * ContractViolationError.
 */
import type { ContractReport } from '../core/report/report.js';

/**
 * Base error class for all datacontracts errors.
 */
export class DataContractError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DataContractError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * A FieldSpec or Contract was declared in a way that can never validate.
 * Error codes: C001-C010
 */
export class ContractDefinitionError extends DataContractError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ContractDefinitionError';
  }
}

/**
 * The value passed to validate() is not a table.
 */
export class DatasetShapeError extends DataContractError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.INVALID_DATASET_SHAPE, message, details);
    this.name = 'DatasetShapeError';
  }
}

/**
 * The dataset broke the contract. Carries every violation found.
 */
export class ContractViolationError extends DataContractError {
  constructor(public readonly report: ContractReport) {
    super(ErrorCodes.CONTRACT_VIOLATED, report.render(), {
      violationCount: report.size,
      counts: report.countsByKind(),
    });
    this.name = 'ContractViolationError';
  }

  get violations(): ContractReport['violations'] {
    return this.report.violations;
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends DataContractError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 * Error codes: S001-S002
 */
export class SystemError extends DataContractError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Contract definition errors (C001-C009)
  EMPTY_FIELD_NAME: 'C001',
  PATTERN_REQUIRES_STRING: 'C002',
  INVALID_PATTERN: 'C003',
  BOUNDS_NOT_ORDERABLE: 'C004',
  BOUND_TYPE_MISMATCH: 'C005',
  MIN_GREATER_THAN_MAX: 'C006',
  EMPTY_ALLOWED_SET: 'C007',
  DUPLICATE_FIELD: 'C008',
  INVALID_CONTRACT: 'C009',
  UNKNOWN_TYPE: 'C010',

  // Dataset errors
  INVALID_DATASET_SHAPE: 'D001',

  // Data violations
  CONTRACT_VIOLATED: 'V001',

  // Configuration errors
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',

  // System errors (S001-S002)
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * True for errors caused by how the library was called rather than by the data.
 */
export function isUsageError(error: unknown): error is DataContractError {
  return (
    error instanceof ContractDefinitionError ||
    error instanceof DatasetShapeError ||
    error instanceof ConfigError ||
    error instanceof SystemError
  );
}

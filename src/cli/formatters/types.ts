/**
 * Formatter type definitions.
 */
import type { ContractReport } from '../../core/report/report.js';
import type { OutputFormat } from '../../core/config/schema.js';

export type { OutputFormat };

/**
 * What was validated, shown alongside the report.
 */
export interface ReportSubject {
  /** Dataset path as given on the command line */
  dataset: string;
  /** Contract name, or its path when unnamed */
  contract: string;
  rowCount: number;
  columnCount: number;
}

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Output format */
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatReport(report: ContractReport, subject: ReportSubject): string;
}

/**
 * Compact output formatter for CI logs.
 * Format: `<dataset>: <violation line>`, nothing when the data conforms.
 */
import type { ContractReport } from '../../core/report/report.js';
import type { IFormatter, ReportSubject } from './types.js';

export class CompactFormatter implements IFormatter {
  formatReport(report: ContractReport, subject: ReportSubject): string {
    return report
      .lines()
      .map((line) => `${subject.dataset}: ${line}`)
      .join('\n');
  }
}

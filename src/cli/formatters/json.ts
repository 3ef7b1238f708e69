import type { ContractReport } from '../../core/report/report.js';
import type { IFormatter, ReportSubject } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  formatReport(report: ContractReport, subject: ReportSubject): string {
    return JSON.stringify(
      {
        dataset: subject.dataset,
        contract: subject.contract,
        rows: subject.rowCount,
        columns: subject.columnCount,
        ...report.toJSON(),
      },
      null,
      2
    );
  }
}

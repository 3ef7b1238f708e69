import chalk from 'chalk';
import type { ContractReport } from '../../core/report/report.js';
import { VIOLATION_KINDS } from '../../core/report/violation.js';
import { pluralize } from '../../utils/format.js';
import type { IFormatter, FormatOptions, ReportSubject } from './types.js';

/**
 * Human-readable output formatter.
 * The report text itself is printed verbatim under a status line.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
    };
  }

  formatReport(report: ContractReport, subject: ReportSubject): string {
    const lines: string[] = [];
    const shape = `${pluralize(subject.rowCount, 'row')}, ${pluralize(subject.columnCount, 'column')}`;

    if (report.isEmpty) {
      lines.push(`${this.colorize('✓', 'green')} ${this.colorize('PASS', 'green')}: ${subject.dataset}`);
      lines.push(`   Contract: ${subject.contract} (${shape})`);
      return lines.join('\n');
    }

    lines.push(`${this.colorize('✗', 'red')} ${this.colorize('FAIL', 'red')}: ${subject.dataset}`);
    lines.push(`   Contract: ${subject.contract} (${shape})`);
    lines.push('');

    const [header, ...violationLines] = report.render().split('\n');
    lines.push(this.colorize(header ?? '', 'red'));
    lines.push(...violationLines);

    lines.push('');
    lines.push(this.formatCounts(report));
    return lines.join('\n');
  }

  private formatCounts(report: ContractReport): string {
    const counts = report.countsByKind();
    const parts = VIOLATION_KINDS.filter((kind) => counts[kind] > 0).map((kind) => `${kind}: ${counts[kind]}`);
    return this.colorize(`By kind: ${parts.join(', ')}`, 'dim');
  }

  private colorize(text: string, color: 'red' | 'green' | 'dim'): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}

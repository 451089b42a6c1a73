import type { OutputFormat } from '../../config/lint-config';
import type { LintReport } from './report';
import { renderJSON, renderYAML } from './serialize';
import { renderTable, type TableOptions } from './table';

export * from './report';
export * from './serialize';
export * from './table';

export function renderReport(format: OutputFormat, report: LintReport, options: TableOptions = {}): string {
  switch (format) {
    case 'json':
      return renderJSON(report);
    case 'yaml':
      return renderYAML(report);
    case 'table':
      return renderTable(report, options);
  }
}

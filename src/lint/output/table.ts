/**
 * Plain-text table rendering of a lint report.
 *
 * One row per condition, sorted by canonical group, kind, impact (blocking
 * first) and check name.
 */

import { CANONICAL_GROUP_ORDER } from '../check/constants';
import { hasVerboseFormatter, type CheckExecution } from '../check/types';
import { DefaultVerboseFormatter } from '../check/verbose-formatter';
import { Impact } from '../result/diagnostic-result';
import { getVerdict, type LintReport } from './report';

export interface TableOptions {
  /** List impacted objects after the summary */
  verbose?: boolean;
  namespaceRequesters?: ReadonlyMap<string, string>;
}

const HEADERS = ['STATUS', 'GROUP', 'KIND', 'CHECK', 'IMPACT', 'MESSAGE'] as const;

const STATUS_LABEL: Record<Impact, string> = {
  [Impact.Blocking]: 'FAIL',
  [Impact.Advisory]: 'WARN',
  [Impact.None]: 'PASS',
};

const IMPACT_SORT: Record<Impact, number> = {
  [Impact.Blocking]: 0,
  [Impact.Advisory]: 1,
  [Impact.None]: 2,
};

export interface TableRow {
  group: string;
  kind: string;
  check: string;
  impact: Impact;
  message: string;
}

function groupPriority(group: string): number {
  const index = CANONICAL_GROUP_ORDER.findIndex(g => g === group);
  return index === -1 ? CANONICAL_GROUP_ORDER.length : index;
}

export function collectSortedRows(executions: CheckExecution[]): TableRow[] {
  const rows: TableRow[] = [];
  for (const execution of executions) {
    for (const condition of execution.result.status.conditions) {
      rows.push({
        group: execution.result.group,
        kind: execution.result.kind,
        check: execution.result.name,
        impact: condition.impact,
        message: condition.message,
      });
    }
  }

  return rows.sort((a, b) => {
    const byGroup = groupPriority(a.group) - groupPriority(b.group);
    if (byGroup !== 0) {
      return byGroup;
    }
    if (a.kind !== b.kind) {
      return a.kind < b.kind ? -1 : 1;
    }
    const byImpact = IMPACT_SORT[a.impact] - IMPACT_SORT[b.impact];
    if (byImpact !== 0) {
      return byImpact;
    }
    if (a.check === b.check) {
      return 0;
    }
    return a.check < b.check ? -1 : 1;
  });
}

function formatLine(cells: readonly string[], widths: number[]): string {
  return cells
    .map((cell, i) => (i === cells.length - 1 ? cell : cell.padEnd(widths[i])))
    .join('  ')
    .trimEnd();
}

function renderImpactedObjects(out: string[], executions: CheckExecution[], options: TableOptions): void {
  const defaultFormatter = new DefaultVerboseFormatter({ namespaceRequesters: options.namespaceRequesters });
  let printed = false;

  for (const execution of executions) {
    if (!execution.result.impactedObjects || execution.result.impactedObjects.length === 0) {
      continue;
    }

    out.push('');
    if (!printed) {
      out.push('Impacted Objects:');
      printed = true;
    }

    const { group, kind, name } = execution.result;
    out.push(`  ${group} / ${kind} / ${name}:`);

    const formatter = hasVerboseFormatter(execution.check) ? execution.check : defaultFormatter;
    formatter.formatVerboseOutput(out, execution.result);
  }
}

export function renderTable(report: LintReport, options: TableOptions = {}): string {
  const out: string[] = [];

  if (report.clusterVersion !== undefined || report.targetVersion !== undefined) {
    out.push(`Current version: ${report.clusterVersion ?? 'unknown'}`);
    out.push(`Target version:  ${report.targetVersion ?? 'unknown'}`);
    out.push('');
  }

  const rows = collectSortedRows(report.executions);
  const cells = rows.map(r => [STATUS_LABEL[r.impact], r.group, r.kind, r.check, r.impact, r.message]);
  const widths = HEADERS.map((h, i) => Math.max(h.length, ...cells.map(c => c[i].length)));

  out.push(formatLine(HEADERS, widths));
  for (const row of cells) {
    out.push(formatLine(row, widths));
  }

  const passed = rows.filter(r => r.impact === Impact.None).length;
  const warnings = rows.filter(r => r.impact === Impact.Advisory).length;
  const failed = rows.filter(r => r.impact === Impact.Blocking).length;

  out.push('');
  out.push('Summary:');
  out.push(`  Total: ${rows.length} | Passed: ${passed} | Warnings: ${warnings} | Failed: ${failed}`);
  out.push(`  Verdict: ${getVerdict(report.executions)}`);

  if (options.verbose) {
    renderImpactedObjects(out, report.executions, options);
  }

  return out.join('\n') + '\n';
}

import * as yaml from 'yaml';
import type { DiagnosticResultJSON } from '../result/diagnostic-result';
import { getVerdict, type LintReport, type Verdict } from './report';

export interface DiagnosticResultList {
  kind: 'DiagnosticResultList';
  metadata: {
    clusterVersion?: string;
    targetVersion?: string;
  };
  verdict: Verdict;
  results: DiagnosticResultJSON[];
}

/**
 * Results in execution order, wrapped with version metadata. Unknown
 * versions are omitted.
 */
export function toResultList(report: LintReport): DiagnosticResultList {
  const metadata: DiagnosticResultList['metadata'] = {};
  if (report.clusterVersion !== undefined) {
    metadata.clusterVersion = report.clusterVersion;
  }
  if (report.targetVersion !== undefined) {
    metadata.targetVersion = report.targetVersion;
  }

  return {
    kind: 'DiagnosticResultList',
    metadata,
    verdict: getVerdict(report.executions),
    results: report.executions.map(e => e.result.toJSON()),
  };
}

export function renderJSON(report: LintReport): string {
  return JSON.stringify(toResultList(report), null, 2) + '\n';
}

export function renderYAML(report: LintReport): string {
  return yaml.stringify(toResultList(report));
}

/**
 * Report assembly: canonical ordering of per-group executions and the
 * upgrade verdict derived from condition impacts.
 */

import { CANONICAL_GROUP_ORDER, type CheckGroup } from '../check/constants';
import type { CheckExecution } from '../check/types';
import { Impact, compareImpact } from '../result/diagnostic-result';

export type Verdict = 'blocking' | 'advisory' | 'ready';

export interface LintReport {
  /** Version the cluster runs; undefined when it could not be detected */
  clusterVersion?: string;
  targetVersion?: string;
  executions: CheckExecution[];
}

/**
 * Concatenate per-group executions in canonical group order. Groups missing
 * from the map contribute nothing.
 */
export function flattenResults(byGroup: ReadonlyMap<CheckGroup, CheckExecution[]>): CheckExecution[] {
  const flat: CheckExecution[] = [];
  for (const group of CANONICAL_GROUP_ORDER) {
    flat.push(...(byGroup.get(group) ?? []));
  }
  return flat;
}

/**
 * Highest impact across every condition of every execution.
 */
export function highestImpact(executions: CheckExecution[]): Impact {
  let highest = Impact.None;
  for (const execution of executions) {
    const impact = execution.result.getImpact();
    if (impact !== undefined && compareImpact(impact, highest) > 0) {
      highest = impact;
    }
  }
  return highest;
}

export function getVerdict(executions: CheckExecution[]): Verdict {
  switch (highestImpact(executions)) {
    case Impact.Blocking:
      return 'blocking';
    case Impact.Advisory:
      return 'advisory';
    case Impact.None:
      return 'ready';
  }
}

export function countFailedExecutions(executions: CheckExecution[]): number {
  return executions.filter(e => e.error !== undefined).length;
}

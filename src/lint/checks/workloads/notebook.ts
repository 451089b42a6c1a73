import type { ObjectMetadata } from '../../../kube/objects';
import { Notebook } from '../../../kube/resource-types';
import { isUpgradeFrom2xTo3x } from '../../../version/version';
import { BaseCheck } from '../../check/base-check';
import { newCondition, withImpact, withMessage, withReason, withRemediation } from '../../check/condition';
import { CheckGroup, CheckType, Reason } from '../../check/constants';
import type { Target } from '../../check/types';
import { ConditionStatus, Impact, type Condition, type DiagnosticResult } from '../../result/diagnostic-result';
import { workloadsMetadata, type WorkloadRequest } from '../../validate/workload';

export const CONDITION_RUNNING_WORKLOADS = 'RunningWorkloads';

/** Set by the notebook controller on stopped Notebooks. */
export const ANNOTATION_RESOURCE_STOPPED = 'kubeflow-resource-stopped';

export function isRunning(nb: ObjectMetadata): boolean {
  return nb.metadata.annotations?.[ANNOTATION_RESOURCE_STOPPED] === undefined;
}

/**
 * Notebooks still running when the upgrade starts are restarted by it.
 */
export class NotebookImpactedWorkloadsCheck extends BaseCheck {
  constructor() {
    super({
      group: CheckGroup.Workload,
      kind: 'notebook',
      type: CheckType.ImpactedWorkloads,
      id: 'workloads.notebook.impacted-workloads',
      name: 'Workloads :: Notebook :: Impacted Workloads',
      description: 'Detects Notebooks that are currently running (not stopped) and will be restarted by the upgrade',
      remediation: 'Save all pending work in running Notebooks, then stop them before upgrading',
    });
  }

  async canApply(target: Target): Promise<boolean> {
    return isUpgradeFrom2xTo3x(target.currentVersion, target.targetVersion);
  }

  validate(target: Target, signal: AbortSignal): Promise<DiagnosticResult> {
    return workloadsMetadata(this, target, Notebook)
      .forComponent('workbenches')
      .filter(isRunning)
      .complete(signal, req => this.conditionsFor(req));
  }

  private conditionsFor(req: WorkloadRequest<ObjectMetadata>): Condition[] {
    const count = req.items.length;

    if (count === 0) {
      return [
        newCondition(
          CONDITION_RUNNING_WORKLOADS,
          ConditionStatus.True,
          withReason(Reason.RequirementsMet),
          withMessage('All Notebooks are stopped')
        ),
      ];
    }

    const options = [
      withReason(Reason.WorkloadsImpacted),
      withMessage(`Found ${count} running Notebook(s) that will be restarted during the upgrade`),
      withImpact(Impact.Advisory),
    ];
    if (this.remediation) {
      options.push(withRemediation(this.remediation));
    }
    return [newCondition(CONDITION_RUNNING_WORKLOADS, ConditionStatus.False, ...options)];
  }
}

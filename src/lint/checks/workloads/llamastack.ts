import { getDataScienceCluster, hasManagementState } from '../../../kube/cluster';
import type { KubeObject } from '../../../kube/objects';
import { LlamaStackDistribution, apiVersionOf } from '../../../kube/resource-types';
import { isUpgradeFrom2xTo3x } from '../../../version/version';
import { BaseCheck } from '../../check/base-check';
import { newCondition, withImpact, withMessage, withReason, withRemediation } from '../../check/condition';
import { CheckGroup, CheckType, ManagementState, Reason } from '../../check/constants';
import type { Target, VerboseOutputFormatter } from '../../check/types';
import { ConditionStatus, Impact, type DiagnosticResult } from '../../result/diagnostic-result';
import { workloads, type WorkloadRequest } from '../../validate/workload';

export const CONDITION_REQUIRES_RECREATION = 'RequiresRecreation';
export const ANNOTATION_UPGRADE_ACTION = 'upgrade.opendatahub.io/action';

const REASON_ARCHITECTURAL_INCOMPATIBILITY = 'ArchitecturalIncompatibility';

/**
 * Every LlamaStackDistribution must be deleted and recreated across the 3.x
 * upgrade; in-place upgrade is not supported.
 */
export class LlamaStackConfigCheck extends BaseCheck implements VerboseOutputFormatter {
  constructor() {
    super({
      group: CheckGroup.Workload,
      kind: 'llamastackdistribution',
      type: CheckType.Config,
      id: 'workloads.llamastack.config',
      name: 'Workloads :: LlamaStack :: Upgrade Preparation (2.x to 3.x)',
      description: 'Identifies LlamaStackDistribution resources that require deletion and recreation for the 3.x upgrade',
      remediation:
        'Back up LlamaStackDistribution configurations, coordinate with their owners, then delete and recreate them after the upgrade',
    });
  }

  async canApply(target: Target): Promise<boolean> {
    if (!isUpgradeFrom2xTo3x(target.currentVersion, target.targetVersion)) {
      return false;
    }
    const dsc = await getDataScienceCluster(target.client);
    return hasManagementState(dsc, 'llamastackoperator', ManagementState.Managed);
  }

  validate(target: Target, signal: AbortSignal): Promise<DiagnosticResult> {
    return workloads(this, target, LlamaStackDistribution).run(signal, req => this.validateDistributions(req));
  }

  formatVerboseOutput(out: string[], result: DiagnosticResult): void {
    for (const obj of result.impactedObjects ?? []) {
      const action = obj.annotations?.[ANNOTATION_UPGRADE_ACTION] ?? 'review';
      out.push(`    - ${obj.namespace ?? ''}/${obj.name} [${action}]`);
    }
  }

  private validateDistributions(req: WorkloadRequest<KubeObject>): void {
    const count = req.items.length;

    if (count === 0) {
      req.result.setCondition(
        newCondition(
          CONDITION_REQUIRES_RECREATION,
          ConditionStatus.True,
          withReason(Reason.ResourceNotFound),
          withMessage('No LlamaStackDistribution resources found - upgrade can proceed without LlamaStack-specific actions')
        )
      );
      return;
    }

    const options = [
      withReason(REASON_ARCHITECTURAL_INCOMPATIBILITY),
      withMessage(
        `Found ${count} LlamaStackDistribution(s) that must be deleted and recreated after the upgrade. All data will be lost; archive it before upgrading.`
      ),
      withImpact(Impact.Blocking),
    ];
    if (this.remediation) {
      options.push(withRemediation(this.remediation));
    }
    req.result.setCondition(newCondition(CONDITION_REQUIRES_RECREATION, ConditionStatus.False, ...options));

    req.result.impactedObjects = req.items.map(llsd => ({
      apiVersion: apiVersionOf(LlamaStackDistribution),
      kind: LlamaStackDistribution.kind,
      namespace: llsd.metadata.namespace,
      name: llsd.metadata.name,
      annotations: { [ANNOTATION_UPGRADE_ACTION]: 'requires-recreation' },
    }));
  }
}

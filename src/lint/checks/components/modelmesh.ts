import { BaseCheck } from '../../check/base-check';
import { CheckGroup, CheckType, ManagementState } from '../../check/constants';
import type { Target } from '../../check/types';
import type { DiagnosticResult } from '../../result/diagnostic-result';
import { setCompatibilityFailure, setCompatibilitySuccess } from '../../result/results';
import { validateComponent } from '../../validate/component';
import { isUpgradeFrom2xTo3x } from '../../../version/version';

const ENABLED_STATES: readonly string[] = [ManagementState.Managed, ManagementState.Unmanaged];

export class ModelMeshRemovalCheck extends BaseCheck {
  constructor() {
    super({
      group: CheckGroup.Component,
      kind: 'modelmeshserving',
      type: CheckType.Removal,
      id: 'components.modelmesh.removal',
      name: 'Components :: ModelMesh :: Removal (3.x)',
      description: 'Validates that ModelMesh is disabled before upgrading from 2.x to 3.x (component will be removed)',
      remediation:
        'Migrate ModelMesh InferenceServices to single-model serving, then set spec.components.modelmeshserving.managementState to Removed',
    });
  }

  async canApply(target: Target): Promise<boolean> {
    return isUpgradeFrom2xTo3x(target.currentVersion, target.targetVersion);
  }

  validate(target: Target, signal: AbortSignal): Promise<DiagnosticResult> {
    return validateComponent(this, 'modelmeshserving', target).run(signal, req => {
      if (ENABLED_STATES.includes(req.managementState)) {
        setCompatibilityFailure(
          req.result,
          `ModelMesh is enabled (state: ${req.managementState}) but will be removed in 3.x`,
          this.remediation
        );
        return;
      }
      setCompatibilitySuccess(req.result, `ModelMesh is disabled (state: ${req.managementState}) - ready for 3.x upgrade`);
    });
  }
}

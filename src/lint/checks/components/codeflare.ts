import { BaseCheck } from '../../check/base-check';
import { CheckGroup, CheckType, ManagementState } from '../../check/constants';
import type { Target } from '../../check/types';
import type { DiagnosticResult } from '../../result/diagnostic-result';
import { setCompatibilityFailure, setCompatibilitySuccess } from '../../result/results';
import { validateComponent } from '../../validate/component';
import { isUpgradeFrom2xTo3x } from '../../../version/version';

/**
 * CodeFlare is removed in 3.x and must be disabled before upgrading.
 */
export class CodeFlareRemovalCheck extends BaseCheck {
  constructor() {
    super({
      group: CheckGroup.Component,
      kind: 'codeflare',
      type: CheckType.Removal,
      id: 'components.codeflare.removal',
      name: 'Components :: CodeFlare :: Removal (3.x)',
      description: 'Validates that CodeFlare is disabled before upgrading from 2.x to 3.x (component will be removed)',
      remediation: 'Set spec.components.codeflare.managementState to Removed in the DataScienceCluster',
    });
  }

  async canApply(target: Target): Promise<boolean> {
    return isUpgradeFrom2xTo3x(target.currentVersion, target.targetVersion);
  }

  validate(target: Target, signal: AbortSignal): Promise<DiagnosticResult> {
    return validateComponent(this, 'codeflare', target).run(signal, req => {
      // Unmanaged is not supported for this component, only Managed blocks
      if (req.managementState === ManagementState.Managed) {
        setCompatibilityFailure(
          req.result,
          `CodeFlare is enabled (state: ${req.managementState}) but will be removed in 3.x`,
          this.remediation
        );
        return;
      }
      setCompatibilitySuccess(req.result, `CodeFlare is disabled (state: ${req.managementState}) - ready for 3.x upgrade`);
    });
  }
}

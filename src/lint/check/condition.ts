/**
 * Condition construction helpers.
 *
 * ```ts
 * newCondition(ConditionType.Compatible, ConditionStatus.False,
 *   withReason(Reason.VersionIncompatible),
 *   withMessage(`CodeFlare is enabled (state: ${state})`),
 *   withRemediation('Set spec.components.codeflare.managementState to Removed'));
 * ```
 */

import { ConditionStatus, Impact, type Condition } from '../result/diagnostic-result';

export type ConditionOption = (condition: Condition) => void;

export function withReason(reason: string): ConditionOption {
  return condition => {
    condition.reason = reason;
  };
}

export function withMessage(message: string): ConditionOption {
  return condition => {
    condition.message = message;
  };
}

export function withImpact(impact: Impact): ConditionOption {
  return condition => {
    condition.impact = impact;
  };
}

export function withRemediation(remediation: string): ConditionOption {
  return condition => {
    condition.remediation = remediation;
  };
}

/**
 * Impact a condition gets when none is given: False blocks, Unknown advises,
 * True has none.
 */
export function defaultImpact(status: ConditionStatus): Impact {
  switch (status) {
    case ConditionStatus.False:
      return Impact.Blocking;
    case ConditionStatus.Unknown:
      return Impact.Advisory;
    case ConditionStatus.True:
      return Impact.None;
  }
}

export function newCondition(type: string, status: ConditionStatus, ...options: ConditionOption[]): Condition {
  const condition: Condition = {
    type,
    status,
    reason: '',
    message: '',
    lastTransitionTime: new Date().toISOString(),
    impact: defaultImpact(status),
  };

  for (const option of options) {
    option(condition);
  }

  return condition;
}

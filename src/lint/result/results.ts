/**
 * Standard outcomes shared by many checks.
 */

import { newResultFor } from '../check/base-check';
import { newCondition, withImpact, withMessage, withReason, withRemediation } from '../check/condition';
import { ConditionType, Reason } from '../check/constants';
import type { Check } from '../check/types';
import { ConditionStatus, Impact, type DiagnosticResult } from './diagnostic-result';

/**
 * Result for a cluster without a DataScienceCluster. Not an error: there is
 * nothing for the check to assess.
 */
export function dataScienceClusterNotFound(check: Check): DiagnosticResult {
  const dr = newResultFor(check);
  dr.setCondition(
    newCondition(
      ConditionType.Available,
      ConditionStatus.False,
      withReason(Reason.ResourceNotFound),
      withMessage('No DataScienceCluster found'),
      withImpact(Impact.Advisory)
    )
  );
  return dr;
}

export function setComponentNotConfigured(dr: DiagnosticResult, componentName: string): void {
  dr.setCondition(
    newCondition(
      ConditionType.Configured,
      ConditionStatus.False,
      withReason(Reason.ComponentNotConfigured),
      withMessage(`Component ${componentName} is not in a state this check applies to`),
      withImpact(Impact.None)
    )
  );
}

export function setCompatibilitySuccess(dr: DiagnosticResult, message: string): void {
  dr.setCondition(
    newCondition(
      ConditionType.Compatible,
      ConditionStatus.True,
      withReason(Reason.VersionCompatible),
      withMessage(message)
    )
  );
}

/**
 * Blocking incompatibility. `remediation` is attached when given.
 */
export function setCompatibilityFailure(dr: DiagnosticResult, message: string, remediation?: string): void {
  const options = [withReason(Reason.VersionIncompatible), withMessage(message)];
  if (remediation) {
    options.push(withRemediation(remediation));
  }
  dr.setCondition(newCondition(ConditionType.Compatible, ConditionStatus.False, ...options));
}

/**
 * Shared vocabulary for checks: groups, selectors, condition types,
 * reasons and annotation keys.
 */

export enum CheckGroup {
  Component = 'component',
  Service = 'service',
  Workload = 'workload',
  Dependency = 'dependency',
}

/**
 * Reporting order: dependencies → services → components → workloads
 */
export const CANONICAL_GROUP_ORDER: readonly CheckGroup[] = [
  CheckGroup.Dependency,
  CheckGroup.Service,
  CheckGroup.Component,
  CheckGroup.Workload,
];

/**
 * Plural selector shortcuts accepted wherever a pattern is.
 */
export const GROUP_SELECTORS: ReadonlyMap<string, CheckGroup> = new Map([
  ['components', CheckGroup.Component],
  ['services', CheckGroup.Service],
  ['workloads', CheckGroup.Workload],
  ['dependencies', CheckGroup.Dependency],
]);

export const ManagementState = {
  Managed: 'Managed',
  Unmanaged: 'Unmanaged',
  Removed: 'Removed',
} as const;

export const ConditionType = {
  Validated: 'Validated',
  Available: 'Available',
  Compatible: 'Compatible',
  Configured: 'Configured',
} as const;

export const Reason = {
  // Execution outcomes synthesized by the executor
  CheckExecutionFailed: 'CheckExecutionFailed',
  APIAccessDenied: 'APIAccessDenied',
  RequestTimeout: 'RequestTimeout',
  APIUnavailable: 'APIUnavailable',
  InvalidResult: 'InvalidResult',

  // Resource presence
  ResourceNotFound: 'ResourceNotFound',

  // Requirements
  RequirementsMet: 'RequirementsMet',
  ComponentNotConfigured: 'ComponentNotConfigured',

  // Version compatibility
  VersionCompatible: 'VersionCompatible',
  VersionIncompatible: 'VersionIncompatible',

  // Workloads
  WorkloadsImpacted: 'WorkloadsImpacted',
} as const;

export const Annotation = {
  ComponentManagementState: 'component.opendatahub.io/management-state',
  CheckTargetVersion: 'check.opendatahub.io/target-version',
  ImpactedWorkloadCount: 'workload.opendatahub.io/impacted-count',
} as const;

export const CheckType = {
  Removal: 'removal',
  ImpactedWorkloads: 'impacted-workloads',
  Config: 'config',
} as const;

import {
  BaseCheck,
  CheckGroup,
  ConditionStatus,
  DataScienceCluster,
  DSCInitialization,
  Namespace,
  apiVersionOf,
  newCondition,
  newResultFor,
  parseVersion,
  withReason,
  type DiagnosticResult,
  type KubeObject,
  type ResourceType,
  type Target,
} from '../../src';
import type { FakeReader } from './fake-reader';

export function newTarget(client: FakeReader, currentVersion = '2.25.0', targetVersion = '3.0.0'): Target {
  return {
    client,
    currentVersion: currentVersion ? parseVersion(currentVersion) : undefined,
    targetVersion: targetVersion ? parseVersion(targetVersion) : undefined,
  };
}

/**
 * DataScienceCluster with `spec.components.<name>.managementState` per entry.
 */
export function newDSC(components: Record<string, string>, releaseVersion?: string): KubeObject {
  const spec: Record<string, unknown> = {};
  for (const [name, state] of Object.entries(components)) {
    spec[name] = { managementState: state };
  }
  const dsc: KubeObject = {
    apiVersion: apiVersionOf(DataScienceCluster),
    kind: DataScienceCluster.kind,
    metadata: { name: 'default-dsc' },
    spec: { components: spec },
  };
  if (releaseVersion !== undefined) {
    dsc.status = { release: { version: releaseVersion } };
  }
  return dsc;
}

export function newDSCI(applicationsNamespace?: string): KubeObject {
  return {
    apiVersion: apiVersionOf(DSCInitialization),
    kind: DSCInitialization.kind,
    metadata: { name: 'default-dsci' },
    spec: applicationsNamespace === undefined ? {} : { applicationsNamespace },
  };
}

export function newObject(
  resourceType: ResourceType,
  namespace: string,
  name: string,
  annotations?: Record<string, string>
): KubeObject {
  return {
    apiVersion: apiVersionOf(resourceType),
    kind: resourceType.kind,
    metadata: annotations ? { name, namespace, annotations } : { name, namespace },
  };
}

export function newNamespace(name: string, annotations?: Record<string, string>): KubeObject {
  return {
    apiVersion: apiVersionOf(Namespace),
    kind: Namespace.kind,
    metadata: annotations ? { name, annotations } : { name },
  };
}

export interface StubBehaviour {
  canApply?: (target: Target) => Promise<boolean>;
  validate?: (target: Target, signal: AbortSignal) => Promise<DiagnosticResult>;
}

/**
 * Check whose behaviour is supplied by the test. By default it applies and
 * passes with a single Validated=True condition.
 */
export class StubCheck extends BaseCheck {
  validateCalls = 0;
  private readonly behaviour: StubBehaviour;

  constructor(id: string, group: CheckGroup = CheckGroup.Component, behaviour: StubBehaviour = {}) {
    super({
      group,
      kind: id.split('.')[1] ?? 'stub',
      type: id.split('.')[2] ?? 'check',
      id,
      name: `Stub :: ${id}`,
      description: `Stub check ${id}`,
    });
    this.behaviour = behaviour;
  }

  canApply(target: Target): Promise<boolean> {
    return this.behaviour.canApply ? this.behaviour.canApply(target) : Promise.resolve(true);
  }

  async validate(target: Target, signal: AbortSignal): Promise<DiagnosticResult> {
    this.validateCalls++;
    if (this.behaviour.validate) {
      return this.behaviour.validate(target, signal);
    }
    const dr = newResultFor(this);
    dr.setCondition(newCondition('Validated', ConditionStatus.True, withReason('RequirementsMet')));
    return dr;
  }
}

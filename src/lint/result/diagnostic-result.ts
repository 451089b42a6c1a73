/**
 * Diagnostic Result
 *
 * Structured outcome of one check: the identity triple mirrored from the
 * check, free-form annotations, an ordered list of conditions and an
 * optional list of impacted objects.
 */

import { ErrorCode } from '../../errors/error-codes';
import { LintError } from '../../errors/lint-error';
import { apiVersionOf, type ResourceType } from '../../kube/resource-types';
import type { NamespacedName } from '../../kube/objects';

export enum ConditionStatus {
  True = 'True',
  False = 'False',
  Unknown = 'Unknown',
}

/**
 * Severity of a condition for upgrade gating.
 * Blocking halts an upgrade, Advisory does not.
 */
export enum Impact {
  None = 'none',
  Advisory = 'advisory',
  Blocking = 'blocking',
}

const IMPACT_RANK: Record<Impact, number> = {
  [Impact.None]: 0,
  [Impact.Advisory]: 1,
  [Impact.Blocking]: 2,
};

export interface Condition {
  type: string;
  status: ConditionStatus;
  reason: string;
  message: string;
  /** ISO-8601 */
  lastTransitionTime: string;
  impact: Impact;
  remediation?: string;
}

export interface ImpactedObject {
  apiVersion?: string;
  kind?: string;
  namespace?: string;
  name: string;
  annotations?: Record<string, string>;
}

export interface DiagnosticResultJSON {
  group: string;
  kind: string;
  name: string;
  spec: { description: string };
  annotations: Record<string, string>;
  status: { conditions: Condition[] };
  impactedObjects?: ImpactedObject[];
}

const VALID_STATUSES: ReadonlySet<string> = new Set(Object.values(ConditionStatus));

// dns-subdomain style prefix with at least one dot, then a non-empty name
const ANNOTATION_KEY_PATTERN =
  /^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)+\/[A-Za-z0-9]([-A-Za-z0-9_.]*[A-Za-z0-9])?$/;

export function isValidAnnotationKey(key: string): boolean {
  return ANNOTATION_KEY_PATTERN.test(key);
}

export class DiagnosticResult {
  group: string;
  kind: string;
  name: string;
  spec: { description: string };
  annotations: Record<string, string> = {};
  status: { conditions: Condition[] } = { conditions: [] };
  /** undefined until a check (or a builder) sets it */
  impactedObjects?: ImpactedObject[];

  constructor(group: string, kind: string, name: string, description: string) {
    this.group = group;
    this.kind = kind;
    this.name = name;
    this.spec = { description };
  }

  /**
   * Enforce the structural invariants. Throws LintError(L302) describing the
   * first violation found.
   */
  validate(): void {
    const fail = (message: string): never => {
      throw new LintError(ErrorCode.L302_INVALID_CHECK_RESULT, message);
    };

    if (!this.group) {
      fail('group must not be empty');
    }
    if (!this.kind) {
      fail('kind must not be empty');
    }
    if (!this.name) {
      fail('name must not be empty');
    }
    if (this.status.conditions.length === 0) {
      fail('status.conditions must contain at least one condition');
    }

    for (const condition of this.status.conditions) {
      if (!condition.type) {
        fail('condition with empty type found');
      }
      if (!VALID_STATUSES.has(condition.status)) {
        fail(`condition ${condition.type} has invalid status "${condition.status}"`);
      }
      if (!condition.reason) {
        fail(`condition ${condition.type} has empty reason`);
      }
    }

    for (const key of Object.keys(this.annotations)) {
      if (!isValidAnnotationKey(key)) {
        fail(`annotation key "${key}" must be in domain/key format (e.g. example.com/key)`);
      }
    }
  }

  /**
   * Upsert by type. An existing condition keeps its position; its transition
   * time is kept when the status does not change.
   */
  setCondition(condition: Condition): void {
    const index = this.status.conditions.findIndex(c => c.type === condition.type);
    if (index === -1) {
      this.status.conditions.push({ ...condition });
      return;
    }

    const existing = this.status.conditions[index];
    this.status.conditions[index] = {
      ...condition,
      lastTransitionTime:
        existing.status === condition.status ? existing.lastTransitionTime : condition.lastTransitionTime,
    };
  }

  getCondition(type: string): Condition | undefined {
    return this.status.conditions.find(c => c.type === type);
  }

  /**
   * Replace the impacted object list.
   */
  setImpactedObjects(resourceType: ResourceType, names: NamespacedName[]): void {
    this.impactedObjects = names.map(n => toImpactedObject(resourceType, n));
  }

  /**
   * Append to the impacted object list, creating it if needed.
   */
  addImpactedObjects(resourceType: ResourceType, names: NamespacedName[]): void {
    const additions = names.map(n => toImpactedObject(resourceType, n));
    this.impactedObjects = [...(this.impactedObjects ?? []), ...additions];
  }

  /**
   * Highest impact across all conditions, or undefined when there are none.
   */
  getImpact(): Impact | undefined {
    let highest: Impact | undefined;
    for (const condition of this.status.conditions) {
      if (highest === undefined || IMPACT_RANK[condition.impact] > IMPACT_RANK[highest]) {
        highest = condition.impact;
      }
    }
    return highest;
  }

  toJSON(): DiagnosticResultJSON {
    const json: DiagnosticResultJSON = {
      group: this.group,
      kind: this.kind,
      name: this.name,
      spec: { ...this.spec },
      annotations: { ...this.annotations },
      status: { conditions: this.status.conditions.map(c => ({ ...c })) },
    };
    if (this.impactedObjects !== undefined) {
      json.impactedObjects = this.impactedObjects.map(o => ({ ...o }));
    }
    return json;
  }
}

function toImpactedObject(resourceType: ResourceType, name: NamespacedName): ImpactedObject {
  const obj: ImpactedObject = {
    apiVersion: apiVersionOf(resourceType),
    kind: resourceType.kind,
    name: name.name,
  };
  if (name.namespace) {
    obj.namespace = name.namespace;
  }
  return obj;
}

export function compareImpact(a: Impact, b: Impact): number {
  return IMPACT_RANK[a] - IMPACT_RANK[b];
}

/**
 * Fluent builder for checks that report on a set of listed objects.
 *
 * ```ts
 * return workloads(this, target, Notebook)
 *   .forComponent('workbenches')
 *   .filter(nb => isManaged(nb))
 *   .complete(signal, req => [newCondition(...)]);
 * ```
 */

import { getDataScienceCluster, hasManagementState } from '../../kube/cluster';
import type { KubeObject, NamespacedNamer, ObjectMetadata } from '../../kube/objects';
import { toNamespacedNames } from '../../kube/objects';
import { isNotFound, isResourceTypeNotFound } from '../../kube/reader';
import type { ResourceType } from '../../kube/resource-types';
import { newResultFor } from '../check/base-check';
import { newCondition, withImpact, withMessage, withReason } from '../check/condition';
import { Annotation, ConditionType, ManagementState, Reason } from '../check/constants';
import { checkSignal } from '../check/context';
import type { Check, Target } from '../check/types';
import { ConditionStatus, Impact, type Condition, type DiagnosticResult } from '../result/diagnostic-result';

export interface WorkloadRequest<T> {
  readonly target: Target;
  readonly result: DiagnosticResult;
  /** Listed items after the filter */
  readonly items: T[];
}

export type WorkloadValidateFn<T> = (req: WorkloadRequest<T>, signal: AbortSignal) => Promise<void> | void;

export type WorkloadConditionFn<T> = (
  req: WorkloadRequest<T>,
  signal: AbortSignal
) => Promise<Condition[]> | Condition[];

/** Throwing stops the run and propagates the error. */
export type WorkloadFilterFn<T> = (item: T) => boolean;

type ListFn<T> = (signal: AbortSignal) => Promise<T[]>;

export class WorkloadBuilder<T extends NamespacedNamer> {
  private readonly check: Check;
  private readonly target: Target;
  private readonly resourceType: ResourceType;
  private readonly listFn: ListFn<T>;
  private filterFn?: WorkloadFilterFn<T>;
  private componentNames: string[] = [];

  constructor(check: Check, target: Target, resourceType: ResourceType, listFn: ListFn<T>) {
    this.check = check;
    this.target = target;
    this.resourceType = resourceType;
    this.listFn = listFn;
  }

  filter(fn: WorkloadFilterFn<T>): this {
    this.filterFn = fn;
    return this;
  }

  /**
   * Require at least one of these components to be in a state other than
   * Removed. Otherwise the run short-circuits with a passing result.
   */
  forComponent(...names: string[]): this {
    this.componentNames = names;
    return this;
  }

  async run(signal: AbortSignal, fn: WorkloadValidateFn<T>): Promise<DiagnosticResult> {
    checkSignal(signal);

    const dr = newResultFor(this.check);
    if (this.target.targetVersion) {
      dr.annotations[Annotation.CheckTargetVersion] = this.target.targetVersion.version;
    }

    if (this.componentNames.length > 0 && (await this.componentsInactive(dr))) {
      return dr;
    }

    let items: T[];
    try {
      items = await this.listFn(signal);
    } catch (err) {
      if (!isResourceTypeNotFound(err)) {
        throw err;
      }
      items = [];
    }

    const filterFn = this.filterFn;
    if (filterFn) {
      items = items.filter(item => filterFn(item));
    }

    dr.annotations[Annotation.ImpactedWorkloadCount] = String(items.length);

    await fn({ target: this.target, result: dr, items }, signal);

    if (dr.impactedObjects === undefined && items.length > 0) {
      dr.setImpactedObjects(this.resourceType, toNamespacedNames(items));
    }

    return dr;
  }

  /**
   * Like run, for callbacks that only compute conditions; each returned
   * condition is set on the result.
   */
  complete(signal: AbortSignal, fn: WorkloadConditionFn<T>): Promise<DiagnosticResult> {
    return this.run(signal, async (req, runSignal) => {
      const conditions = await fn(req, runSignal);
      for (const condition of conditions) {
        req.result.setCondition(condition);
      }
    });
  }

  /**
   * Sets the short-circuit condition on `dr` and returns true when
   * validation should not run.
   */
  private async componentsInactive(dr: DiagnosticResult): Promise<boolean> {
    let dsc: KubeObject;
    try {
      dsc = await getDataScienceCluster(this.target.client);
    } catch (err) {
      if (!isNotFound(err)) {
        throw err;
      }
      dr.setCondition(
        newCondition(
          ConditionType.Available,
          ConditionStatus.False,
          withReason(Reason.ResourceNotFound),
          withMessage('No DataScienceCluster found'),
          withImpact(Impact.Advisory)
        )
      );
      return true;
    }

    if (this.componentNames.some(name => !hasManagementState(dsc, name, ManagementState.Removed))) {
      return false;
    }

    dr.setCondition(
      newCondition(
        ConditionType.Configured,
        ConditionStatus.True,
        withReason(Reason.RequirementsMet),
        withMessage(`All of ${this.componentNames.join(', ')} are Removed; no workloads to validate`)
      )
    );
    return true;
  }
}

/**
 * Builder over full objects, for checks that read spec or status.
 */
export function workloads(check: Check, target: Target, resourceType: ResourceType): WorkloadBuilder<KubeObject> {
  return new WorkloadBuilder<KubeObject>(check, target, resourceType, signal =>
    target.client.list(resourceType, { signal })
  );
}

/**
 * Builder over metadata-only headers, for checks that need names, labels or
 * annotations only.
 */
export function workloadsMetadata(
  check: Check,
  target: Target,
  resourceType: ResourceType
): WorkloadBuilder<ObjectMetadata> {
  return new WorkloadBuilder<ObjectMetadata>(check, target, resourceType, signal =>
    target.client.listMetadata(resourceType, { signal })
  );
}

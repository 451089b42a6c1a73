/**
 * Fluent builder for checks keyed on one component's management state.
 *
 * ```ts
 * return validateComponent(this, 'codeflare', target)
 *   .inState(ManagementState.Managed)
 *   .run(signal, async req => {
 *     setCompatibilityFailure(req.result, `CodeFlare is enabled (state: ${req.managementState})`);
 *   });
 * ```
 */

import { getApplicationsNamespace, getDataScienceCluster, getManagementState } from '../../kube/cluster';
import type { KubeObject } from '../../kube/objects';
import { isNotFound, type Reader } from '../../kube/reader';
import { newResultFor } from '../check/base-check';
import { Annotation } from '../check/constants';
import { checkSignal } from '../check/context';
import type { Check, Target } from '../check/types';
import type { DiagnosticResult } from '../result/diagnostic-result';
import { dataScienceClusterNotFound, setComponentNotConfigured } from '../result/results';

export class ComponentRequest {
  readonly result: DiagnosticResult;
  readonly dsc: KubeObject;
  readonly managementState: string;
  readonly client: Reader;
  private applicationsNamespacePromise?: Promise<string>;

  constructor(result: DiagnosticResult, dsc: KubeObject, managementState: string, client: Reader) {
    this.result = result;
    this.dsc = dsc;
    this.managementState = managementState;
    this.client = client;
  }

  /**
   * Applications namespace from the DSCInitialization. Fetched on first call;
   * later calls share the same outcome, failure included.
   */
  applicationsNamespace(): Promise<string> {
    if (!this.applicationsNamespacePromise) {
      this.applicationsNamespacePromise = getApplicationsNamespace(this.client);
    }
    return this.applicationsNamespacePromise;
  }
}

export type ComponentValidateFn = (req: ComponentRequest, signal: AbortSignal) => Promise<void> | void;

export class ComponentBuilder {
  private readonly check: Check;
  private readonly componentName: string;
  private readonly target: Target;
  private requiredStates: string[] = [];

  constructor(check: Check, componentName: string, target: Target) {
    this.check = check;
    this.componentName = componentName;
    this.target = target;
  }

  /**
   * Limit validation to these management states. Without a call, any state
   * runs the validation.
   */
  inState(...states: string[]): this {
    this.requiredStates = states;
    return this;
  }

  async run(signal: AbortSignal, fn: ComponentValidateFn): Promise<DiagnosticResult> {
    checkSignal(signal);

    let dsc: KubeObject;
    try {
      dsc = await getDataScienceCluster(this.target.client);
    } catch (err) {
      if (isNotFound(err)) {
        return dataScienceClusterNotFound(this.check);
      }
      throw err;
    }

    const state = getManagementState(dsc, this.componentName);
    const dr = newResultFor(this.check);

    if (this.requiredStates.length > 0 && !this.requiredStates.includes(state)) {
      setComponentNotConfigured(dr, this.componentName);
      return dr;
    }

    dr.annotations[Annotation.ComponentManagementState] = state;
    if (this.target.targetVersion) {
      dr.annotations[Annotation.CheckTargetVersion] = this.target.targetVersion.version;
    }

    await fn(new ComponentRequest(dr, dsc, state, this.target.client), signal);
    return dr;
  }
}

/**
 * `componentName` is the key under spec.components, e.g. "codeflare".
 */
export function validateComponent(check: Check, componentName: string, target: Target): ComponentBuilder {
  return new ComponentBuilder(check, componentName, target);
}

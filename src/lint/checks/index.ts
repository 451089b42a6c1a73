import type { CheckRegistry } from '../check/registry';
import type { Check } from '../check/types';
import { CodeFlareRemovalCheck } from './components/codeflare';
import { ModelMeshRemovalCheck } from './components/modelmesh';
import { LlamaStackConfigCheck } from './workloads/llamastack';
import { NotebookImpactedWorkloadsCheck } from './workloads/notebook';

export { CodeFlareRemovalCheck, ModelMeshRemovalCheck, LlamaStackConfigCheck, NotebookImpactedWorkloadsCheck };
export { ANNOTATION_UPGRADE_ACTION, CONDITION_REQUIRES_RECREATION } from './workloads/llamastack';
export { ANNOTATION_RESOURCE_STOPPED, CONDITION_RUNNING_WORKLOADS, isRunning } from './workloads/notebook';

export function createBuiltinChecks(): Check[] {
  return [
    new CodeFlareRemovalCheck(),
    new ModelMeshRemovalCheck(),
    new LlamaStackConfigCheck(),
    new NotebookImpactedWorkloadsCheck(),
  ];
}

/**
 * Explicit registration of every shipped check. Throws on a duplicate ID.
 */
export function registerBuiltinChecks(registry: CheckRegistry): void {
  registry.registerMany(createBuiltinChecks());
}

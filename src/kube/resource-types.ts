/**
 * Resource types the engine and built-in checks read.
 */

export interface ResourceType {
  group: string;
  version: string;
  kind: string;
  /** Plural, lowercase resource name (e.g. 'notebooks') */
  resource: string;
}

export function apiVersionOf(rt: ResourceType): string {
  return rt.group ? `${rt.group}/${rt.version}` : rt.version;
}

export function resourceTypeKey(rt: ResourceType): string {
  return rt.group ? `${rt.resource}.${rt.group}` : rt.resource;
}

export const DataScienceCluster: ResourceType = {
  group: 'datasciencecluster.opendatahub.io',
  version: 'v1',
  kind: 'DataScienceCluster',
  resource: 'datascienceclusters',
};

export const DSCInitialization: ResourceType = {
  group: 'dscinitialization.opendatahub.io',
  version: 'v1',
  kind: 'DSCInitialization',
  resource: 'dscinitializations',
};

export const Notebook: ResourceType = {
  group: 'kubeflow.org',
  version: 'v1',
  kind: 'Notebook',
  resource: 'notebooks',
};

export const LlamaStackDistribution: ResourceType = {
  group: 'llamastack.io',
  version: 'v1alpha1',
  kind: 'LlamaStackDistribution',
  resource: 'llamastackdistributions',
};

export const Namespace: ResourceType = {
  group: '',
  version: 'v1',
  kind: 'Namespace',
  resource: 'namespaces',
};

/**
 * Helpers for the platform's singleton configuration resources.
 */

import { ErrorCode } from '../errors/error-codes';
import { LintError } from '../errors/lint-error';
import { ManagementState } from '../lint/check/constants';
import { ResourceError, ResourceErrorKind, isResourceTypeNotFound, type Reader } from './reader';
import { DataScienceCluster, DSCInitialization, type ResourceType } from './resource-types';
import { nestedField, nestedString, type KubeObject } from './objects';

async function getSingleton(reader: Reader, resourceType: ResourceType): Promise<KubeObject> {
  let items: KubeObject[];
  try {
    items = await reader.list(resourceType);
  } catch (err) {
    if (isResourceTypeNotFound(err)) {
      throw new ResourceError(ResourceErrorKind.NotFound, `no ${resourceType.kind} found`);
    }
    throw err;
  }

  if (items.length === 0) {
    throw new ResourceError(ResourceErrorKind.NotFound, `no ${resourceType.kind} found`);
  }
  if (items.length > 1) {
    throw new ResourceError(
      ResourceErrorKind.Other,
      `expected a single ${resourceType.kind}, found ${items.length}`
    );
  }

  return items[0];
}

/**
 * Fetch the cluster's DataScienceCluster. Throws a NotFound ResourceError when
 * none exists (including when the type is not registered).
 */
export function getDataScienceCluster(reader: Reader): Promise<KubeObject> {
  return getSingleton(reader, DataScienceCluster);
}

export function getDSCInitialization(reader: Reader): Promise<KubeObject> {
  return getSingleton(reader, DSCInitialization);
}

/**
 * Resolve `spec.applicationsNamespace` from the DSCInitialization.
 */
export async function getApplicationsNamespace(reader: Reader): Promise<string> {
  const dsci = await getDSCInitialization(reader);
  const ns = nestedString(dsci, 'spec', 'applicationsNamespace');
  if (!ns) {
    throw new LintError(
      ErrorCode.L406_MALFORMED_FIELD,
      'spec.applicationsNamespace is not set on DSCInitialization'
    );
  }
  return ns;
}

/**
 * Management state of a component under `spec.components.<name>`.
 * An absent component reads as Removed.
 */
export function getManagementState(dsc: KubeObject, componentName: string): string {
  const component = nestedField(dsc, 'spec', 'components', componentName);
  if (component === undefined) {
    return ManagementState.Removed;
  }
  const state = nestedString(dsc, 'spec', 'components', componentName, 'managementState');
  return state === undefined || state === '' ? ManagementState.Removed : state;
}

export function hasManagementState(dsc: KubeObject, componentName: string, ...states: string[]): boolean {
  return states.includes(getManagementState(dsc, componentName));
}

/**
 * Installed platform version, read from the DataScienceCluster release status.
 */
export async function detectVersion(reader: Reader): Promise<string> {
  const dsc = await getDataScienceCluster(reader);
  const version = nestedString(dsc, 'status', 'release', 'version');
  if (!version) {
    throw new LintError(
      ErrorCode.L103_INVALID_VERSION,
      'status.release.version is not set on DataScienceCluster'
    );
  }
  return version;
}

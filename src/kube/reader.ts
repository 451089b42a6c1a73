/**
 * Resource Reader contract consumed by checks and builders.
 *
 * Implementations translate their transport failures into a ResourceError
 * with one of the closed ResourceErrorKind values, so callers classify by
 * a plain match.
 */

import { ErrorCode } from '../errors/error-codes';
import { LintError } from '../errors/lint-error';
import type { ResourceType } from './resource-types';
import type { KubeObject, ObjectMetadata } from './objects';

export interface ListOptions {
  namespace?: string;
  signal?: AbortSignal;
}

export interface Reader {
  list(resourceType: ResourceType, options?: ListOptions): Promise<KubeObject[]>;
  listMetadata(resourceType: ResourceType, options?: ListOptions): Promise<ObjectMetadata[]>;
  get(resourceType: ResourceType, name: string, namespace?: string): Promise<KubeObject>;
}

export enum ResourceErrorKind {
  /** The named object does not exist */
  NotFound = 'NotFound',
  /** The resource type itself is not served by the cluster */
  NoMatch = 'NoMatch',
  Forbidden = 'Forbidden',
  Timeout = 'Timeout',
  Unavailable = 'Unavailable',
  Other = 'Other',
}

const KIND_TO_CODE: Record<ResourceErrorKind, ErrorCode> = {
  [ResourceErrorKind.NotFound]: ErrorCode.L401_RESOURCE_NOT_FOUND,
  [ResourceErrorKind.NoMatch]: ErrorCode.L402_RESOURCE_TYPE_NOT_REGISTERED,
  [ResourceErrorKind.Forbidden]: ErrorCode.L403_ACCESS_DENIED,
  [ResourceErrorKind.Timeout]: ErrorCode.L404_REQUEST_TIMEOUT,
  [ResourceErrorKind.Unavailable]: ErrorCode.L405_API_UNAVAILABLE,
  [ResourceErrorKind.Other]: ErrorCode.L407_CLUSTER_REQUEST_FAILED,
};

export class ResourceError extends LintError {
  public readonly kind: ResourceErrorKind;

  constructor(kind: ResourceErrorKind, context?: string, details?: Record<string, unknown>) {
    super(KIND_TO_CODE[kind], context, details);
    this.name = 'ResourceError';
    this.kind = kind;
  }
}

export function resourceErrorKind(err: unknown): ResourceErrorKind | undefined {
  return err instanceof ResourceError ? err.kind : undefined;
}

export function isNotFound(err: unknown): boolean {
  return resourceErrorKind(err) === ResourceErrorKind.NotFound;
}

/**
 * True for both an unknown resource type and a 404 on the type's endpoint.
 */
export function isResourceTypeNotFound(err: unknown): boolean {
  const kind = resourceErrorKind(err);
  return kind === ResourceErrorKind.NoMatch || kind === ResourceErrorKind.NotFound;
}

export function isPermissionError(err: unknown): boolean {
  return resourceErrorKind(err) === ResourceErrorKind.Forbidden;
}

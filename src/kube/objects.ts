/**
 * Object shapes returned by the resource reader, plus field helpers.
 */

import { ErrorCode } from '../errors/error-codes';
import { LintError } from '../errors/lint-error';

export interface ObjectMeta {
  name: string;
  namespace?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
  finalizers?: string[];
}

/**
 * Minimal capability every listed item has: a name and an optional namespace.
 */
export interface NamespacedNamer {
  metadata: Pick<ObjectMeta, 'name' | 'namespace'>;
}

/**
 * Lightweight metadata-only object header.
 */
export interface ObjectMetadata extends NamespacedNamer {
  apiVersion: string;
  kind: string;
  metadata: ObjectMeta;
}

/**
 * Full object with arbitrary spec/status content.
 */
export interface KubeObject extends ObjectMetadata {
  [field: string]: unknown;
}

export interface NamespacedName {
  namespace: string;
  name: string;
}

export function toNamespacedNames<T extends NamespacedNamer>(items: T[]): NamespacedName[] {
  return items.map(item => ({
    namespace: item.metadata.namespace ?? '',
    name: item.metadata.name,
  }));
}

export function toObjectMetadata(obj: KubeObject): ObjectMetadata {
  return {
    apiVersion: obj.apiVersion,
    kind: obj.kind,
    metadata: { ...obj.metadata },
  };
}

/** Annotation marking a resource as not reconciled by the operator. */
export const ANNOTATION_MANAGED = 'opendatahub.io/managed';

export function getAnnotation(obj: ObjectMetadata, key: string): string {
  return obj.metadata.annotations?.[key] ?? '';
}

/**
 * False only when the managed annotation is present and exactly "false".
 */
export function isManaged(obj: ObjectMetadata): boolean {
  return obj.metadata.annotations?.[ANNOTATION_MANAGED] !== 'false';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walk `path` through nested maps.
 * Returns undefined when any segment is absent; throws L406 when an
 * intermediate segment is not a map.
 */
export function nestedField(obj: Record<string, unknown>, ...path: string[]): unknown {
  let current: unknown = obj;

  for (let i = 0; i < path.length; i++) {
    if (current === undefined || current === null) {
      return undefined;
    }
    if (!isRecord(current)) {
      throw new LintError(
        ErrorCode.L406_MALFORMED_FIELD,
        `${path.slice(0, i).join('.')} is ${typeof current}, expected a map`
      );
    }
    current = current[path[i]];
  }

  return current ?? undefined;
}

/**
 * Read a string field. Absent → undefined; present with another type → L406.
 */
export function nestedString(obj: Record<string, unknown>, ...path: string[]): string | undefined {
  const value = nestedField(obj, ...path);
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new LintError(
      ErrorCode.L406_MALFORMED_FIELD,
      `${path.join('.')} is ${typeof value}, expected string`
    );
  }
  return value;
}

import type { DiagnosticResult, ImpactedObject } from '../result/diagnostic-result';
import type { VerboseOutputFormatter } from './types';

/** Namespace annotation naming the user who requested the project. */
export const ANNOTATION_REQUESTER = 'openshift.io/requester';

export interface DefaultVerboseFormatterOptions {
  /** namespace → requester, shown in the namespace header when present */
  namespaceRequesters?: ReadonlyMap<string, string>;
}

interface NamespaceGroup {
  namespace: string;
  objects: ImpactedObject[];
}

function formatImpactedObject(obj: ImpactedObject): string {
  return obj.kind ? `${obj.name} (${obj.kind})` : obj.name;
}

/**
 * Group by namespace, namespaces sorted. Cluster-scoped ('') sorts first.
 */
function groupByNamespace(objects: ImpactedObject[]): NamespaceGroup[] {
  const byNamespace = new Map<string, ImpactedObject[]>();
  for (const obj of objects) {
    const ns = obj.namespace ?? '';
    const group = byNamespace.get(ns);
    if (group) {
      group.push(obj);
    } else {
      byNamespace.set(ns, [obj]);
    }
  }

  return [...byNamespace.keys()]
    .sort()
    .map(namespace => ({ namespace, objects: byNamespace.get(namespace) ?? [] }));
}

/**
 * Rendering used for checks that do not implement VerboseOutputFormatter.
 *
 * ```
 *     - cluster-thing (Kind)
 *     team-a (requester: alice):
 *       - nb-1 (Notebook)
 * ```
 */
export class DefaultVerboseFormatter implements VerboseOutputFormatter {
  private readonly namespaceRequesters?: ReadonlyMap<string, string>;

  constructor(options: DefaultVerboseFormatterOptions = {}) {
    this.namespaceRequesters = options.namespaceRequesters;
  }

  formatVerboseOutput(out: string[], result: DiagnosticResult): void {
    for (const group of groupByNamespace(result.impactedObjects ?? [])) {
      if (group.namespace === '') {
        for (const obj of group.objects) {
          out.push(`    - ${formatImpactedObject(obj)}`);
        }
        continue;
      }

      const requester = this.namespaceRequesters?.get(group.namespace);
      const header = requester ? `${group.namespace} (requester: ${requester})` : group.namespace;
      out.push(`    ${header}:`);
      for (const obj of group.objects) {
        out.push(`      - ${formatImpactedObject(obj)}`);
      }
    }
  }
}

import { DiagnosticResult } from '../result/diagnostic-result';
import type { CheckGroup } from './constants';
import type { Check, Target } from './types';

export interface BaseCheckOptions {
  group: CheckGroup;
  kind: string;
  type: string;
  id: string;
  name: string;
  description: string;
  remediation?: string;
}

/**
 * Identity fields shared by all checks. Subclasses supply canApply/validate.
 */
export abstract class BaseCheck implements Check {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly group: CheckGroup;
  readonly kind: string;
  readonly type: string;
  readonly remediation?: string;

  constructor(options: BaseCheckOptions) {
    this.id = options.id;
    this.name = options.name;
    this.description = options.description;
    this.group = options.group;
    this.kind = options.kind;
    this.type = options.type;
    this.remediation = options.remediation;
  }

  abstract canApply(target: Target): Promise<boolean>;

  abstract validate(target: Target, signal: AbortSignal): Promise<DiagnosticResult>;
}

/**
 * Empty result carrying the check's identity triple and description.
 */
export function newResultFor(check: Check): DiagnosticResult {
  return new DiagnosticResult(check.group, check.kind, check.type, check.description);
}

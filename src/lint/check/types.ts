/**
 * Check contract and the context it is evaluated against.
 */

import type { Reader } from '../../kube/reader';
import type { KubeObject } from '../../kube/objects';
import type { Version } from '../../version/version';
import type { DiagnosticResult } from '../result/diagnostic-result';
import type { CheckGroup } from './constants';

/**
 * Read-only bundle shared by every check in one run.
 */
export interface Target {
  readonly client: Reader;
  /** Version being upgraded from; undefined when unknown */
  readonly currentVersion?: Version;
  /** Version being upgraded to; undefined when unknown */
  readonly targetVersion?: Version;
  /** Single focused object, for checks scoped to one resource */
  readonly resource?: KubeObject;
}

export interface Check {
  /** Globally unique dotted ID, e.g. "components.codeflare.removal" */
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly group: CheckGroup;
  /** Result kind, e.g. the component name */
  readonly kind: string;
  /** Result name, e.g. "removal" */
  readonly type: string;
  readonly remediation?: string;

  /**
   * Whether the check is relevant for this target. A rejection is treated as
   * "does not apply".
   */
  canApply(target: Target): Promise<boolean>;

  validate(target: Target, signal: AbortSignal): Promise<DiagnosticResult>;
}

/**
 * Optional capability: custom rendering of impacted objects in verbose
 * table output.
 */
export interface VerboseOutputFormatter {
  formatVerboseOutput(out: string[], result: DiagnosticResult): void;
}

export function hasVerboseFormatter<T extends object>(value: T): value is T & VerboseOutputFormatter {
  return 'formatVerboseOutput' in value && typeof value.formatVerboseOutput === 'function';
}

/**
 * Pairing of a check with what one run produced for it. `error` is set
 * whenever the result was synthesized from a failure.
 */
export interface CheckExecution {
  check: Check;
  result: DiagnosticResult;
  error?: Error;
}

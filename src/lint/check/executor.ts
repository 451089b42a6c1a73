/**
 * Executor
 *
 * Runs a selected set of checks against one Target, sequentially.
 *
 * Per check:
 * - stop the whole run if the signal is done (partial results returned)
 * - skip silently when canApply is false or rejects
 * - run validate; a failure or a structurally invalid result becomes a
 *   synthesized Unknown-status result with the error kept alongside
 */

import { ErrorCode } from '../../errors/error-codes';
import { LintError, errorMessage } from '../../errors/lint-error';
import { ResourceErrorKind, resourceErrorKind } from '../../kube/reader';
import type { LintLogger } from '../../logging/lint-logger';
import { ConditionStatus, DiagnosticResult } from '../result/diagnostic-result';
import { newResultFor } from './base-check';
import { newCondition, withMessage, withReason } from './condition';
import { ConditionType, Reason, type CheckGroup } from './constants';
import { CheckCanceledError, CheckTimeoutError, signalError } from './context';
import type { CheckRegistry } from './registry';
import type { Check, CheckExecution, Target } from './types';

export interface ExecutorOptions {
  logger?: LintLogger;
}

/**
 * Executions of one run, and whether the signal cut it short before every
 * selected check was considered.
 */
export interface ExecutionRun {
  executions: CheckExecution[];
  stopped: boolean;
}

export interface FailureClassification {
  reason: string;
  message: string;
}

/**
 * Map a validate() failure to the reason and message of its synthesized
 * condition.
 */
export function classifyFailure(err: unknown): FailureClassification {
  if (err instanceof CheckTimeoutError) {
    return { reason: Reason.RequestTimeout, message: 'Check execution timed out' };
  }
  if (err instanceof CheckCanceledError) {
    return { reason: Reason.CheckExecutionFailed, message: 'Check execution canceled' };
  }

  switch (resourceErrorKind(err)) {
    case ResourceErrorKind.Forbidden:
      return { reason: Reason.APIAccessDenied, message: 'Insufficient permissions to access cluster resources' };
    case ResourceErrorKind.Timeout:
      return { reason: Reason.RequestTimeout, message: 'Request timed out' };
    case ResourceErrorKind.Unavailable:
      return { reason: Reason.APIUnavailable, message: 'API server is unavailable or overloaded' };
    default:
      return { reason: Reason.CheckExecutionFailed, message: `Check execution failed: ${errorMessage(err)}` };
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new LintError(ErrorCode.L301_CHECK_EXECUTION_FAILED, String(err));
}

export class Executor {
  private readonly registry: CheckRegistry;
  private readonly logger?: LintLogger;

  constructor(registry: CheckRegistry, options: ExecutorOptions = {}) {
    this.registry = registry;
    this.logger = options.logger;
  }

  /**
   * Run every registered check against the target.
   */
  executeAll(target: Target, signal?: AbortSignal): Promise<CheckExecution[]> {
    return this.executeChecks(target, this.registry.listAll(), signal);
  }

  /**
   * Run the checks selected by `patterns` (and `group`, when given).
   * Selection errors throw before any check runs.
   */
  async executeSelective(
    target: Target,
    patterns: string[],
    group?: CheckGroup,
    signal?: AbortSignal
  ): Promise<CheckExecution[]> {
    return (await this.runSelective(target, patterns, group, signal)).executions;
  }

  async executeChecks(target: Target, checks: Check[], signal?: AbortSignal): Promise<CheckExecution[]> {
    return (await this.runChecks(target, checks, signal)).executions;
  }

  runSelective(target: Target, patterns: string[], group?: CheckGroup, signal?: AbortSignal): Promise<ExecutionRun> {
    const checks = this.registry.listByPatterns(patterns, group);
    this.logger?.log('debug', 'SELECTION', `Selected ${checks.length} check(s)`, {
      details: { patterns, group, ids: checks.map(c => c.id) },
    });
    return this.runChecks(target, checks, signal);
  }

  async runChecks(target: Target, checks: Check[], signal?: AbortSignal): Promise<ExecutionRun> {
    const runSignal = signal ?? new AbortController().signal;
    const executions: CheckExecution[] = [];

    for (let i = 0; i < checks.length; i++) {
      const stop = signalError(runSignal);
      if (stop) {
        this.logger?.logCancelled(executions.length, checks.length - i, stop.message);
        return { executions, stopped: true };
      }

      const check = checks[i];

      let applies: boolean;
      try {
        applies = await check.canApply(target);
      } catch (err) {
        this.logger?.logSkipped(check.id, 'applicability could not be determined', { error: errorMessage(err) });
        continue;
      }
      if (!applies) {
        this.logger?.logSkipped(check.id, 'not applicable to this target');
        continue;
      }

      executions.push(await this.executeCheck(target, check, runSignal));
    }

    return { executions, stopped: false };
  }

  private async executeCheck(target: Target, check: Check, signal: AbortSignal): Promise<CheckExecution> {
    const startedAt = Date.now();
    this.logger?.logExecutionStart(check.id);

    let result: DiagnosticResult;
    try {
      result = await check.validate(target, signal);
    } catch (err) {
      const { reason, message } = classifyFailure(err);
      this.logger?.logExecutionError(check.id, reason, errorMessage(err));
      return {
        check,
        result: this.synthesize(check, reason, message),
        error: toError(err),
      };
    }

    try {
      if (!(result instanceof DiagnosticResult)) {
        throw new LintError(ErrorCode.L302_INVALID_CHECK_RESULT, 'check returned no result');
      }
      result.validate();
    } catch (err) {
      this.logger?.logInvalidResult(check.id, errorMessage(err));
      return {
        check,
        result: this.synthesize(check, Reason.InvalidResult, `Invalid check result: ${errorMessage(err)}`),
        error: new LintError(
          ErrorCode.L302_INVALID_CHECK_RESULT,
          `invalid result from check ${check.id}: ${errorMessage(err)}`,
          { checkId: check.id }
        ),
      };
    }

    this.logger?.logExecutionEnd(check.id, Date.now() - startedAt, result.status.conditions.length);
    return { check, result };
  }

  private synthesize(check: Check, reason: string, message: string): DiagnosticResult {
    const dr = newResultFor(check);
    dr.setCondition(
      newCondition(ConditionType.Validated, ConditionStatus.Unknown, withReason(reason), withMessage(message))
    );
    return dr;
  }
}

/**
 * Executor Tests
 */

import { describe, it, beforeEach } from 'mocha';
import { strict as assert } from 'assert';
import { ErrorCode, LintError } from '../../../src/errors';
import { ResourceError, ResourceErrorKind } from '../../../src/kube';
import { LintLogger } from '../../../src/logging';
import {
  CheckGroup,
  CheckRegistry,
  CheckTimeoutError,
  Executor,
  classifyFailure,
  newCondition,
  withReason,
} from '../../../src/lint/check';
import { ConditionStatus, DiagnosticResult } from '../../../src/lint/result';
import { FakeReader } from '../../helpers/fake-reader';
import { StubCheck, newTarget } from '../../helpers/target';

describe('Executor', () => {
  let registry: CheckRegistry;
  let logger: LintLogger;
  let executor: Executor;
  const target = newTarget(new FakeReader());
  const live = (): AbortSignal => new AbortController().signal;

  beforeEach(() => {
    registry = new CheckRegistry();
    logger = new LintLogger();
    executor = new Executor(registry, { logger });
  });

  it('should isolate a failing check', async () => {
    registry.registerMany([
      new StubCheck('components.first.check'),
      new StubCheck('components.second.check', CheckGroup.Component, {
        validate: async () => {
          throw new Error('boom');
        },
      }),
      new StubCheck('components.third.check'),
    ]);

    const executions = await executor.executeAll(target, live());

    assert.equal(executions.length, 3);
    assert.equal(executions[0].error, undefined);
    assert.equal(executions[0].result.getCondition('Validated')?.status, ConditionStatus.True);
    assert.equal(executions[2].error, undefined);

    const failed = executions[1];
    assert.equal(failed.error?.message, 'boom');
    assert.equal(failed.result.status.conditions.length, 1);
    const [condition] = failed.result.status.conditions;
    assert.equal(condition.type, 'Validated');
    assert.equal(condition.status, ConditionStatus.Unknown);
    assert.equal(condition.reason, 'CheckExecutionFailed');
    assert.equal(condition.message, 'Check execution failed: boom');
    assert.deepEqual([failed.result.group, failed.result.kind, failed.result.name], ['component', 'second', 'check']);
  });

  it('should classify cluster access failures', () => {
    assert.deepEqual(classifyFailure(new ResourceError(ResourceErrorKind.Forbidden)), {
      reason: 'APIAccessDenied',
      message: 'Insufficient permissions to access cluster resources',
    });
    assert.deepEqual(classifyFailure(new ResourceError(ResourceErrorKind.Timeout)), {
      reason: 'RequestTimeout',
      message: 'Request timed out',
    });
    assert.deepEqual(classifyFailure(new ResourceError(ResourceErrorKind.Unavailable)), {
      reason: 'APIUnavailable',
      message: 'API server is unavailable or overloaded',
    });
    assert.equal(classifyFailure(new CheckTimeoutError()).reason, 'RequestTimeout');
    assert.deepEqual(classifyFailure('odd'), {
      reason: 'CheckExecutionFailed',
      message: 'Check execution failed: odd',
    });
  });

  it('should keep the original error for a classified failure', async () => {
    const forbidden = new ResourceError(ResourceErrorKind.Forbidden, 'notebooks is forbidden');
    registry.register(
      new StubCheck('workloads.notebook.check', CheckGroup.Workload, {
        validate: async () => {
          throw forbidden;
        },
      })
    );

    const [execution] = await executor.executeAll(target, live());
    assert.equal(execution.error, forbidden);
    assert.equal(execution.result.status.conditions[0].reason, 'APIAccessDenied');
    assert.equal(logger.getEntries({ minLevel: 'warn' })[0].category, 'EXECUTION_ERROR');
  });

  it('should replace an invalid result', async () => {
    registry.register(
      new StubCheck('components.broken.check', CheckGroup.Component, {
        validate: async () => new DiagnosticResult('component', 'broken', 'check', 'no conditions'),
      })
    );

    const [execution] = await executor.executeAll(target, live());

    const condition = execution.result.status.conditions[0];
    assert.equal(condition.status, ConditionStatus.Unknown);
    assert.equal(condition.reason, 'InvalidResult');
    assert.equal(
      condition.message,
      'Invalid check result: [L302] Check returned an invalid result: status.conditions must contain at least one condition'
    );
    const error = execution.error;
    assert.equal(error instanceof LintError && error.code, ErrorCode.L302_INVALID_CHECK_RESULT);
    assert.ok(error?.message.includes('invalid result from check components.broken.check'));
  });

  it('should skip checks that do not apply or fail to decide', async () => {
    const notApplicable = new StubCheck('components.a.check', CheckGroup.Component, {
      canApply: async () => false,
    });
    const undecided = new StubCheck('components.b.check', CheckGroup.Component, {
      canApply: async () => {
        throw new ResourceError(ResourceErrorKind.Forbidden);
      },
    });
    const applicable = new StubCheck('components.c.check');
    registry.registerMany([notApplicable, undecided, applicable]);

    const executions = await executor.executeAll(target, live());

    assert.deepEqual(executions.map(e => e.check.id), ['components.c.check']);
    assert.equal(notApplicable.validateCalls, 0);
    assert.equal(undecided.validateCalls, 0);
    assert.equal(logger.getEntries({ checkId: 'components.b.check' })[0].category, 'APPLICABILITY');
  });

  describe('cancellation', () => {
    it('should run nothing when already cancelled', async () => {
      const checks = [new StubCheck('a.one.x'), new StubCheck('a.two.x'), new StubCheck('a.three.x')];
      registry.registerMany(checks);
      const controller = new AbortController();
      controller.abort();

      const executions = await executor.executeAll(target, controller.signal);

      assert.equal(executions.length, 0);
      assert.ok(checks.every(c => c.validateCalls === 0));
      const [cancelled] = logger.getEntries({ minLevel: 'warn' });
      assert.deepEqual(cancelled.details, {
        completed: 0,
        remaining: 3,
        reason: '[L304] Check execution canceled',
      });
    });

    it('should stop after the check during which the signal fired', async () => {
      const controller = new AbortController();
      const first = new StubCheck('a.one.x', CheckGroup.Component, {
        validate: async () => {
          controller.abort();
          const dr = new DiagnosticResult('component', 'one', 'x', 'first');
          dr.setCondition(newCondition('Validated', ConditionStatus.True, withReason('RequirementsMet')));
          return dr;
        },
      });
      const second = new StubCheck('a.two.x');
      const third = new StubCheck('a.three.x');
      registry.registerMany([first, second, third]);

      const executions = await executor.executeAll(target, controller.signal);

      assert.equal(executions.length, 1);
      assert.equal(executions[0].check.id, 'a.one.x');
      assert.equal(second.validateCalls, 0);
      assert.equal(third.validateCalls, 0);
    });

    it('should report a run as stopped only when a check was left out', async () => {
      const controller = new AbortController();
      const aborting = (id: string): StubCheck =>
        new StubCheck(id, CheckGroup.Component, {
          validate: async () => {
            controller.abort();
            const dr = new DiagnosticResult('component', 'stub', 'check', id);
            dr.setCondition(newCondition('Validated', ConditionStatus.True, withReason('RequirementsMet')));
            return dr;
          },
        });

      const complete = await executor.runChecks(
        target,
        [new StubCheck('a.one.x'), aborting('a.two.x')],
        controller.signal
      );
      assert.equal(complete.executions.length, 2);
      assert.equal(complete.stopped, false);

      const truncated = await executor.runChecks(target, [new StubCheck('a.three.x')], controller.signal);
      assert.deepEqual(truncated.executions, []);
      assert.equal(truncated.stopped, true);
    });
  });

  describe('executeSelective', () => {
    beforeEach(() => {
      registry.registerMany([
        new StubCheck('components.dashboard', CheckGroup.Component),
        new StubCheck('workloads.notebook.x', CheckGroup.Workload),
      ]);
    });

    it('should run only the selected checks', async () => {
      const executions = await executor.executeSelective(target, ['*'], CheckGroup.Workload, live());
      assert.deepEqual(executions.map(e => e.check.id), ['workloads.notebook.x']);
    });

    it('should throw a selection error before any check runs', async () => {
      await assert.rejects(
        executor.executeSelective(target, ['['], undefined, live()),
        (err: unknown) => err instanceof LintError && err.code === ErrorCode.L202_INVALID_SELECTOR_PATTERN
      );
      assert.equal(logger.getEntries().length, 0);
    });
  });
});

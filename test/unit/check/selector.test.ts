/**
 * Selector Tests
 */

import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { ErrorCode, LintError } from '../../../src/errors';
import { CheckGroup, assertValidPattern, globSyntaxError, matchesPattern } from '../../../src/lint/check';
import { StubCheck } from '../../helpers/target';

const dashboard = new StubCheck('components.dashboard', CheckGroup.Component);
const workbench = new StubCheck('components.workbench', CheckGroup.Component);
const notebooks = new StubCheck('workloads.notebook.impacted-workloads', CheckGroup.Workload);
const all = [dashboard, workbench, notebooks];

function selected(pattern: string): string[] {
  return all.filter(c => matchesPattern(c, pattern)).map(c => c.id);
}

function isSelectorError(err: unknown): boolean {
  return err instanceof LintError && err.code === ErrorCode.L202_INVALID_SELECTOR_PATTERN;
}

describe('matchesPattern', () => {
  it('should match every check with "*"', () => {
    assert.deepEqual(selected('*'), ['components.dashboard', 'components.workbench', 'workloads.notebook.impacted-workloads']);
  });

  it('should match by group shortcut', () => {
    assert.deepEqual(selected('components'), ['components.dashboard', 'components.workbench']);
    assert.deepEqual(selected('workloads'), ['workloads.notebook.impacted-workloads']);
    assert.deepEqual(selected('services'), []);
  });

  it('should match an exact ID', () => {
    assert.deepEqual(selected('components.dashboard'), ['components.dashboard']);
  });

  it('should match globs over the ID', () => {
    assert.deepEqual(selected('components.*'), ['components.dashboard', 'components.workbench']);
    assert.deepEqual(selected('*dashboard*'), ['components.dashboard']);
    assert.deepEqual(selected('*.impacted-workloads'), ['workloads.notebook.impacted-workloads']);
    assert.deepEqual(selected('components.?ashboard'), ['components.dashboard']);
    assert.deepEqual(selected('components.[dw]*'), ['components.dashboard', 'components.workbench']);
  });

  it('should not treat brace or negation syntax specially', () => {
    assert.deepEqual(selected('components.{dashboard,workbench}'), []);
    assert.deepEqual(selected('!components.dashboard'), []);
  });

  it('should reject a malformed glob for any check', () => {
    for (const check of all) {
      assert.throws(() => matchesPattern(check, '['), isSelectorError);
    }
  });
});

describe('globSyntaxError', () => {
  it('should accept well-formed patterns', () => {
    assert.equal(globSyntaxError('components.*'), undefined);
    assert.equal(globSyntaxError('a[b-d]c'), undefined);
    assert.equal(globSyntaxError('a[!x]'), undefined);
    assert.equal(globSyntaxError('a\\*'), undefined);
  });

  it('should describe the problem', () => {
    assert.equal(globSyntaxError('['), 'unterminated character class');
    assert.equal(globSyntaxError('a[]'), 'empty character class');
    assert.equal(globSyntaxError('a[b-]'), 'character range without an end');
    assert.equal(globSyntaxError('a\\'), 'trailing escape character');
  });

  it('assertValidPattern should name the pattern', () => {
    assert.throws(
      () => assertValidPattern('comp[onents'),
      (err: unknown) => isSelectorError(err) && err instanceof Error && err.message.includes('"comp[onents": unterminated character class')
    );
    assertValidPattern('*');
    assertValidPattern('dependencies');
  });
});

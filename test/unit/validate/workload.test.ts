/**
 * Workload Builder Tests
 */

import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { DataScienceCluster, Notebook, ResourceErrorKind, isPermissionError } from '../../../src/kube';
import { Annotation, newCondition, withReason } from '../../../src/lint/check';
import { ConditionStatus } from '../../../src/lint/result';
import { workloads, workloadsMetadata } from '../../../src/lint/validate';
import { FakeReader } from '../../helpers/fake-reader';
import { StubCheck, newDSC, newObject, newTarget } from '../../helpers/target';

const NOTEBOOK_LIST = 'list notebooks.kubeflow.org';

function passed() {
  return newCondition('Ready', ConditionStatus.True, withReason('RequirementsMet'));
}

describe('WorkloadBuilder', () => {
  const check = new StubCheck('workloads.notebook.impacted-workloads');
  const live = (): AbortSignal => new AbortController().signal;

  function notebooks(): FakeReader {
    return new FakeReader().add(
      Notebook,
      newObject(Notebook, 'team-a', 'nb-1'),
      newObject(Notebook, 'team-a', 'nb-2', { stopped: 'true' }),
      newObject(Notebook, 'team-b', 'nb-3')
    );
  }

  it('should auto-populate impacted objects from the filtered items in order', async () => {
    const dr = await workloads(check, newTarget(notebooks()), Notebook)
      .filter(nb => nb.metadata.annotations?.stopped === undefined)
      .run(live(), req => {
        req.result.setCondition(passed());
      });

    assert.deepEqual(dr.impactedObjects, [
      { apiVersion: 'kubeflow.org/v1', kind: 'Notebook', namespace: 'team-a', name: 'nb-1' },
      { apiVersion: 'kubeflow.org/v1', kind: 'Notebook', namespace: 'team-b', name: 'nb-3' },
    ]);
    assert.equal(dr.annotations[Annotation.ImpactedWorkloadCount], '2');
    assert.equal(dr.annotations[Annotation.CheckTargetVersion], '3.0.0');
  });

  it('should pass the filtered items to the callback', async () => {
    const names: string[] = [];
    await workloads(check, newTarget(notebooks()), Notebook)
      .filter(nb => nb.metadata.namespace === 'team-a')
      .run(live(), req => {
        names.push(...req.items.map(i => i.metadata.name));
        req.result.setCondition(passed());
      });
    assert.deepEqual(names, ['nb-1', 'nb-2']);
  });

  it('should keep impacted objects the callback set itself', async () => {
    const dr = await workloads(check, newTarget(notebooks()), Notebook).run(live(), req => {
      req.result.setCondition(passed());
      req.result.impactedObjects = [];
    });
    assert.deepEqual(dr.impactedObjects, []);
  });

  it('should treat an unregistered type as an empty list', async () => {
    const reader = new FakeReader().unregister(Notebook);
    let count = -1;
    const dr = await workloads(check, newTarget(reader), Notebook).run(live(), req => {
      count = req.items.length;
      req.result.setCondition(passed());
    });

    assert.equal(count, 0);
    assert.equal(dr.annotations[Annotation.ImpactedWorkloadCount], '0');
    assert.equal(dr.impactedObjects, undefined);
  });

  it('should propagate list failures other than not found', async () => {
    const reader = new FakeReader().failWith(Notebook, ResourceErrorKind.Forbidden);
    await assert.rejects(
      workloads(check, newTarget(reader), Notebook).run(live(), () => undefined),
      (err: unknown) => isPermissionError(err)
    );
  });

  it('should stop when the filter throws', async () => {
    let invoked = false;
    await assert.rejects(
      workloads(check, newTarget(notebooks()), Notebook)
        .filter(() => {
          throw new Error('bad label selector');
        })
        .run(live(), () => {
          invoked = true;
        }),
      /bad label selector/
    );
    assert.equal(invoked, false);
  });

  it('complete should set the returned conditions', async () => {
    const dr = await workloadsMetadata(check, newTarget(notebooks()), Notebook).complete(live(), req => [
      newCondition('Ready', ConditionStatus.False, withReason('WorkloadsImpacted')),
      newCondition('Configured', ConditionStatus.True, withReason(`Count${req.items.length}`)),
    ]);

    assert.deepEqual(
      dr.status.conditions.map(c => [c.type, c.reason]),
      [
        ['Ready', 'WorkloadsImpacted'],
        ['Configured', 'Count3'],
      ]
    );
  });

  it('workloadsMetadata should use the metadata listing', async () => {
    const reader = notebooks();
    await workloadsMetadata(check, newTarget(reader), Notebook).complete(live(), () => [passed()]);
    assert.deepEqual(reader.calls, ['listMetadata notebooks.kubeflow.org']);
  });

  describe('forComponent', () => {
    it('should short-circuit when no DataScienceCluster exists', async () => {
      const reader = notebooks();
      let invoked = false;
      const dr = await workloads(check, newTarget(reader), Notebook)
        .forComponent('workbenches')
        .run(live(), () => {
          invoked = true;
        });

      assert.equal(invoked, false);
      assert.equal(dr.status.conditions.length, 1);
      assert.equal(dr.status.conditions[0].type, 'Available');
      assert.equal(dr.status.conditions[0].reason, 'ResourceNotFound');
      assert.equal(reader.calls.includes(NOTEBOOK_LIST), false);
    });

    it('should pass without listing when every component is Removed', async () => {
      const reader = notebooks().add(DataScienceCluster, newDSC({ workbenches: 'Removed' }));
      const dr = await workloads(check, newTarget(reader), Notebook)
        .forComponent('workbenches', 'kueue')
        .run(live(), () => undefined);

      const condition = dr.getCondition('Configured');
      assert.equal(condition?.status, ConditionStatus.True);
      assert.equal(condition?.reason, 'RequirementsMet');
      assert.equal(reader.calls.includes(NOTEBOOK_LIST), false);
    });

    it('should list when at least one component is active', async () => {
      const reader = notebooks().add(DataScienceCluster, newDSC({ workbenches: 'Removed', kueue: 'Unmanaged' }));
      const dr = await workloads(check, newTarget(reader), Notebook)
        .forComponent('workbenches', 'kueue')
        .run(live(), req => {
          req.result.setCondition(passed());
        });

      assert.equal(dr.annotations[Annotation.ImpactedWorkloadCount], '3');
      assert.equal(reader.calls.includes(NOTEBOOK_LIST), true);
    });
  });
});

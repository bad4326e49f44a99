import {
  ReferencedRevisionError,
  createRevisionService,
  createSilentLogger,
  resolveDirectProvisioningInputs,
  runExecutableUnit,
} from '@tessellate/core';
import { describe, expect, it } from 'vitest';
import { createSqlRevisionStore } from './revisionStore.js';
import { addComponent, createMigratedDb, sumWorkflow } from './test-support.js';

describe('createSqlRevisionStore', () => {
  it('stores and reads back components and workflows', () => {
    const store = createSqlRevisionStore(createMigratedDb());
    store.put(addComponent());
    store.put(sumWorkflow());

    expect(store.get('c-add')).toEqual(addComponent());
    expect(store.get('wf-sum')).toEqual(sumWorkflow());
    expect(store.get('c-none')).toBeNull();
  });

  it('overwrites a revision in place', () => {
    const store = createSqlRevisionStore(createMigratedDb());
    store.put(addComponent());
    store.put(addComponent({ state: 'RELEASED', releasedTimestamp: '2024-01-01T00:00:00.000Z' }));

    expect(store.get('c-add')).toMatchObject({ state: 'RELEASED', releasedTimestamp: '2024-01-01T00:00:00.000Z' });
    expect(store.list()).toHaveLength(1);
  });

  it('finds revisions by group and version tag', () => {
    const store = createSqlRevisionStore(createMigratedDb());
    store.put(addComponent());

    expect(store.getByGroupAndTag('c-add-group', '1.0.0')?.id).toBe('c-add');
    expect(store.getByGroupAndTag('c-add-group', '2.0.0')).toBeNull();
  });

  it('lists revisions by name and applies filters', () => {
    const store = createSqlRevisionStore(createMigratedDb());
    store.put(sumWorkflow());
    store.put(addComponent());
    store.put(addComponent({ id: 'c-add-2', versionTag: '2.0.0', state: 'RELEASED', releasedTimestamp: '2024-01-01T00:00:00.000Z' }));

    expect(store.list().map(revision => revision.id)).toEqual(['c-add', 'c-add-2', 'wf-sum']);
    expect(store.list({ type: 'WORKFLOW' }).map(revision => revision.id)).toEqual(['wf-sum']);
    expect(store.list({ type: 'COMPONENT', state: 'RELEASED' }).map(revision => revision.id)).toEqual(['c-add-2']);
  });

  it('replaces nesting rows and looks them up by descendant', () => {
    const store = createSqlRevisionStore(createMigratedDb());
    store.put(sumWorkflow());
    store.replaceNesting('wf-sum', [
      { workflowId: 'wf-sum', descendantId: 'c-add', viaOperatorPath: ['op-add'], depth: 1 },
      { workflowId: 'wf-sum', descendantId: 'c-add', viaOperatorPath: ['op-add-0'], depth: 1 },
    ]);
    store.replaceNesting('wf-sum', [{ workflowId: 'wf-sum', descendantId: 'c-add', viaOperatorPath: ['op-add'], depth: 1 }]);

    expect(store.listNesting('wf-sum')).toEqual([
      { workflowId: 'wf-sum', descendantId: 'c-add', viaOperatorPath: ['op-add'], depth: 1 },
    ]);
    expect(store.listNestingByDescendant('c-add').map(row => row.workflowId)).toEqual(['wf-sum']);

    expect(store.delete('wf-sum')).toBe(true);
    expect(store.delete('wf-sum')).toBe(false);
    expect(store.listNestingByDescendant('c-add')).toEqual([]);
  });

  it('rolls back every write of a failed transaction', () => {
    const store = createSqlRevisionStore(createMigratedDb());
    store.put(addComponent());

    expect(() =>
      store.transaction(tx => {
        tx.put(sumWorkflow());
        tx.transaction(inner => inner.delete('c-add'));
        throw new Error('abort');
      }),
    ).toThrow('abort');

    expect(store.list().map(revision => revision.id)).toEqual(['c-add']);
  });
});

describe('revision service on SQLite', () => {
  function createService() {
    let tick = 0;
    return createRevisionService(createSqlRevisionStore(createMigratedDb()), {
      logger: createSilentLogger(),
      now: () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++)).toISOString(),
    });
  }

  it('stores, compiles and runs a workflow', async () => {
    const service = createService();
    service.validateAndStore(addComponent());
    service.validateAndStore(sumWorkflow());

    const unit = service.compileForExecution('wf-sum');
    const result = await runExecutableUnit(
      unit,
      resolveDirectProvisioningInputs(service.getRevision('wf-sum').testWiring),
      async (_component, values) => ({ sum: Number(values.a) + Number(values.b) }),
    );

    expect(result.outputs).toEqual({ total: 5 });
    expect(service.listNesting('wf-sum')).toEqual([
      { workflowId: 'wf-sum', descendantId: 'c-add', viaOperatorPath: ['op-add'], depth: 1 },
    ]);
  });

  it('allows deleting a component once its released workflow is disabled', () => {
    const service = createService();
    service.validateAndStore(addComponent());
    service.validateAndStore(sumWorkflow({ state: 'RELEASED' }));

    expect(() => service.deleteRevision('c-add')).toThrow(ReferencedRevisionError);

    service.validateAndStore(sumWorkflow({ state: 'DISABLED' }));
    service.deleteRevision('c-add');

    expect(service.listRevisions().map(revision => revision.id)).toEqual(['wf-sum']);
    expect(service.getRevision('wf-sum')).toMatchObject({
      state: 'DISABLED',
      releasedTimestamp: '2024-01-01T00:00:00.000Z',
      disabledTimestamp: '2024-01-01T00:00:01.000Z',
    });
  });
});

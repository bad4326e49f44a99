import { describe, expect, it } from 'vitest';
import { InMemoryRevisionStore } from './inMemoryRevisionStore.js';
import { captureError, createAddComponent, createNegateComponent } from './test-support.js';

describe('InMemoryRevisionStore', () => {
  it('returns copies that do not share state with the store', () => {
    const store = new InMemoryRevisionStore([createAddComponent()]);

    const read = store.get('c-add');
    if (read) {
      read.name = 'Changed outside';
    }

    expect(store.get('c-add')?.name).toBe('Add');
  });

  it('finds revisions by group and version tag', () => {
    const store = new InMemoryRevisionStore([createAddComponent(), createNegateComponent()]);

    expect(store.getByGroupAndTag('c-neg-group', '1.0.0')?.id).toBe('c-neg');
    expect(store.getByGroupAndTag('c-neg-group', '2.0.0')).toBeNull();
  });

  it('filters listings by type and state', () => {
    const store = new InMemoryRevisionStore([createAddComponent('c-add', 'RELEASED'), createNegateComponent()]);

    expect(store.list({ state: 'RELEASED' }).map(revision => revision.id)).toEqual(['c-add']);
    expect(store.list({ type: 'WORKFLOW' })).toEqual([]);
  });

  it('restores revisions and nesting rows when a transaction fails', () => {
    const store = new InMemoryRevisionStore([createAddComponent()]);
    store.replaceNesting('wf-sum', [{ workflowId: 'wf-sum', descendantId: 'c-add', viaOperatorPath: ['op-add'], depth: 1 }]);

    const error = captureError(() =>
      store.transaction(tx => {
        tx.put(createNegateComponent());
        tx.delete('c-add');
        tx.replaceNesting('wf-sum', []);
        throw new Error('abort');
      }),
    );

    expect(error).toEqual(new Error('abort'));
    expect(store.list().map(revision => revision.id)).toEqual(['c-add']);
    expect(store.listNestingByDescendant('c-add')).toHaveLength(1);
  });

  it('runs nested transactions inside the outer one', () => {
    const store = new InMemoryRevisionStore();

    captureError(() =>
      store.transaction(outer => {
        outer.transaction(inner => inner.put(createAddComponent()));
        throw new Error('abort');
      }),
    );

    expect(store.get('c-add')).toBeNull();
  });
});

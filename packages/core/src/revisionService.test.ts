import type { TransformationRevision, WorkflowRevision } from '@tessellate/shared';
import { describe, expect, it } from 'vitest';
import {
  ConcurrentModificationError,
  ConnectivityError,
  ImmutableRevisionError,
  InvalidTransitionError,
  ReferencedRevisionError,
  RevisionIdentityError,
  RevisionNotFoundError,
  RevisionStoreError,
  StructuralError,
  VersionTagConflictError,
} from './errors.js';
import { InMemoryRevisionStore } from './inMemoryRevisionStore.js';
import { createSilentLogger } from './logger.js';
import { createRevisionService, type RevisionService } from './revisionService.js';
import {
  captureError,
  createAddComponent,
  createComponent,
  createNegateComponent,
  createWorkflow,
  io,
  link,
  placeOperator,
} from './test-support.js';
import { resolveDirectProvisioningInputs, runExecutableUnit } from './unitRunner.js';

const add = createAddComponent();

function createClock(): () => string {
  let tick = 0;
  return () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++)).toISOString();
}

function createService(store = new InMemoryRevisionStore()): RevisionService {
  return createRevisionService(store, { logger: createSilentLogger(), now: createClock() });
}

function sumWorkflow(overrides: Partial<Pick<WorkflowRevision, 'state' | 'name'>> = {}): WorkflowRevision {
  const workflow = createWorkflow({
    id: 'wf-sum',
    name: 'Sum',
    inputs: [io('wf-x', 'x'), io('wf-y', 'y')],
    outputs: [io('wf-total', 'total')],
    operators: [placeOperator('op-add', add)],
    links: [
      link('l1', [null, 'wf-x'], ['op-add', 'c-add-a']),
      link('l2', [null, 'wf-y'], ['op-add', 'c-add-b']),
      link('l3', ['op-add', 'c-add-sum'], [null, 'wf-total']),
    ],
  });
  return { ...workflow, ...overrides };
}

describe('createRevisionService', () => {
  describe('validateAndStore', () => {
    it('stores a draft workflow and its nesting rows', () => {
      const service = createService();
      service.validateAndStore(add);

      const stored = service.validateAndStore(sumWorkflow());

      expect(stored.writeKind).toBe('create');
      expect(service.getRevision('wf-sum')).toEqual(sumWorkflow());
      expect(service.listNesting('wf-sum')).toEqual([
        { workflowId: 'wf-sum', descendantId: 'c-add', viaOperatorPath: ['op-add'], depth: 1 },
      ]);
    });

    it('rejects an invalid graph and leaves the store untouched', () => {
      const store = new InMemoryRevisionStore();
      const service = createService(store);
      service.validateAndStore(add);

      const broken = sumWorkflow();
      broken.content.links.push(link('l4', [null, 'wf-x'], ['op-add', 'c-add-b']));

      expect(captureError(() => service.validateAndStore(broken))).toBeInstanceOf(ConnectivityError);
      expect(store.get('wf-sum')).toBeNull();
      expect(store.listNesting('wf-sum')).toEqual([]);
    });

    it('stamps the release time on DRAFT -> RELEASED', () => {
      const service = createService();
      service.validateAndStore(add);
      service.validateAndStore(sumWorkflow());

      const released = service.validateAndStore(sumWorkflow({ state: 'RELEASED' }));

      expect(released.writeKind).toBe('release');
      expect(released.revision.releasedTimestamp).toBe('2024-01-01T00:00:00.000Z');
    });

    it('keeps a supplied release time when a revision is created as released', () => {
      const service = createService();
      const imported = service.validateAndStore({
        ...add,
        state: 'RELEASED',
        releasedTimestamp: '2019-08-13T10:43:00.000Z',
      });

      expect(imported.revision.releasedTimestamp).toBe('2019-08-13T10:43:00.000Z');
    });

    it('only overwrites released content with allowOverwriteReleased and keeps the release time', () => {
      const service = createService();
      service.validateAndStore(add);
      service.validateAndStore(sumWorkflow({ state: 'RELEASED' }));

      const renamed = sumWorkflow({ state: 'RELEASED', name: 'Sum v2' });
      expect(captureError(() => service.validateAndStore(renamed))).toBeInstanceOf(ImmutableRevisionError);
      expect(service.getRevision('wf-sum').name).toBe('Sum');

      const overwritten = service.validateAndStore(renamed, true);
      expect(overwritten.writeKind).toBe('overwrite_released');
      expect(overwritten.revision).toMatchObject({
        name: 'Sum v2',
        state: 'RELEASED',
        releasedTimestamp: '2024-01-01T00:00:00.000Z',
      });
    });

    it('disables a released revision without applying other submitted changes', () => {
      const service = createService();
      service.validateAndStore(add);
      service.validateAndStore(sumWorkflow({ state: 'RELEASED' }));

      const disabled = service.validateAndStore(sumWorkflow({ state: 'DISABLED', name: 'Renamed while disabling' }));

      expect(disabled.writeKind).toBe('disable');
      expect(disabled.revision).toMatchObject({
        name: 'Sum',
        state: 'DISABLED',
        releasedTimestamp: '2024-01-01T00:00:00.000Z',
        disabledTimestamp: '2024-01-01T00:00:01.000Z',
      });
    });

    it('rejects transitions the lifecycle does not allow', () => {
      const service = createService();
      service.validateAndStore(add);

      expect(captureError(() => service.validateAndStore({ ...add, state: 'DISABLED' }))).toBeInstanceOf(
        InvalidTransitionError,
      );
    });

    it('rejects changing the kind of a stored revision', () => {
      const service = createService();
      service.validateAndStore(add);
      const workflowWithSameId = createWorkflow({ id: 'c-add', revisionGroupId: add.revisionGroupId });

      expect(captureError(() => service.validateAndStore(workflowWithSameId))).toMatchObject({
        code: 'REVISION_IDENTITY_CHANGED',
        field: 'type',
      });
      expect(captureError(() => service.validateAndStore(workflowWithSameId))).toBeInstanceOf(RevisionIdentityError);
    });

    it('rejects a version tag already used in the revision group', () => {
      const service = createService();
      service.validateAndStore(add);
      const sibling = createComponent({ id: 'c-add-copy', revisionGroupId: add.revisionGroupId, versionTag: '1.0.0' });

      const error = captureError(() => service.validateAndStore(sibling));
      expect(error).toBeInstanceOf(VersionTagConflictError);
      expect(error).toMatchObject({ existingRevisionId: 'c-add', versionTag: '1.0.0' });
    });

    it('rejects an update that closes a reference cycle and keeps the previous content', () => {
      const service = createService();
      const workflowA = createWorkflow({
        id: 'wf-a',
        inputs: [io('wfa-in', 'in')],
        outputs: [io('wfa-out', 'out')],
        links: [link('pass', [null, 'wfa-in'], [null, 'wfa-out'])],
      });
      service.validateAndStore(workflowA);
      const workflowB = createWorkflow({
        id: 'wf-b',
        inputs: [io('wfb-in', 'in')],
        outputs: [io('wfb-out', 'out')],
        operators: [placeOperator('op-to-a', workflowA)],
        links: [
          link('b1', [null, 'wfb-in'], ['op-to-a', 'wfa-in']),
          link('b2', ['op-to-a', 'wfa-out'], [null, 'wfb-out']),
        ],
      });
      service.validateAndStore(workflowB);

      const cyclicA = createWorkflow({
        id: 'wf-a',
        inputs: [io('wfa-in', 'in')],
        outputs: [io('wfa-out', 'out')],
        operators: [placeOperator('op-to-b', workflowB)],
        links: [
          link('a1', [null, 'wfa-in'], ['op-to-b', 'wfb-in']),
          link('a2', ['op-to-b', 'wfb-out'], [null, 'wfa-out']),
        ],
      });

      const error = captureError(() => service.validateAndStore(cyclicA));
      expect(error).toBeInstanceOf(StructuralError);
      expect(error).toMatchObject({ cyclePath: ['wf-a', 'wf-b', 'wf-a'] });
      expect(service.getRevision('wf-a')).toEqual(workflowA);
    });

    it('refuses to change the interface of a released revision that is still used', () => {
      const service = createService();
      const releasedAdd: TransformationRevision = { ...add, state: 'RELEASED' };
      service.validateAndStore(releasedAdd);
      service.validateAndStore(sumWorkflow());

      const narrowed = { ...releasedAdd, ioInterface: { inputs: [io('c-add-a', 'a')], outputs: add.ioInterface.outputs } };
      const error = captureError(() => service.validateAndStore(narrowed, true));
      expect(error).toBeInstanceOf(ReferencedRevisionError);
      expect(error).toMatchObject({ usedBy: ['wf-sum'], action: 'overwrite' });

      const redescribed = service.validateAndStore({ ...releasedAdd, description: 'Adds two integers' }, true);
      expect(redescribed.revision.description).toBe('Adds two integers');
    });

    it('refuses to change the inputs of a draft that an active workflow places', () => {
      const service = createService();
      service.validateAndStore(add);
      service.validateAndStore(sumWorkflow());

      const widened = {
        ...add,
        ioInterface: { inputs: [...add.ioInterface.inputs, io('c-add-c', 'c')], outputs: add.ioInterface.outputs },
      };
      const error = captureError(() => service.validateAndStore(widened));
      expect(error).toBeInstanceOf(ReferencedRevisionError);
      expect(error).toMatchObject({ revisionId: 'c-add', usedBy: ['wf-sum'], action: 'overwrite' });
      expect(service.getRevision('c-add')).toEqual(add);
      expect(service.compileForExecution('wf-sum').kind).toBe('workflow');

      const renamed = service.validateAndStore({ ...add, name: 'Plus' });
      expect(renamed.writeKind).toBe('edit_draft');
    });

    it('wraps store failures in RevisionStoreError', () => {
      class FailingStore extends InMemoryRevisionStore {
        override put(): void {
          throw new Error('disk full');
        }
      }
      const service = createService(new FailingStore());

      const error = captureError(() => service.validateAndStore(add));
      expect(error).toBeInstanceOf(RevisionStoreError);
      expect(error).toMatchObject({ operation: 'validate_and_store', cause: new Error('disk full') });
    });
  });

  describe('compileForExecution', () => {
    it('compiles and runs a stored workflow against its test wiring', async () => {
      const service = createService();
      service.validateAndStore(add);
      service.validateAndStore({
        ...sumWorkflow(),
        testWiring: {
          inputWirings: [
            { workflowInputName: 'x', adapterId: 'direct_provisioning', refId: null, filters: { value: 2 } },
            { workflowInputName: 'y', adapterId: 'direct_provisioning', refId: null, filters: { value: 3 } },
          ],
          outputWirings: [{ workflowOutputName: 'total', adapterId: 'direct_provisioning', refId: null }],
        },
      });

      const unit = service.compileForExecution('wf-sum');
      const inputs = resolveDirectProvisioningInputs(service.getRevision('wf-sum').testWiring);
      const result = await runExecutableUnit(unit, inputs, async (component, values) =>
        component.transformationId === 'c-add' ? { sum: Number(values.a) + Number(values.b) } : {},
      );

      expect(result).toEqual({ outputs: { total: 5 }, outputTypesByOutputName: { total: 'INT' } });
    });

    it('returns structurally equal units on repeated compilation', () => {
      const service = createService();
      service.validateAndStore(add);
      service.validateAndStore(sumWorkflow());

      expect(service.compileForExecution('wf-sum')).toEqual(service.compileForExecution('wf-sum'));
    });

    it('fails for unknown revisions', () => {
      expect(captureError(() => createService().compileForExecution('wf-none'))).toBeInstanceOf(RevisionNotFoundError);
    });

    it('reports revisions that changed while they were read', () => {
      class ShiftingStore extends InMemoryRevisionStore {
        shifting = false;
        private reads = 0;

        override get(id: string): TransformationRevision | null {
          const revision = super.get(id);
          if (!this.shifting || id !== 'c-add' || !revision) {
            return revision;
          }
          this.reads += 1;
          return this.reads > 1 ? { ...revision, description: 'changed concurrently' } : revision;
        }
      }
      const store = new ShiftingStore();
      const service = createService(store);
      service.validateAndStore(add);
      service.validateAndStore(sumWorkflow());
      store.shifting = true;

      const error = captureError(() => service.compileForExecution('wf-sum'));
      expect(error).toBeInstanceOf(ConcurrentModificationError);
      expect(error).toMatchObject({ revisionIds: ['c-add'], retryable: true });
    });
  });

  describe('deletion', () => {
    it('blocks deleting a revision used by a released workflow until the workflow is disabled', () => {
      const store = new InMemoryRevisionStore();
      const service = createService(store);
      service.validateAndStore(add);
      service.validateAndStore(sumWorkflow());
      service.validateAndStore(sumWorkflow({ state: 'RELEASED' }));

      const blocked = captureError(() => service.deleteRevision('c-add'));
      expect(blocked).toBeInstanceOf(ReferencedRevisionError);
      expect(blocked).toMatchObject({ revisionId: 'c-add', usedBy: ['wf-sum'], action: 'delete' });
      expect(store.get('c-add')).not.toBeNull();

      service.validateAndStore(sumWorkflow({ state: 'DISABLED' }));
      service.checkDeletable('c-add');
      service.deleteRevision('c-add');

      expect(store.get('c-add')).toBeNull();
    });

    it('removes the nesting rows owned by a deleted workflow', () => {
      const store = new InMemoryRevisionStore();
      const service = createService(store);
      service.validateAndStore(add);
      service.validateAndStore(sumWorkflow());

      service.deleteRevision('wf-sum');

      expect(store.listNesting('wf-sum')).toEqual([]);
      expect(service.usedBy('c-add')).toEqual([]);
    });

    it('fails for unknown revisions', () => {
      expect(captureError(() => createService().checkDeletable('c-none'))).toBeInstanceOf(RevisionNotFoundError);
    });
  });

  it('lists stored revisions in name order', () => {
    const service = createService();
    service.validateAndStore(add);
    service.validateAndStore(createNegateComponent());
    service.validateAndStore(sumWorkflow());

    expect(service.listRevisions().map(revision => revision.name)).toEqual(['Add', 'Negate', 'Sum']);
    expect(service.listRevisions({ type: 'WORKFLOW' }).map(revision => revision.id)).toEqual(['wf-sum']);
  });
});

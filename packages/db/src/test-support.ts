import { emptyTestWiring, type ComponentRevision, type IoConnector, type WorkflowRevision } from '@tessellate/shared';
import { createDatabase, type TessellateDatabase } from './connection.js';
import { migrateDatabase } from './migrate.js';

export function createMigratedDb(): TessellateDatabase {
  const db = createDatabase(':memory:');
  migrateDatabase(db);
  return db;
}

function int(id: string, name: string): IoConnector {
  return { id, name, dataType: 'INT' };
}

// add(a, b) -> sum
export function addComponent(overrides: Partial<ComponentRevision> = {}): ComponentRevision {
  return {
    id: 'c-add',
    revisionGroupId: 'c-add-group',
    name: 'Add',
    description: 'Adds two integers',
    category: 'Arithmetic',
    documentation: '',
    versionTag: '1.0.0',
    state: 'DRAFT',
    releasedTimestamp: null,
    disabledTimestamp: null,
    ioInterface: { inputs: [int('c-add-a', 'a'), int('c-add-b', 'b')], outputs: [int('c-add-sum', 'sum')] },
    testWiring: emptyTestWiring(),
    type: 'COMPONENT',
    content: 'export async function main({ a, b }) { return { sum: a + b }; }',
    ...overrides,
  };
}

// total = add(x, y)
export function sumWorkflow(overrides: Partial<WorkflowRevision> = {}): WorkflowRevision {
  const origin = { x: 0, y: 0 };
  return {
    id: 'wf-sum',
    revisionGroupId: 'wf-sum-group',
    name: 'Sum',
    description: '',
    category: 'Arithmetic',
    documentation: '',
    versionTag: '1.0.0',
    state: 'DRAFT',
    releasedTimestamp: null,
    disabledTimestamp: null,
    ioInterface: { inputs: [int('wf-x', 'x'), int('wf-y', 'y')], outputs: [int('wf-total', 'total')] },
    testWiring: {
      inputWirings: [
        { workflowInputName: 'x', adapterId: 'direct_provisioning', refId: null, filters: { value: 2 } },
        { workflowInputName: 'y', adapterId: 'direct_provisioning', refId: null, filters: { value: 3 } },
      ],
      outputWirings: [{ workflowOutputName: 'total', adapterId: 'direct_provisioning', refId: null }],
    },
    type: 'WORKFLOW',
    content: {
      inputs: [
        { ...int('wf-x', 'x'), position: origin },
        { ...int('wf-y', 'y'), position: origin },
      ],
      outputs: [{ ...int('wf-total', 'total'), position: origin }],
      constants: [],
      operators: [
        {
          id: 'op-add',
          name: 'Add',
          transformationId: 'c-add',
          inputs: [int('c-add-a', 'a'), int('c-add-b', 'b')],
          outputs: [int('c-add-sum', 'sum')],
          position: { x: 120, y: 40 },
        },
      ],
      links: [
        { id: 'l1', start: { operatorId: null, connectorId: 'wf-x' }, end: { operatorId: 'op-add', connectorId: 'c-add-a' }, path: [] },
        { id: 'l2', start: { operatorId: null, connectorId: 'wf-y' }, end: { operatorId: 'op-add', connectorId: 'c-add-b' }, path: [] },
        {
          id: 'l3',
          start: { operatorId: 'op-add', connectorId: 'c-add-sum' },
          end: { operatorId: null, connectorId: 'wf-total' },
          path: [{ x: 200, y: 40 }],
        },
      ],
    },
    ...overrides,
  };
}

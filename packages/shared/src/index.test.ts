import { describe, it, expect } from 'vitest';
import {
  compareNestingRows,
  compareOperatorPaths,
  compareStringsByCodeUnit,
  dataTypes,
  emptyTestWiring,
  isComponentRevision,
  isWorkflowRevision,
  revisionStates,
  type NestingRow,
  type TransformationRevision,
} from './index.js';

function componentRevision(): TransformationRevision {
  return {
    id: 'c-1',
    revisionGroupId: 'g-1',
    name: 'Add',
    description: '',
    category: 'Arithmetic',
    documentation: '',
    versionTag: '1.0.0',
    state: 'DRAFT',
    releasedTimestamp: null,
    disabledTimestamp: null,
    ioInterface: { inputs: [], outputs: [] },
    testWiring: emptyTestWiring(),
    type: 'COMPONENT',
    content: 'export async function main() { return {}; }',
  };
}

describe('shared types', () => {
  it('should list the lifecycle states in transition order', () => {
    expect(revisionStates).toEqual(['DRAFT', 'RELEASED', 'DISABLED']);
  });

  it('should include the wildcard data type', () => {
    expect(dataTypes).toContain('ANY');
    expect(dataTypes).toHaveLength(9);
  });

  it('should narrow revisions by type tag', () => {
    const revision = componentRevision();
    expect(isComponentRevision(revision)).toBe(true);
    expect(isWorkflowRevision(revision)).toBe(false);
  });
});

describe('compareStringsByCodeUnit', () => {
  it('orders uppercase before lowercase regardless of locale', () => {
    expect(['b', 'B', 'a'].sort(compareStringsByCodeUnit)).toEqual(['B', 'a', 'b']);
  });

  it('returns zero for equal strings', () => {
    expect(compareStringsByCodeUnit('same', 'same')).toBe(0);
  });
});

describe('compareOperatorPaths', () => {
  it('sorts a proper prefix before its extensions', () => {
    expect(compareOperatorPaths(['op-1'], ['op-1', 'op-2'])).toBeLessThan(0);
  });

  it('compares element-wise rather than by joined text', () => {
    expect(compareOperatorPaths(['a', 'z'], ['a-b'])).toBeLessThan(0);
  });
});

describe('compareNestingRows', () => {
  it('orders by descendant and then by operator path', () => {
    const rows: NestingRow[] = [
      { workflowId: 'wf', descendantId: 'c-2', viaOperatorPath: ['op-1'], depth: 1 },
      { workflowId: 'wf', descendantId: 'c-1', viaOperatorPath: ['op-2'], depth: 1 },
      { workflowId: 'wf', descendantId: 'c-1', viaOperatorPath: ['op-1', 'op-9'], depth: 2 },
    ];

    expect(rows.sort(compareNestingRows).map(row => row.viaOperatorPath)).toEqual([
      ['op-1', 'op-9'],
      ['op-2'],
      ['op-1'],
    ]);
  });
});

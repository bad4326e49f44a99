import {
  emptyTestWiring,
  type ComponentRevision,
  type ConstantValue,
  type DataType,
  type GraphConstant,
  type GraphLink,
  type GraphOperator,
  type IoConnector,
  type RevisionState,
  type TransformationRevision,
  type WorkflowRevision,
} from '@tessellate/shared';

const origin = { x: 0, y: 0 };

export function io(id: string, name: string, dataType: DataType = 'INT'): IoConnector {
  return { id, name, dataType };
}

type RevisionParams = {
  id: string;
  name?: string;
  state?: RevisionState;
  versionTag?: string;
  revisionGroupId?: string;
  inputs?: IoConnector[];
  outputs?: IoConnector[];
};

export function createComponent(params: RevisionParams & { code?: string }): ComponentRevision {
  return {
    id: params.id,
    revisionGroupId: params.revisionGroupId ?? `${params.id}-group`,
    name: params.name ?? params.id,
    description: '',
    category: 'Test',
    documentation: '',
    versionTag: params.versionTag ?? '1.0.0',
    state: params.state ?? 'DRAFT',
    releasedTimestamp: null,
    disabledTimestamp: null,
    ioInterface: { inputs: params.inputs ?? [], outputs: params.outputs ?? [] },
    testWiring: emptyTestWiring(),
    type: 'COMPONENT',
    content: params.code ?? 'export async function main() { return {}; }',
  };
}

export function createWorkflow(
  params: RevisionParams & { operators?: GraphOperator[]; links?: GraphLink[]; constants?: GraphConstant[] },
): WorkflowRevision {
  const inputs = params.inputs ?? [];
  const outputs = params.outputs ?? [];
  return {
    id: params.id,
    revisionGroupId: params.revisionGroupId ?? `${params.id}-group`,
    name: params.name ?? params.id,
    description: '',
    category: 'Test',
    documentation: '',
    versionTag: params.versionTag ?? '1.0.0',
    state: params.state ?? 'DRAFT',
    releasedTimestamp: null,
    disabledTimestamp: null,
    ioInterface: { inputs, outputs },
    testWiring: emptyTestWiring(),
    type: 'WORKFLOW',
    content: {
      inputs: inputs.map(connector => ({ ...connector, position: origin })),
      outputs: outputs.map(connector => ({ ...connector, position: origin })),
      constants: params.constants ?? [],
      operators: params.operators ?? [],
      links: params.links ?? [],
    },
  };
}

/** Places a revision into a graph with a snapshot of its current interface. */
export function placeOperator(operatorId: string, revision: TransformationRevision): GraphOperator {
  return {
    id: operatorId,
    name: revision.name,
    transformationId: revision.id,
    inputs: revision.ioInterface.inputs.map(connector => ({ ...connector })),
    outputs: revision.ioInterface.outputs.map(connector => ({ ...connector })),
    position: origin,
  };
}

export function link(id: string, start: [string | null, string], end: [string | null, string]): GraphLink {
  return {
    id,
    start: { operatorId: start[0], connectorId: start[1] },
    end: { operatorId: end[0], connectorId: end[1] },
    path: [],
  };
}

export function constant(
  id: string,
  operatorId: string,
  connectorId: string,
  value: ConstantValue,
  dataType: DataType = 'INT',
): GraphConstant {
  return { id, operatorId, connectorId, dataType, value, position: origin };
}

// add(a, b) -> sum
export function createAddComponent(id = 'c-add', state: RevisionState = 'DRAFT'): ComponentRevision {
  return createComponent({
    id,
    name: 'Add',
    state,
    inputs: [io(`${id}-a`, 'a'), io(`${id}-b`, 'b')],
    outputs: [io(`${id}-sum`, 'sum')],
  });
}

// negate(value) -> result
export function createNegateComponent(id = 'c-neg', state: RevisionState = 'DRAFT'): ComponentRevision {
  return createComponent({
    id,
    name: 'Negate',
    state,
    inputs: [io(`${id}-value`, 'value')],
    outputs: [io(`${id}-result`, 'result')],
  });
}

export function resolverFor(revisions: readonly TransformationRevision[]): (id: string) => TransformationRevision | null {
  const byId = new Map(revisions.map(revision => [revision.id, revision]));
  return id => byId.get(id) ?? null;
}

export function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the operation to throw.');
}

export const transformationTypes = ['COMPONENT', 'WORKFLOW'] as const;
export type TransformationType = (typeof transformationTypes)[number];

export const revisionStates = ['DRAFT', 'RELEASED', 'DISABLED'] as const;
export type RevisionState = (typeof revisionStates)[number];

export const dataTypes = [
  'INT',
  'FLOAT',
  'STRING',
  'BOOLEAN',
  'SERIES',
  'DATAFRAME',
  'MULTITSFRAME',
  'PLOTLYJSON',
  'ANY',
] as const;
export type DataType = (typeof dataTypes)[number];

export type Position = {
  x: number;
  y: number;
};

// Named, typed port of a revision or operator
export type IoConnector = {
  id: string;
  name: string;
  dataType: DataType;
};

export type IoInterface = {
  inputs: IoConnector[];
  outputs: IoConnector[];
};

// Workflow-level input/output as drawn on the canvas
export type WorkflowConnector = IoConnector & {
  position: Position;
};

export type ConstantValue = string | number | boolean | null;

// Fixed value bound to an operator input in place of a link
export type GraphConstant = {
  id: string;
  operatorId: string;
  connectorId: string;
  dataType: DataType;
  value: ConstantValue;
  position: Position;
};

// Placement of a referenced revision inside a workflow. Connectors are a
// snapshot of the referenced revision's interface.
export type GraphOperator = {
  id: string;
  name: string;
  transformationId: string;
  inputs: IoConnector[];
  outputs: IoConnector[];
  position: Position;
};

// `operatorId: null` addresses a workflow-level connector.
export type LinkEndpoint = {
  operatorId: string | null;
  connectorId: string;
};

export type GraphLink = {
  id: string;
  start: LinkEndpoint;
  end: LinkEndpoint;
  path: Position[];
};

export type WorkflowGraph = {
  inputs: WorkflowConnector[];
  outputs: WorkflowConnector[];
  constants: GraphConstant[];
  operators: GraphOperator[];
  links: GraphLink[];
};

export type FilterValue = string | number | boolean | null;

export type InputWiring = {
  workflowInputName: string;
  adapterId: string;
  refId: string | null;
  filters: Record<string, FilterValue>;
};

export type OutputWiring = {
  workflowOutputName: string;
  adapterId: string;
  refId: string | null;
};

export type TestWiring = {
  inputWirings: InputWiring[];
  outputWirings: OutputWiring[];
};

type RevisionBase = {
  id: string;
  revisionGroupId: string;
  name: string;
  description: string;
  category: string;
  documentation: string;
  versionTag: string;
  state: RevisionState;
  releasedTimestamp: string | null;
  disabledTimestamp: string | null;
  ioInterface: IoInterface;
  testWiring: TestWiring;
};

export type ComponentRevision = RevisionBase & {
  type: 'COMPONENT';
  content: string;
};

export type WorkflowRevision = RevisionBase & {
  type: 'WORKFLOW';
  content: WorkflowGraph;
};

export type TransformationRevision = ComponentRevision | WorkflowRevision;

// One row per distinct path from a workflow down to a (transitive) descendant
export type NestingRow = {
  workflowId: string;
  descendantId: string;
  viaOperatorPath: string[];
  depth: number;
};

export function isWorkflowRevision(revision: TransformationRevision): revision is WorkflowRevision {
  return revision.type === 'WORKFLOW';
}

export function isComponentRevision(revision: TransformationRevision): revision is ComponentRevision {
  return revision.type === 'COMPONENT';
}

export function emptyTestWiring(): TestWiring {
  return { inputWirings: [], outputWirings: [] };
}

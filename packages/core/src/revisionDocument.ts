import {
  dataTypes,
  revisionStates,
  type GraphLink,
  type IoConnector,
  type TransformationRevision,
  type WorkflowConnector,
  type WorkflowGraph,
} from '@tessellate/shared';
import { z } from 'zod';
import { RevisionDocumentError } from './errors.js';

const positionSchema = z.object({ x: z.number(), y: z.number() });
const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const ioConnectorSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  data_type: z.enum(dataTypes),
});

const workflowConnectorSchema = ioConnectorSchema.extend({
  position: positionSchema.default({ x: 0, y: 0 }),
});

const ioInterfaceSchema = z.object({
  inputs: z.array(ioConnectorSchema).default([]),
  outputs: z.array(ioConnectorSchema).default([]),
});

const linkEndpointSchema = z.object({
  operator: z.string().min(1).nullable().optional(),
  connector: z.object({ id: z.string().min(1) }).passthrough(),
});

const workflowContentSchema = z.object({
  inputs: z.array(workflowConnectorSchema).default([]),
  outputs: z.array(workflowConnectorSchema).default([]),
  constants: z
    .array(
      z.object({
        id: z.string().min(1),
        operator_id: z.string().min(1),
        connector_id: z.string().min(1),
        data_type: z.enum(dataTypes),
        value: scalarSchema,
        position: positionSchema.default({ x: 0, y: 0 }),
      }),
    )
    .default([]),
  operators: z
    .array(
      z.object({
        id: z.string().min(1),
        name: z.string(),
        transformation_id: z.string().min(1),
        inputs: z.array(ioConnectorSchema).default([]),
        outputs: z.array(ioConnectorSchema).default([]),
        position: positionSchema.default({ x: 0, y: 0 }),
      }),
    )
    .default([]),
  links: z
    .array(
      z.object({
        id: z.string().min(1),
        start: linkEndpointSchema,
        end: linkEndpointSchema,
        path: z.array(positionSchema).default([]),
      }),
    )
    .default([]),
});

const testWiringSchema = z.object({
  input_wirings: z
    .array(
      z.object({
        workflow_input_name: z.string().min(1),
        adapter_id: z.string().min(1),
        ref_id: z.string().nullable().default(null),
        filters: z.record(scalarSchema).default({}),
      }),
    )
    .default([]),
  output_wirings: z
    .array(
      z.object({
        workflow_output_name: z.string().min(1),
        adapter_id: z.string().min(1),
        ref_id: z.string().nullable().default(null),
      }),
    )
    .default([]),
});

const revisionBaseSchema = z.object({
  id: z.string().min(1),
  revision_group_id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(''),
  category: z.string().default(''),
  documentation: z.string().default(''),
  version_tag: z.string().min(1),
  state: z.enum(revisionStates),
  released_timestamp: z.string().nullable().default(null),
  disabled_timestamp: z.string().nullable().default(null),
  io_interface: ioInterfaceSchema,
  test_wiring: testWiringSchema.default({}),
});

export const revisionDocumentSchema = z.discriminatedUnion('type', [
  revisionBaseSchema.extend({ type: z.literal('COMPONENT'), content: z.string() }),
  revisionBaseSchema.extend({ type: z.literal('WORKFLOW'), content: workflowContentSchema }),
]);

export type RevisionDocument = z.input<typeof revisionDocumentSchema>;
type ParsedRevisionDocument = z.output<typeof revisionDocumentSchema>;

function toIoConnector(connector: z.output<typeof ioConnectorSchema>): IoConnector {
  return { id: connector.id, name: connector.name, dataType: connector.data_type };
}

function toWorkflowConnector(connector: z.output<typeof workflowConnectorSchema>): WorkflowConnector {
  return { ...toIoConnector(connector), position: connector.position };
}

function toLinkEndpoint(endpoint: z.output<typeof linkEndpointSchema>): GraphLink['start'] {
  return { operatorId: endpoint.operator ?? null, connectorId: endpoint.connector.id };
}

function toWorkflowGraph(content: z.output<typeof workflowContentSchema>): WorkflowGraph {
  return {
    inputs: content.inputs.map(toWorkflowConnector),
    outputs: content.outputs.map(toWorkflowConnector),
    constants: content.constants.map(constant => ({
      id: constant.id,
      operatorId: constant.operator_id,
      connectorId: constant.connector_id,
      dataType: constant.data_type,
      value: constant.value,
      position: constant.position,
    })),
    operators: content.operators.map(operator => ({
      id: operator.id,
      name: operator.name,
      transformationId: operator.transformation_id,
      inputs: operator.inputs.map(toIoConnector),
      outputs: operator.outputs.map(toIoConnector),
      position: operator.position,
    })),
    links: content.links.map(link => ({
      id: link.id,
      start: toLinkEndpoint(link.start),
      end: toLinkEndpoint(link.end),
      path: link.path,
    })),
  };
}

function toTransformationRevision(document: ParsedRevisionDocument): TransformationRevision {
  const base = {
    id: document.id,
    revisionGroupId: document.revision_group_id,
    name: document.name,
    description: document.description,
    category: document.category,
    documentation: document.documentation,
    versionTag: document.version_tag,
    state: document.state,
    releasedTimestamp: document.released_timestamp,
    disabledTimestamp: document.disabled_timestamp,
    ioInterface: {
      inputs: document.io_interface.inputs.map(toIoConnector),
      outputs: document.io_interface.outputs.map(toIoConnector),
    },
    testWiring: {
      inputWirings: document.test_wiring.input_wirings.map(wiring => ({
        workflowInputName: wiring.workflow_input_name,
        adapterId: wiring.adapter_id,
        refId: wiring.ref_id,
        filters: wiring.filters,
      })),
      outputWirings: document.test_wiring.output_wirings.map(wiring => ({
        workflowOutputName: wiring.workflow_output_name,
        adapterId: wiring.adapter_id,
        refId: wiring.ref_id,
      })),
    },
  };

  if (document.type === 'COMPONENT') {
    return { ...base, type: 'COMPONENT', content: document.content };
  }
  return { ...base, type: 'WORKFLOW', content: toWorkflowGraph(document.content) };
}

/**
 * Decodes an exported revision document (snake_case JSON) into a revision.
 * Absent optional fields take their empty defaults.
 */
export function parseRevisionDocument(value: unknown): TransformationRevision {
  const result = revisionDocumentSchema.safeParse(value);
  if (!result.success) {
    throw new RevisionDocumentError(
      result.error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`),
    );
  }
  return toTransformationRevision(result.data);
}

export function parseRevisionDocuments(value: unknown): TransformationRevision[] {
  return Array.isArray(value) ? value.map(parseRevisionDocument) : [parseRevisionDocument(value)];
}

function fromIoConnector(connector: IoConnector): z.output<typeof ioConnectorSchema> {
  return { id: connector.id, name: connector.name, data_type: connector.dataType };
}

function fromLinkEndpoint(endpoint: GraphLink['start'], graph: WorkflowGraph): z.output<typeof linkEndpointSchema> {
  const connectors =
    endpoint.operatorId === null
      ? [...graph.inputs, ...graph.outputs]
      : [
          ...(graph.operators.find(operator => operator.id === endpoint.operatorId)?.inputs ?? []),
          ...(graph.operators.find(operator => operator.id === endpoint.operatorId)?.outputs ?? []),
        ];
  const connector = connectors.find(candidate => candidate.id === endpoint.connectorId);
  return {
    operator: endpoint.operatorId,
    connector: connector ? fromIoConnector(connector) : { id: endpoint.connectorId },
  };
}

export function toRevisionDocument(revision: TransformationRevision): ParsedRevisionDocument {
  const base = {
    id: revision.id,
    revision_group_id: revision.revisionGroupId,
    name: revision.name,
    description: revision.description,
    category: revision.category,
    documentation: revision.documentation,
    version_tag: revision.versionTag,
    state: revision.state,
    released_timestamp: revision.releasedTimestamp,
    disabled_timestamp: revision.disabledTimestamp,
    io_interface: {
      inputs: revision.ioInterface.inputs.map(fromIoConnector),
      outputs: revision.ioInterface.outputs.map(fromIoConnector),
    },
    test_wiring: {
      input_wirings: revision.testWiring.inputWirings.map(wiring => ({
        workflow_input_name: wiring.workflowInputName,
        adapter_id: wiring.adapterId,
        ref_id: wiring.refId,
        filters: wiring.filters,
      })),
      output_wirings: revision.testWiring.outputWirings.map(wiring => ({
        workflow_output_name: wiring.workflowOutputName,
        adapter_id: wiring.adapterId,
        ref_id: wiring.refId,
      })),
    },
  };

  if (revision.type === 'COMPONENT') {
    return { ...base, type: 'COMPONENT', content: revision.content };
  }

  const graph = revision.content;
  return {
    ...base,
    type: 'WORKFLOW',
    content: {
      inputs: graph.inputs.map(input => ({ ...fromIoConnector(input), position: input.position })),
      outputs: graph.outputs.map(output => ({ ...fromIoConnector(output), position: output.position })),
      constants: graph.constants.map(constant => ({
        id: constant.id,
        operator_id: constant.operatorId,
        connector_id: constant.connectorId,
        data_type: constant.dataType,
        value: constant.value,
        position: constant.position,
      })),
      operators: graph.operators.map(operator => ({
        id: operator.id,
        name: operator.name,
        transformation_id: operator.transformationId,
        inputs: operator.inputs.map(fromIoConnector),
        outputs: operator.outputs.map(fromIoConnector),
        position: operator.position,
      })),
      links: graph.links.map(link => ({
        id: link.id,
        start: fromLinkEndpoint(link.start, graph),
        end: fromLinkEndpoint(link.end, graph),
        path: link.path,
      })),
    },
  };
}

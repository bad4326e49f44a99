import type { GraphConstant, GraphLink, GraphOperator, IoConnector, WorkflowGraph } from '@tessellate/shared';
import { ConnectivityError, StructuralError } from './errors.js';

export type EndpointRole = 'workflow_input' | 'workflow_output' | 'operator_input' | 'operator_output';

export type IndexedEndpoint = {
  role: EndpointRole;
  /** Operator array index, `null` for workflow-level connectors. */
  operatorIndex: number | null;
  operatorId: string | null;
  connector: IoConnector;
};

export type EndpointBinding =
  | { kind: 'link'; link: GraphLink; source: IndexedEndpoint }
  | { kind: 'constant'; constant: GraphConstant };

export type IndexedWorkflowGraph = {
  graph: WorkflowGraph;
  operators: readonly GraphOperator[];
  operatorIndexById: ReadonlyMap<string, number>;
  /** Every destination (operator input or workflow output) in declaration order. */
  destinations: readonly IndexedEndpoint[];
  /** Incoming bindings per destination key, in link-then-constant declaration order. */
  bindingsByDestination: ReadonlyMap<string, EndpointBinding[]>;
  /** Successor operator indices, ascending and without duplicates. */
  successors: readonly number[][];
  predecessors: readonly number[][];
};

export function endpointKey(operatorId: string | null, connectorId: string): string {
  return operatorId === null ? `workflow\u0000${connectorId}` : `operator\u0000${operatorId}\u0000${connectorId}`;
}

function claimId(seen: Set<string>, id: string, ref: { operatorId: string | null; connectorId: string }): void {
  if (seen.has(id)) {
    throw new ConnectivityError(ref, 'duplicate_identifier');
  }
  seen.add(id);
}

/**
 * Resolves every id in the graph to array positions and collects the incoming
 * bindings of each destination connector.
 *
 * Throws `ConnectivityError` for duplicated ids and for links or constants whose
 * ends do not resolve to a usable connector. Fan-in and missing bindings are left
 * for the caller to judge.
 */
export function indexWorkflowGraph(graph: WorkflowGraph): IndexedWorkflowGraph {
  const sources = new Map<string, IndexedEndpoint>();
  const destinationsByKey = new Map<string, IndexedEndpoint>();
  const destinations: IndexedEndpoint[] = [];

  const workflowConnectorIds = new Set<string>();
  for (const input of graph.inputs) {
    claimId(workflowConnectorIds, input.id, { operatorId: null, connectorId: input.id });
    sources.set(endpointKey(null, input.id), {
      role: 'workflow_input',
      operatorIndex: null,
      operatorId: null,
      connector: input,
    });
  }

  const operatorIndexById = new Map<string, number>();
  graph.operators.forEach((operator, operatorIndex) => {
    if (operatorIndexById.has(operator.id)) {
      throw new ConnectivityError({ operatorId: operator.id, connectorId: '' }, 'duplicate_identifier');
    }
    operatorIndexById.set(operator.id, operatorIndex);

    const connectorIds = new Set<string>();
    for (const input of operator.inputs) {
      claimId(connectorIds, input.id, { operatorId: operator.id, connectorId: input.id });
      const endpoint: IndexedEndpoint = { role: 'operator_input', operatorIndex, operatorId: operator.id, connector: input };
      destinationsByKey.set(endpointKey(operator.id, input.id), endpoint);
      destinations.push(endpoint);
    }
    for (const output of operator.outputs) {
      claimId(connectorIds, output.id, { operatorId: operator.id, connectorId: output.id });
      sources.set(endpointKey(operator.id, output.id), {
        role: 'operator_output',
        operatorIndex,
        operatorId: operator.id,
        connector: output,
      });
    }
  });

  for (const output of graph.outputs) {
    claimId(workflowConnectorIds, output.id, { operatorId: null, connectorId: output.id });
    const endpoint: IndexedEndpoint = { role: 'workflow_output', operatorIndex: null, operatorId: null, connector: output };
    destinationsByKey.set(endpointKey(null, output.id), endpoint);
    destinations.push(endpoint);
  }

  const bindingsByDestination = new Map<string, EndpointBinding[]>();
  const successorSets = graph.operators.map(() => new Set<number>());
  const predecessorSets = graph.operators.map(() => new Set<number>());

  const linkIds = new Set<string>();
  for (const link of graph.links) {
    claimId(linkIds, link.id, { operatorId: link.end.operatorId, connectorId: link.end.connectorId });

    const source = sources.get(endpointKey(link.start.operatorId, link.start.connectorId));
    if (!source) {
      throw new ConnectivityError(link.start, 'unknown_endpoint');
    }
    const destinationKey = endpointKey(link.end.operatorId, link.end.connectorId);
    const destination = destinationsByKey.get(destinationKey);
    if (!destination) {
      throw new ConnectivityError(link.end, 'unknown_endpoint');
    }

    appendBinding(bindingsByDestination, destinationKey, { kind: 'link', link, source });
    if (source.operatorIndex !== null && destination.operatorIndex !== null) {
      successorSets[source.operatorIndex]?.add(destination.operatorIndex);
      predecessorSets[destination.operatorIndex]?.add(source.operatorIndex);
    }
  }

  const constantIds = new Set<string>();
  for (const constant of graph.constants) {
    const ref = { operatorId: constant.operatorId, connectorId: constant.connectorId };
    claimId(constantIds, constant.id, ref);
    const destinationKey = endpointKey(constant.operatorId, constant.connectorId);
    const destination = destinationsByKey.get(destinationKey);
    if (!destination || destination.role !== 'operator_input') {
      throw new ConnectivityError(ref, 'unknown_endpoint');
    }
    appendBinding(bindingsByDestination, destinationKey, { kind: 'constant', constant });
  }

  return {
    graph,
    operators: graph.operators,
    operatorIndexById,
    destinations,
    bindingsByDestination,
    successors: successorSets.map(toSortedIndices),
    predecessors: predecessorSets.map(toSortedIndices),
  };
}

function appendBinding(bindings: Map<string, EndpointBinding[]>, key: string, binding: EndpointBinding): void {
  const existing = bindings.get(key);
  if (existing) {
    existing.push(binding);
    return;
  }
  bindings.set(key, [binding]);
}

function toSortedIndices(indices: Set<number>): number[] {
  return [...indices].sort((a, b) => a - b);
}

export function bindingsOf(indexed: IndexedWorkflowGraph, endpoint: IndexedEndpoint): EndpointBinding[] {
  return indexed.bindingsByDestination.get(endpointKey(endpoint.operatorId, endpoint.connector.id)) ?? [];
}

/**
 * Depth-first search over operators in declaration order. Returns the operator ids
 * of the first cycle met, from the re-entered operator back to itself, or `null`.
 */
export function findOperatorCycle(indexed: IndexedWorkflowGraph): string[] | null {
  const operatorCount = indexed.operators.length;
  // 0 = unvisited, 1 = on the stack, 2 = finished
  const marks = new Array<number>(operatorCount).fill(0);
  const stack: number[] = [];

  const visit = (node: number): number[] | null => {
    marks[node] = 1;
    stack.push(node);
    for (const next of indexed.successors[node] ?? []) {
      if (marks[next] === 1) {
        return [...stack.slice(stack.indexOf(next)), next];
      }
      if (marks[next] === 0) {
        const cycle = visit(next);
        if (cycle) {
          return cycle;
        }
      }
    }
    stack.pop();
    marks[node] = 2;
    return null;
  };

  for (let node = 0; node < operatorCount; node += 1) {
    if (marks[node] !== 0) {
      continue;
    }
    const cycle = visit(node);
    if (cycle) {
      return cycle.map(index => operatorIdAt(indexed, index));
    }
  }

  return null;
}

function operatorIdAt(indexed: IndexedWorkflowGraph, index: number): string {
  return indexed.operators[index]?.id ?? `#${index}`;
}

/**
 * Kahn's algorithm; among ready operators the earliest declared runs first.
 * Throws `StructuralError` instead of returning a partial order.
 */
export function orderOperators(indexed: IndexedWorkflowGraph): number[] {
  const remainingInputs = indexed.predecessors.map(predecessors => predecessors.length);
  const ready: number[] = [];
  remainingInputs.forEach((count, index) => {
    if (count === 0) {
      ready.push(index);
    }
  });

  const order: number[] = [];
  while (ready.length > 0) {
    const next = ready.shift();
    if (next === undefined) {
      break;
    }
    order.push(next);

    for (const successor of indexed.successors[next] ?? []) {
      const left = (remainingInputs[successor] ?? 0) - 1;
      remainingInputs[successor] = left;
      if (left === 0) {
        insertSorted(ready, successor);
      }
    }
  }

  if (order.length !== indexed.operators.length) {
    const unordered = indexed.operators.filter((_, index) => !order.includes(index)).map(operator => operator.id);
    throw new StructuralError(findOperatorCycle(indexed) ?? unordered, 'operators');
  }

  return order;
}

function insertSorted(values: number[], value: number): void {
  const position = values.findIndex(existing => existing > value);
  if (position === -1) {
    values.push(value);
    return;
  }
  values.splice(position, 0, value);
}

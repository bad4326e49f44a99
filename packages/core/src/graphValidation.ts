import type {
  GraphOperator,
  IoConnector,
  RevisionState,
  TransformationRevision,
  WorkflowGraph,
} from '@tessellate/shared';
import {
  ConnectivityError,
  DanglingReferenceError,
  InterfaceMismatchError,
  StructuralError,
  TypeMismatchError,
  ValidationError,
} from './errors.js';
import { bindingsOf, findOperatorCycle, indexWorkflowGraph, type IndexedWorkflowGraph } from './graphIndex.js';

export type GraphValidationContext = {
  /** Id of the workflow revision that owns the graph. */
  workflowId: string;
  /** State the workflow is about to be stored in. */
  requestedState: RevisionState;
  resolveRevision: (id: string) => TransformationRevision | null;
};

export type GraphValidationResult = { ok: true } | { ok: false; error: ValidationError };

export function validateWorkflowGraph(graph: WorkflowGraph, context: GraphValidationContext): GraphValidationResult {
  try {
    assertValidWorkflowGraph(graph, context);
    return { ok: true };
  } catch (error) {
    if (error instanceof ValidationError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Throws the first violated graph invariant. Checks run in a fixed order: element
 * integrity, operator references, data types, bindings per connector, operator
 * cycles, then cycles through revision references.
 */
export function assertValidWorkflowGraph(graph: WorkflowGraph, context: GraphValidationContext): void {
  const indexed = indexWorkflowGraph(graph);

  for (const operator of graph.operators) {
    assertOperatorReference(operator, context);
  }

  assertBindingTypes(indexed);
  assertSingleBindingPerDestination(indexed);

  const operatorCycle = findOperatorCycle(indexed);
  if (operatorCycle) {
    throw new StructuralError(operatorCycle, 'operators');
  }

  const referenceCycle = findReferenceCycle(graph, context);
  if (referenceCycle) {
    throw new StructuralError(referenceCycle, 'revisions');
  }
}

function assertOperatorReference(operator: GraphOperator, context: GraphValidationContext): void {
  // A workflow placing itself is a reference cycle, reported once the graph is otherwise sound.
  if (operator.transformationId === context.workflowId) {
    return;
  }

  const target = context.resolveRevision(operator.transformationId);
  if (!target) {
    throw new DanglingReferenceError(operator.id, operator.transformationId, 'missing');
  }
  if (target.state === 'DISABLED' && context.requestedState === 'RELEASED') {
    throw new DanglingReferenceError(operator.id, operator.transformationId, 'disabled');
  }

  assertMatchingConnectors(context.workflowId, operator, 'input', operator.inputs, target.ioInterface.inputs);
  assertMatchingConnectors(context.workflowId, operator, 'output', operator.outputs, target.ioInterface.outputs);
}

function assertMatchingConnectors(
  workflowId: string,
  operator: GraphOperator,
  side: 'input' | 'output',
  placed: readonly IoConnector[],
  declared: readonly IoConnector[],
): void {
  const placedNames = new Set<string>();
  for (const connector of placed) {
    if (placedNames.has(connector.name)) {
      throw new InterfaceMismatchError(
        workflowId,
        `${side} "${connector.name}" is placed more than once on the operator.`,
        operator.id,
      );
    }
    placedNames.add(connector.name);
  }

  for (const connector of declared) {
    const match = placed.find(candidate => candidate.name === connector.name);
    if (!match) {
      throw new InterfaceMismatchError(
        workflowId,
        `${side} "${connector.name}" of transformation "${operator.transformationId}" is not present on the operator.`,
        operator.id,
      );
    }
    if (match.dataType !== connector.dataType) {
      throw new InterfaceMismatchError(
        workflowId,
        `${side} "${connector.name}" is ${match.dataType} on the operator but ${connector.dataType} on transformation "${operator.transformationId}".`,
        operator.id,
      );
    }
  }

  for (const connector of placed) {
    if (!declared.some(candidate => candidate.name === connector.name)) {
      throw new InterfaceMismatchError(
        workflowId,
        `${side} "${connector.name}" is not declared by transformation "${operator.transformationId}".`,
        operator.id,
      );
    }
  }

  if (placed.length !== declared.length) {
    throw new InterfaceMismatchError(
      workflowId,
      `operator places ${placed.length} ${side}(s) but transformation "${operator.transformationId}" declares ${declared.length}.`,
      operator.id,
    );
  }
}

export function acceptsDataType(destination: IoConnector['dataType'], source: IoConnector['dataType']): boolean {
  return destination === 'ANY' || destination === source;
}

function assertBindingTypes(indexed: IndexedWorkflowGraph): void {
  for (const destination of indexed.destinations) {
    const expected = destination.connector.dataType;
    for (const binding of bindingsOf(indexed, destination)) {
      if (binding.kind === 'link') {
        const actual = binding.source.connector.dataType;
        if (!acceptsDataType(expected, actual)) {
          throw new TypeMismatchError(binding.link.id, expected, actual, 'link');
        }
      } else if (!acceptsDataType(expected, binding.constant.dataType)) {
        throw new TypeMismatchError(binding.constant.id, expected, binding.constant.dataType, 'constant');
      }
    }
  }
}

function assertSingleBindingPerDestination(indexed: IndexedWorkflowGraph): void {
  for (const destination of indexed.destinations) {
    const count = bindingsOf(indexed, destination).length;
    if (count === 1) {
      continue;
    }
    throw new ConnectivityError(
      { operatorId: destination.operatorId, connectorId: destination.connector.id },
      count === 0 ? 'missing_binding' : 'multiple_bindings',
    );
  }
}

function distinctTargets(graph: WorkflowGraph): string[] {
  return [...new Set(graph.operators.map(operator => operator.transformationId))];
}

/**
 * Follows transformation references from the workflow under validation, using its
 * candidate graph rather than any stored version of itself. Returns revision ids
 * from the re-entered revision back to itself, or `null`.
 */
export function findReferenceCycle(graph: WorkflowGraph, context: GraphValidationContext): string[] | null {
  const finished = new Set<string>();
  const stack: string[] = [];

  const referencesOf = (revisionId: string): string[] => {
    if (revisionId === context.workflowId) {
      return distinctTargets(graph);
    }
    const revision = context.resolveRevision(revisionId);
    return revision?.type === 'WORKFLOW' ? distinctTargets(revision.content) : [];
  };

  const visit = (revisionId: string): string[] | null => {
    stack.push(revisionId);
    for (const next of referencesOf(revisionId)) {
      const onStack = stack.indexOf(next);
      if (onStack !== -1) {
        return [...stack.slice(onStack), next];
      }
      if (!finished.has(next)) {
        const cycle = visit(next);
        if (cycle) {
          return cycle;
        }
      }
    }
    stack.pop();
    finished.add(revisionId);
    return null;
  };

  return visit(context.workflowId);
}

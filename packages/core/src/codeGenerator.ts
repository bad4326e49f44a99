import type {
  ConstantValue,
  DataType,
  GraphOperator,
  IoInterface,
  TransformationRevision,
  WorkflowRevision,
} from '@tessellate/shared';
import { ConnectivityError, StructuralError, UnresolvedDependencyError } from './errors.js';
import { bindingsOf, indexWorkflowGraph, orderOperators, type EndpointBinding, type IndexedEndpoint } from './graphIndex.js';
import type { Logger } from './logger.js';

export type ValueSource =
  | { kind: 'workflow_input'; inputName: string }
  | { kind: 'step_output'; stepIndex: number; operatorId: string; outputName: string }
  | { kind: 'constant'; value: ConstantValue; dataType: DataType };

export type StepInput = {
  inputName: string;
  source: ValueSource;
};

export type ExecutionStep = {
  operatorId: string;
  operatorName: string;
  unit: ExecutableUnit;
  inputs: StepInput[];
};

export type OutputBinding = {
  outputName: string;
  source: ValueSource;
};

type UnitBase = {
  transformationId: string;
  name: string;
  versionTag: string;
  ioInterface: IoInterface;
};

export type ComponentUnit = UnitBase & {
  kind: 'component';
  code: string;
};

export type WorkflowUnit = UnitBase & {
  kind: 'workflow';
  steps: ExecutionStep[];
  outputs: OutputBinding[];
};

export type ExecutableUnit = ComponentUnit | WorkflowUnit;

export type CompileDependencies = {
  loadRevision: (id: string) => TransformationRevision | null;
  logger?: Logger;
};

/**
 * Compiles a revision into an executable unit. Each referenced revision is
 * compiled once per call and the resulting unit is shared by every operator that
 * places it.
 */
export function compileRevision(revision: TransformationRevision, dependencies: CompileDependencies): ExecutableUnit {
  const compiled = new Map<string, ExecutableUnit>();
  const inProgress: string[] = [];

  const compile = (current: TransformationRevision): ExecutableUnit => {
    const memoized = compiled.get(current.id);
    if (memoized) {
      return memoized;
    }

    const reentry = inProgress.indexOf(current.id);
    if (reentry !== -1) {
      const error = new StructuralError([...inProgress.slice(reentry), current.id], 'revisions');
      dependencies.logger?.error({ err: error, revisionId: current.id }, 'Reference cycle met during compilation');
      throw error;
    }

    inProgress.push(current.id);
    const unit = current.type === 'COMPONENT' ? compileComponent(current) : compileWorkflow(current);
    inProgress.pop();

    compiled.set(current.id, unit);
    return unit;
  };

  const compileDependency = (workflowId: string, operator: GraphOperator): ExecutableUnit => {
    const target = dependencies.loadRevision(operator.transformationId);
    if (!target) {
      throw new UnresolvedDependencyError(workflowId, operator.id, operator.transformationId, 'missing');
    }

    try {
      return compile(target);
    } catch (error) {
      if (error instanceof StructuralError || error instanceof UnresolvedDependencyError) {
        throw error;
      }
      throw new UnresolvedDependencyError(workflowId, operator.id, operator.transformationId, 'compile_failed', {
        cause: error,
      });
    }
  };

  const compileWorkflow = (workflow: WorkflowRevision): WorkflowUnit => {
    const indexed = indexWorkflowGraph(workflow.content);
    let order: number[];
    try {
      order = orderOperators(indexed);
    } catch (error) {
      if (error instanceof StructuralError) {
        dependencies.logger?.error({ err: error, revisionId: workflow.id }, 'Stored workflow graph contains a cycle');
      }
      throw error;
    }

    const stepIndexByOperatorId = new Map<string, number>();
    order.forEach((operatorIndex, stepIndex) => {
      const operator = indexed.operators[operatorIndex];
      if (operator) {
        stepIndexByOperatorId.set(operator.id, stepIndex);
      }
    });

    const sourceOf = (destination: IndexedEndpoint): ValueSource => {
      const bindings = bindingsOf(indexed, destination);
      const binding = bindings[0];
      const ref = { operatorId: destination.operatorId, connectorId: destination.connector.id };
      if (!binding) {
        throw new ConnectivityError(ref, 'missing_binding');
      }
      if (bindings.length > 1) {
        throw new ConnectivityError(ref, 'multiple_bindings');
      }
      return toValueSource(binding, stepIndexByOperatorId);
    };

    const steps: ExecutionStep[] = [];
    for (const operatorIndex of order) {
      const operator = indexed.operators[operatorIndex];
      if (!operator) {
        continue;
      }

      const unit = compiled.get(operator.transformationId) ?? compileDependency(workflow.id, operator);

      const declaredInputs = unit.ioInterface.inputs.map(input => input.name);
      const placedInputs = operator.inputs.map(input => input.name);
      const declaredOutputs = new Set(unit.ioInterface.outputs.map(output => output.name));
      if (
        declaredInputs.length !== placedInputs.length ||
        declaredInputs.some(name => !placedInputs.includes(name)) ||
        operator.outputs.some(output => !declaredOutputs.has(output.name))
      ) {
        throw new UnresolvedDependencyError(workflow.id, operator.id, operator.transformationId, 'interface_mismatch');
      }

      steps.push({
        operatorId: operator.id,
        operatorName: operator.name,
        unit,
        inputs: operator.inputs.map(input => ({
          inputName: input.name,
          source: sourceOf({ role: 'operator_input', operatorIndex, operatorId: operator.id, connector: input }),
        })),
      });
    }

    const outputs = workflow.ioInterface.outputs.map(output => ({
      outputName: output.name,
      source: sourceOf({ role: 'workflow_output', operatorIndex: null, operatorId: null, connector: output }),
    }));

    return {
      kind: 'workflow',
      transformationId: workflow.id,
      name: workflow.name,
      versionTag: workflow.versionTag,
      ioInterface: workflow.ioInterface,
      steps,
      outputs,
    };
  };

  return compile(revision);
}

function compileComponent(revision: Extract<TransformationRevision, { type: 'COMPONENT' }>): ComponentUnit {
  return {
    kind: 'component',
    transformationId: revision.id,
    name: revision.name,
    versionTag: revision.versionTag,
    ioInterface: revision.ioInterface,
    code: revision.content,
  };
}

function toValueSource(binding: EndpointBinding, stepIndexByOperatorId: ReadonlyMap<string, number>): ValueSource {
  if (binding.kind === 'constant') {
    return { kind: 'constant', value: binding.constant.value, dataType: binding.constant.dataType };
  }

  const { source } = binding;
  if (source.operatorId === null) {
    return { kind: 'workflow_input', inputName: source.connector.name };
  }
  return {
    kind: 'step_output',
    stepIndex: stepIndexByOperatorId.get(source.operatorId) ?? -1,
    operatorId: source.operatorId,
    outputName: source.connector.name,
  };
}

function renderValueSource(source: ValueSource): string {
  switch (source.kind) {
    case 'workflow_input':
      return `inputs[${JSON.stringify(source.inputName)}]`;
    case 'step_output':
      return `step${source.stepIndex}[${JSON.stringify(source.outputName)}]`;
    case 'constant':
      return JSON.stringify(source.value);
  }
}

/**
 * Renders a workflow unit as a JavaScript module. `invoke(transformationId, inputs)`
 * is supplied by the executor and runs the unit compiled for that transformation.
 */
export function renderWorkflowSource(unit: WorkflowUnit): string {
  const lines = [
    `// ${unit.name} ${unit.versionTag} (${unit.transformationId})`,
    'export async function run(inputs, invoke) {',
  ];

  unit.steps.forEach((step, stepIndex) => {
    lines.push(`  // ${step.operatorName} (${step.operatorId})`);
    lines.push(`  const step${stepIndex} = await invoke(${JSON.stringify(step.unit.transformationId)}, {`);
    for (const input of step.inputs) {
      lines.push(`    ${JSON.stringify(input.inputName)}: ${renderValueSource(input.source)},`);
    }
    lines.push('  });');
  });

  lines.push('  return {');
  for (const output of unit.outputs) {
    lines.push(`    ${JSON.stringify(output.outputName)}: ${renderValueSource(output.source)},`);
  }
  lines.push('  };');
  lines.push('}');
  lines.push('');

  return lines.join('\n');
}

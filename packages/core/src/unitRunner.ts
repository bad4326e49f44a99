import type { DataType, FilterValue, TestWiring } from '@tessellate/shared';
import type { ComponentUnit, ExecutableUnit, ValueSource } from './codeGenerator.js';
import { UnitExecutionError } from './errors.js';

export type UnitValues = Record<string, unknown>;

/** Runs the opaque code of a component. Supplied by the embedding executor. */
export type ComponentInvoker = (unit: ComponentUnit, inputs: UnitValues) => UnitValues | Promise<UnitValues>;

export type UnitRunResult = {
  outputs: UnitValues;
  outputTypesByOutputName: Record<string, DataType>;
};

export const DIRECT_PROVISIONING_ADAPTER = 'direct_provisioning';

/**
 * Input values of a test wiring whose inputs are provided inline, keyed by workflow
 * input name. Wirings through other adapters are left to their adapters.
 */
export function resolveDirectProvisioningInputs(testWiring: TestWiring): Record<string, FilterValue> {
  const values: Record<string, FilterValue> = {};
  for (const wiring of testWiring.inputWirings) {
    if (wiring.adapterId === DIRECT_PROVISIONING_ADAPTER && 'value' in wiring.filters) {
      values[wiring.workflowInputName] = wiring.filters.value ?? null;
    }
  }
  return values;
}

function readValue(values: UnitValues, name: string, transformationId: string, role: string): unknown {
  if (!Object.prototype.hasOwnProperty.call(values, name)) {
    throw new UnitExecutionError(transformationId, `Missing ${role} "${name}" for transformation "${transformationId}".`);
  }
  return values[name];
}

async function runUnit(unit: ExecutableUnit, inputs: UnitValues, invokeComponent: ComponentInvoker): Promise<UnitValues> {
  const boundInputs: UnitValues = {};
  for (const input of unit.ioInterface.inputs) {
    boundInputs[input.name] = readValue(inputs, input.name, unit.transformationId, 'input');
  }

  if (unit.kind === 'component') {
    const produced = await invokeComponent(unit, boundInputs);
    const outputs: UnitValues = {};
    for (const output of unit.ioInterface.outputs) {
      outputs[output.name] = readValue(produced, output.name, unit.transformationId, 'output');
    }
    return outputs;
  }

  const stepResults: UnitValues[] = [];
  const resolve = (source: ValueSource): unknown => {
    switch (source.kind) {
      case 'workflow_input':
        return boundInputs[source.inputName];
      case 'constant':
        return source.value;
      case 'step_output': {
        const produced = stepResults[source.stepIndex];
        if (!produced) {
          throw new UnitExecutionError(
            unit.transformationId,
            `Step for operator "${source.operatorId}" has not run before its output was needed.`,
          );
        }
        return produced[source.outputName];
      }
    }
  };

  for (const step of unit.steps) {
    const stepInputs: UnitValues = {};
    for (const input of step.inputs) {
      stepInputs[input.inputName] = resolve(input.source);
    }
    stepResults.push(await runUnit(step.unit, stepInputs, invokeComponent));
  }

  const outputs: UnitValues = {};
  for (const output of unit.outputs) {
    outputs[output.outputName] = resolve(output.source);
  }
  return outputs;
}

/**
 * Executes a compiled unit in process, calling `invokeComponent` for every
 * component step in order.
 */
export async function runExecutableUnit(
  unit: ExecutableUnit,
  inputs: UnitValues,
  invokeComponent: ComponentInvoker,
): Promise<UnitRunResult> {
  const outputs = await runUnit(unit, inputs, invokeComponent);
  const outputTypesByOutputName: Record<string, DataType> = {};
  for (const output of unit.ioInterface.outputs) {
    outputTypesByOutputName[output.name] = output.dataType;
  }
  return { outputs, outputTypesByOutputName };
}

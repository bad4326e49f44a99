import type { IoConnector, TransformationRevision } from '@tessellate/shared';
import { readComponentInfo } from './componentCode.js';
import { InterfaceMismatchError, TestWiringError } from './errors.js';
import { assertValidWorkflowGraph } from './graphValidation.js';

export type RevisionValidationContext = {
  resolveRevision: (id: string) => TransformationRevision | null;
};

type ConnectorSignature = Pick<IoConnector, 'name' | 'dataType'> & { id?: string };

function describeSignature(connectors: readonly ConnectorSignature[]): string {
  return `[${connectors.map(connector => `${connector.name}:${connector.dataType}`).join(', ')}]`;
}

function sameSignatures(
  left: readonly ConnectorSignature[],
  right: readonly ConnectorSignature[],
  compareIds: boolean,
): boolean {
  return (
    left.length === right.length &&
    left.every((connector, index) => {
      const other = right[index];
      return (
        other !== undefined &&
        connector.name === other.name &&
        connector.dataType === other.dataType &&
        (!compareIds || connector.id === other.id)
      );
    })
  );
}

export function sameIoInterface(left: TransformationRevision['ioInterface'], right: TransformationRevision['ioInterface']): boolean {
  return sameSignatures(left.inputs, right.inputs, true) && sameSignatures(left.outputs, right.outputs, true);
}

function assertUniqueNames(revision: TransformationRevision): void {
  for (const [side, connectors] of [
    ['input', revision.ioInterface.inputs],
    ['output', revision.ioInterface.outputs],
  ] as const) {
    const seen = new Set<string>();
    for (const connector of connectors) {
      if (seen.has(connector.name)) {
        throw new InterfaceMismatchError(revision.id, `${side} name "${connector.name}" is declared more than once.`);
      }
      seen.add(connector.name);
    }
  }
}

function assertTestWiring(revision: TransformationRevision): void {
  const inputNames = new Set(revision.ioInterface.inputs.map(input => input.name));
  const outputNames = new Set(revision.ioInterface.outputs.map(output => output.name));

  const wiredInputs = new Set<string>();
  for (const wiring of revision.testWiring.inputWirings) {
    if (!inputNames.has(wiring.workflowInputName)) {
      throw new TestWiringError(revision.id, wiring.workflowInputName, 'names an input the revision does not declare');
    }
    if (wiredInputs.has(wiring.workflowInputName)) {
      throw new TestWiringError(revision.id, wiring.workflowInputName, 'is wired more than once');
    }
    wiredInputs.add(wiring.workflowInputName);
  }

  const wiredOutputs = new Set<string>();
  for (const wiring of revision.testWiring.outputWirings) {
    if (!outputNames.has(wiring.workflowOutputName)) {
      throw new TestWiringError(revision.id, wiring.workflowOutputName, 'names an output the revision does not declare');
    }
    if (wiredOutputs.has(wiring.workflowOutputName)) {
      throw new TestWiringError(revision.id, wiring.workflowOutputName, 'is wired more than once');
    }
    wiredOutputs.add(wiring.workflowOutputName);
  }
}

/**
 * Checks everything a revision must satisfy before it is stored: interface
 * consistency with its content, test wiring, and for workflows every graph invariant.
 */
export function assertValidRevision(revision: TransformationRevision, context: RevisionValidationContext): void {
  assertUniqueNames(revision);

  if (revision.type === 'COMPONENT') {
    const info = readComponentInfo(revision.content);
    if (info) {
      const declaredInputs = info.inputs.map(input => ({ name: input.name, dataType: input.data_type }));
      const declaredOutputs = info.outputs.map(output => ({ name: output.name, dataType: output.data_type }));
      if (!sameSignatures(declaredInputs, revision.ioInterface.inputs, false)) {
        throw new InterfaceMismatchError(
          revision.id,
          `component code declares inputs ${describeSignature(declaredInputs)} but the interface has ${describeSignature(revision.ioInterface.inputs)}.`,
        );
      }
      if (!sameSignatures(declaredOutputs, revision.ioInterface.outputs, false)) {
        throw new InterfaceMismatchError(
          revision.id,
          `component code declares outputs ${describeSignature(declaredOutputs)} but the interface has ${describeSignature(revision.ioInterface.outputs)}.`,
        );
      }
    }
  } else {
    if (!sameSignatures(revision.content.inputs, revision.ioInterface.inputs, true)) {
      throw new InterfaceMismatchError(
        revision.id,
        `workflow graph inputs ${describeSignature(revision.content.inputs)} differ from the interface ${describeSignature(revision.ioInterface.inputs)}.`,
      );
    }
    if (!sameSignatures(revision.content.outputs, revision.ioInterface.outputs, true)) {
      throw new InterfaceMismatchError(
        revision.id,
        `workflow graph outputs ${describeSignature(revision.content.outputs)} differ from the interface ${describeSignature(revision.ioInterface.outputs)}.`,
      );
    }
    assertValidWorkflowGraph(revision.content, {
      workflowId: revision.id,
      requestedState: revision.state,
      resolveRevision: context.resolveRevision,
    });
  }

  assertTestWiring(revision);
}

import { describe, expect, it, vi } from 'vitest';
import { compileRevision, type ComponentUnit } from './codeGenerator.js';
import { UnitExecutionError } from './errors.js';
import {
  constant,
  createAddComponent,
  createNegateComponent,
  createWorkflow,
  io,
  link,
  placeOperator,
  resolverFor,
} from './test-support.js';
import { resolveDirectProvisioningInputs, runExecutableUnit, type UnitValues } from './unitRunner.js';

const add = createAddComponent();
const negate = createNegateComponent();

async function arithmetic(unit: ComponentUnit, inputs: UnitValues): Promise<UnitValues> {
  switch (unit.transformationId) {
    case 'c-add':
      return { sum: Number(inputs.a) + Number(inputs.b) };
    case 'c-neg':
      return { result: -Number(inputs.value) };
    default:
      return {};
  }
}

// total = -(x + 10)
const negatedPlusTen = createWorkflow({
  id: 'wf-neg-plus-ten',
  inputs: [io('wf-x', 'x')],
  outputs: [io('wf-total', 'total')],
  operators: [placeOperator('op-neg', negate), placeOperator('op-add', add)],
  constants: [constant('k-ten', 'op-add', 'c-add-b', 10)],
  links: [
    link('l1', [null, 'wf-x'], ['op-add', 'c-add-a']),
    link('l2', ['op-add', 'c-add-sum'], ['op-neg', 'c-neg-value']),
    link('l3', ['op-neg', 'c-neg-result'], [null, 'wf-total']),
  ],
});

describe('runExecutableUnit', () => {
  it('runs workflow steps in order and reports output types', async () => {
    const unit = compileRevision(negatedPlusTen, { loadRevision: resolverFor([add, negate]) });
    const invoke = vi.fn(arithmetic);

    await expect(runExecutableUnit(unit, { x: 5 }, invoke)).resolves.toEqual({
      outputs: { total: -15 },
      outputTypesByOutputName: { total: 'INT' },
    });
    expect(invoke.mock.calls.map(([component, inputs]) => [component.transformationId, inputs])).toEqual([
      ['c-add', { a: 5, b: 10 }],
      ['c-neg', { value: 15 }],
    ]);
  });

  it('fails when an input is not supplied', async () => {
    const unit = compileRevision(negatedPlusTen, { loadRevision: resolverFor([add, negate]) });

    await expect(runExecutableUnit(unit, {}, arithmetic)).rejects.toThrow(UnitExecutionError);
  });

  it('fails when a component does not produce a declared output', async () => {
    const unit = compileRevision(add, { loadRevision: resolverFor([]) });

    await expect(runExecutableUnit(unit, { a: 1, b: 2 }, async () => ({}))).rejects.toThrow(
      'Missing output "sum" for transformation "c-add".',
    );
  });
});

describe('resolveDirectProvisioningInputs', () => {
  it('reads inline values and skips other adapters', () => {
    expect(
      resolveDirectProvisioningInputs({
        inputWirings: [
          { workflowInputName: 'x', adapterId: 'direct_provisioning', refId: null, filters: { value: 2 } },
          { workflowInputName: 'y', adapterId: 'blob_storage', refId: 'ref-1', filters: { value: 3 } },
          { workflowInputName: 'z', adapterId: 'direct_provisioning', refId: null, filters: {} },
        ],
        outputWirings: [],
      }),
    ).toEqual({ x: 2 });
  });
});

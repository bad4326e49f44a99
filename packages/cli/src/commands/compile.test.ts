import { describe, expect, it } from 'vitest';
import { COMPILE_USAGE } from '../constants.js';
import { main } from '../entrypoint.js';
import { createCapturedIo, createSeededDependencies } from '../test-support.js';

describe('compile command', () => {
  it('prints the execution plan of a workflow', async () => {
    const dependencies = await createSeededDependencies();
    const captured = createCapturedIo();

    const exitCode = await main(['compile', '--id', 'wf-plus-ten'], { dependencies, io: captured.io });

    expect(exitCode).toBe(0);
    expect(captured.stdout).toEqual([
      'PlusTen 1.0.0 (wf-plus-ten): workflow with 1 step(s)',
      '  step 0: Add (op-add) -> c-add [a <- input x, b <- constant 10]',
      '  output total <- step 0.sum',
    ]);
  });

  it('summarizes a component', async () => {
    const dependencies = await createSeededDependencies();
    const captured = createCapturedIo();

    await main(['compile', '--id', 'c-add'], { dependencies, io: captured.io });

    expect(captured.stdout).toEqual(['Add 1.0.0 (c-add): component', '  inputs: a, b', '  outputs: sum']);
  });

  it('renders workflow source', async () => {
    const dependencies = await createSeededDependencies();
    const captured = createCapturedIo();

    await main(['compile', '--id', 'wf-plus-ten', '--format', 'source'], { dependencies, io: captured.io });

    expect(captured.stdout).toEqual([
      [
        '// PlusTen 1.0.0 (wf-plus-ten)',
        'export async function run(inputs, invoke) {',
        '  // Add (op-add)',
        '  const step0 = await invoke("c-add", {',
        '    "a": inputs["x"],',
        '    "b": 10,',
        '  });',
        '  return {',
        '    "total": step0["sum"],',
        '  };',
        '}',
      ].join('\n'),
    ]);
  });

  it('prints component code for the source format', async () => {
    const dependencies = await createSeededDependencies();
    const captured = createCapturedIo();

    await main(['compile', '--id', 'c-add', '--format', 'source'], { dependencies, io: captured.io });

    expect(captured.stdout).toEqual(['export async function main({ a, b }) { return { sum: a + b }; }']);
  });

  it('exits with the not-found code for an unknown revision', async () => {
    const dependencies = await createSeededDependencies();
    const captured = createCapturedIo();

    const exitCode = await main(['compile', '--id', 'wf-missing'], { dependencies, io: captured.io });

    expect(exitCode).toBe(3);
    expect(captured.stderr).toEqual(['No transformation revision found for id="wf-missing".']);
  });

  it('rejects an unknown format', async () => {
    const dependencies = await createSeededDependencies();
    const captured = createCapturedIo();

    const exitCode = await main(['compile', '--id', 'c-add', '--format', 'wasm'], { dependencies, io: captured.io });

    expect(exitCode).toBe(2);
    expect(captured.stderr).toEqual(['Option "--format" must be one of: plan, source.', COMPILE_USAGE]);
  });

  it('requires --id', async () => {
    const dependencies = await createSeededDependencies();
    const captured = createCapturedIo();

    const exitCode = await main(['compile'], { dependencies, io: captured.io });

    expect(exitCode).toBe(2);
    expect(captured.stderr).toEqual(['Missing required option: --id <revision_id>', COMPILE_USAGE]);
  });
});

import { describe, expect, it } from 'vitest';
import { main } from '../entrypoint.js';
import { createCapturedIo, createSeededDependencies } from '../test-support.js';

describe('delete command', () => {
  it('refuses to delete a revision an active workflow uses', async () => {
    const dependencies = await createSeededDependencies();
    const captured = createCapturedIo();

    const exitCode = await main(['delete', '--id', 'c-add'], { dependencies, io: captured.io });

    expect(exitCode).toBe(4);
    expect(captured.stderr).toEqual([
      'Failed to delete revision: Cannot delete revision "c-add"; it is used by workflows wf-plus-ten.',
    ]);
  });

  it('deletes the workflow and then the component it used', async () => {
    const dependencies = await createSeededDependencies();
    const captured = createCapturedIo();

    expect(await main(['delete', '--id', 'wf-plus-ten'], { dependencies, io: captured.io })).toBe(0);
    expect(await main(['delete', '--id', 'c-add'], { dependencies, io: captured.io })).toBe(0);
    expect(await main(['list'], { dependencies, io: captured.io })).toBe(0);

    expect(captured.stdout).toEqual([
      'Deleted revision "wf-plus-ten".',
      'Deleted revision "c-add".',
      'No transformation revisions found.',
    ]);
  });
});

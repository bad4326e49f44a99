import { createSilentLogger, type RevisionDocument } from '@tessellate/core';
import { main } from './entrypoint.js';
import { createDatabase, migrateDatabase, type TessellateDatabase } from '@tessellate/db';
import type { CliDependencies, CliIo } from './types.js';

export type CapturedIo = {
  stdout: string[];
  stderr: string[];
  io: CliIo;
};

export function createCapturedIo(
  options: {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
  } = {},
): CapturedIo {
  const stdout: string[] = [];
  const stderr: string[] = [];

  return {
    stdout,
    stderr,
    io: {
      stdout: message => stdout.push(message),
      stderr: message => stderr.push(message),
      cwd: options.cwd ?? '/work/tessellate',
      env: options.env ?? {},
    },
  };
}

export function createMigratedDb(): TessellateDatabase {
  const db = createDatabase(':memory:');
  migrateDatabase(db);
  return db;
}

export type TestDependencies = CliDependencies & {
  openedPaths: string[];
  /** Number of closeDatabase calls; the shared in-memory database itself stays open. */
  closeCount: () => number;
};

/**
 * Dependencies backed by one in-memory database, a map of readable files keyed
 * by absolute path and a clock that ticks one second per call.
 */
export function createDependencies(
  db: TessellateDatabase,
  files: Record<string, string> = {},
): TestDependencies {
  const openedPaths: string[] = [];
  let closed = 0;
  let tick = 0;

  return {
    openedPaths,
    closeCount: () => closed,
    openDatabase: path => {
      openedPaths.push(path);
      return db;
    },
    closeDatabase: () => {
      closed += 1;
    },
    readTextFile: async path => {
      const text = files[path];
      if (text === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return text;
    },
    createLogger: () => createSilentLogger(),
    now: () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++)).toISOString(),
  };
}

type ComponentDocument = Extract<RevisionDocument, { type: 'COMPONENT' }>;

// add(a, b) -> sum
export function addDocument(overrides: Partial<ComponentDocument> = {}): ComponentDocument {
  return {
    id: 'c-add',
    revision_group_id: 'c-add-group',
    name: 'Add',
    category: 'Arithmetic',
    version_tag: '1.0.0',
    state: 'DRAFT',
    io_interface: {
      inputs: [
        { id: 'c-add-a', name: 'a', data_type: 'INT' },
        { id: 'c-add-b', name: 'b', data_type: 'INT' },
      ],
      outputs: [{ id: 'c-add-sum', name: 'sum', data_type: 'INT' }],
    },
    type: 'COMPONENT',
    content: 'export async function main({ a, b }) { return { sum: a + b }; }',
    ...overrides,
  };
}

// total = add(x, 10)
export function plusTenDocument(): RevisionDocument {
  return {
    id: 'wf-plus-ten',
    revision_group_id: 'wf-plus-ten-group',
    name: 'PlusTen',
    version_tag: '1.0.0',
    state: 'DRAFT',
    io_interface: {
      inputs: [{ id: 'wf-x', name: 'x', data_type: 'INT' }],
      outputs: [{ id: 'wf-total', name: 'total', data_type: 'INT' }],
    },
    type: 'WORKFLOW',
    content: {
      inputs: [{ id: 'wf-x', name: 'x', data_type: 'INT' }],
      outputs: [{ id: 'wf-total', name: 'total', data_type: 'INT' }],
      constants: [{ id: 'k-ten', operator_id: 'op-add', connector_id: 'c-add-b', data_type: 'INT', value: 10 }],
      operators: [
        {
          id: 'op-add',
          name: 'Add',
          transformation_id: 'c-add',
          inputs: [
            { id: 'c-add-a', name: 'a', data_type: 'INT' },
            { id: 'c-add-b', name: 'b', data_type: 'INT' },
          ],
          outputs: [{ id: 'c-add-sum', name: 'sum', data_type: 'INT' }],
        },
      ],
      links: [
        { id: 'l1', start: { connector: { id: 'wf-x' } }, end: { operator: 'op-add', connector: { id: 'c-add-a' } } },
        { id: 'l2', start: { operator: 'op-add', connector: { id: 'c-add-sum' } }, end: { connector: { id: 'wf-total' } } },
      ],
    },
  };
}

export const seededDocumentsPath = '/work/tessellate/revisions.json';

/** Imports the add component and the plus-ten workflow into a fresh database. */
export async function createSeededDependencies(): Promise<TestDependencies> {
  const dependencies = createDependencies(createMigratedDb(), {
    [seededDocumentsPath]: JSON.stringify([addDocument(), plusTenDocument()]),
  });
  const exitCode = await main(['import', 'revisions.json'], { dependencies, io: createCapturedIo().io });
  if (exitCode !== 0) {
    throw new Error(`Seeding revisions failed with exit code ${exitCode}`);
  }
  return dependencies;
}

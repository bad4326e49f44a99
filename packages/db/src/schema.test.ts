import { eq } from 'drizzle-orm';
import { describe, expect, it } from 'vitest';
import { migrateDatabase } from './migrate.js';
import { revisionNestings, transformationRevisions } from './schema.js';
import { createMigratedDb } from './test-support.js';

type RevisionInsert = typeof transformationRevisions.$inferInsert;

function componentValues(overrides: Partial<RevisionInsert> = {}): RevisionInsert {
  return {
    id: 'c-add',
    revisionGroupId: 'c-add-group',
    type: 'COMPONENT',
    name: 'Add',
    versionTag: '1.0.0',
    state: 'DRAFT',
    ioInterface: { inputs: [], outputs: [] },
    componentCode: 'export async function main() { return {}; }',
    testWiring: { inputWirings: [], outputWirings: [] },
    ...overrides,
  };
}

describe('revision schema', () => {
  it('can be migrated more than once', () => {
    const db = createMigratedDb();
    expect(() => migrateDatabase(db)).not.toThrow();
  });

  it('fills defaults and decodes json columns', () => {
    const db = createMigratedDb();
    db.insert(transformationRevisions).values(componentValues()).run();

    const row = db.select().from(transformationRevisions).where(eq(transformationRevisions.id, 'c-add')).get();
    expect(row).toMatchObject({
      description: '',
      category: '',
      documentation: '',
      ioInterface: { inputs: [], outputs: [] },
      workflowContent: null,
    });
    expect(row?.createdAt).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it('rejects unknown states', () => {
    const db = createMigratedDb();
    expect(() => db.insert(transformationRevisions).values(componentValues({ state: 'ARCHIVED' })).run()).toThrow(
      'CHECK constraint failed',
    );
  });

  it('requires content matching the revision type', () => {
    const db = createMigratedDb();
    expect(() => db.insert(transformationRevisions).values(componentValues({ type: 'WORKFLOW' })).run()).toThrow(
      'CHECK constraint failed',
    );
  });

  it('requires lifecycle timestamps for released and disabled revisions', () => {
    const db = createMigratedDb();
    expect(() => db.insert(transformationRevisions).values(componentValues({ state: 'RELEASED' })).run()).toThrow(
      'CHECK constraint failed',
    );
    expect(() =>
      db
        .insert(transformationRevisions)
        .values(componentValues({ state: 'DISABLED', releasedTimestamp: '2024-01-01T00:00:00.000Z' }))
        .run(),
    ).toThrow('CHECK constraint failed');
  });

  it('keeps version tags unique within a revision group', () => {
    const db = createMigratedDb();
    db.insert(transformationRevisions).values(componentValues()).run();

    expect(() => db.insert(transformationRevisions).values(componentValues({ id: 'c-add-copy' })).run()).toThrow(
      'UNIQUE constraint failed',
    );
  });

  it('removes nesting rows together with their workflow', () => {
    const db = createMigratedDb();
    db.insert(transformationRevisions)
      .values(
        componentValues({
          id: 'wf-sum',
          revisionGroupId: 'wf-sum-group',
          type: 'WORKFLOW',
          componentCode: null,
          workflowContent: { inputs: [], outputs: [], constants: [], operators: [], links: [] },
        }),
      )
      .run();
    db.insert(revisionNestings)
      .values({ workflowId: 'wf-sum', descendantId: 'c-add', viaOperatorPath: ['op-add'], depth: 1 })
      .run();

    expect(() =>
      db
        .insert(revisionNestings)
        .values({ workflowId: 'wf-sum', descendantId: 'c-other', viaOperatorPath: ['op-add'], depth: 1 })
        .run(),
    ).toThrow('UNIQUE constraint failed');

    db.delete(transformationRevisions).where(eq(transformationRevisions.id, 'wf-sum')).run();
    expect(db.select().from(revisionNestings).all()).toEqual([]);
  });

  it('rejects nesting rows for unknown workflows', () => {
    const db = createMigratedDb();
    expect(() =>
      db
        .insert(revisionNestings)
        .values({ workflowId: 'wf-none', descendantId: 'c-add', viaOperatorPath: ['op-add'], depth: 1 })
        .run(),
    ).toThrow('FOREIGN KEY constraint failed');
  });
});

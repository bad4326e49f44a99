import { and, asc, eq, type SQL } from 'drizzle-orm';
import {
  compareNestingRows,
  revisionStates,
  transformationTypes,
  type NestingRow,
  type RevisionListFilter,
  type RevisionState,
  type RevisionStore,
  type TransformationRevision,
  type TransformationType,
} from '@tessellate/shared';
import type { TessellateDatabase } from './connection.js';
import { revisionNestings, transformationRevisions } from './schema.js';

type RevisionRow = typeof transformationRevisions.$inferSelect;
type NestingRecord = typeof revisionNestings.$inferSelect;

// A drizzle database or an open transaction on it.
type StoreExecutor = Pick<TessellateDatabase, 'select' | 'insert' | 'update' | 'delete'>;

const knownTypes: ReadonlySet<string> = new Set(transformationTypes);
const knownStates: ReadonlySet<string> = new Set(revisionStates);

function assertKnownType(type: string): asserts type is TransformationType {
  if (!knownTypes.has(type)) {
    throw new Error(`Unknown transformation type: ${type}`);
  }
}

function assertKnownState(state: string): asserts state is RevisionState {
  if (!knownStates.has(state)) {
    throw new Error(`Unknown revision state: ${state}`);
  }
}

function toTransformationRevision(row: RevisionRow): TransformationRevision {
  assertKnownType(row.type);
  assertKnownState(row.state);

  const base = {
    id: row.id,
    revisionGroupId: row.revisionGroupId,
    name: row.name,
    description: row.description,
    category: row.category,
    documentation: row.documentation,
    versionTag: row.versionTag,
    state: row.state,
    releasedTimestamp: row.releasedTimestamp,
    disabledTimestamp: row.disabledTimestamp,
    ioInterface: row.ioInterface,
    testWiring: row.testWiring,
  };

  if (row.type === 'COMPONENT') {
    if (row.componentCode === null) {
      throw new Error(`Component revision id=${row.id} has no stored code.`);
    }
    return { ...base, type: 'COMPONENT', content: row.componentCode };
  }

  if (row.workflowContent === null) {
    throw new Error(`Workflow revision id=${row.id} has no stored graph.`);
  }
  return { ...base, type: 'WORKFLOW', content: row.workflowContent };
}

function toNestingRow(record: NestingRecord): NestingRow {
  return {
    workflowId: record.workflowId,
    descendantId: record.descendantId,
    viaOperatorPath: record.viaOperatorPath,
    depth: record.depth,
  };
}

function toRevisionValues(revision: TransformationRevision, occurredAt: string) {
  return {
    id: revision.id,
    revisionGroupId: revision.revisionGroupId,
    type: revision.type,
    name: revision.name,
    description: revision.description,
    category: revision.category,
    documentation: revision.documentation,
    versionTag: revision.versionTag,
    state: revision.state,
    releasedTimestamp: revision.releasedTimestamp,
    disabledTimestamp: revision.disabledTimestamp,
    ioInterface: revision.ioInterface,
    componentCode: revision.type === 'COMPONENT' ? revision.content : null,
    workflowContent: revision.type === 'WORKFLOW' ? revision.content : null,
    testWiring: revision.testWiring,
    updatedAt: occurredAt,
  };
}

function createRevisionQueries(executor: StoreExecutor): Omit<RevisionStore, 'transaction'> {
  return {
    get(id) {
      const row = executor.select().from(transformationRevisions).where(eq(transformationRevisions.id, id)).get();
      return row ? toTransformationRevision(row) : null;
    },

    getByGroupAndTag(revisionGroupId, versionTag) {
      const row = executor
        .select()
        .from(transformationRevisions)
        .where(
          and(
            eq(transformationRevisions.revisionGroupId, revisionGroupId),
            eq(transformationRevisions.versionTag, versionTag),
          ),
        )
        .get();
      return row ? toTransformationRevision(row) : null;
    },

    list(filter: RevisionListFilter = {}) {
      const conditions: SQL[] = [];
      if (filter.type !== undefined) {
        conditions.push(eq(transformationRevisions.type, filter.type));
      }
      if (filter.state !== undefined) {
        conditions.push(eq(transformationRevisions.state, filter.state));
      }

      return executor
        .select()
        .from(transformationRevisions)
        .where(and(...conditions))
        .orderBy(asc(transformationRevisions.name), asc(transformationRevisions.versionTag), asc(transformationRevisions.id))
        .all()
        .map(toTransformationRevision);
    },

    put(revision) {
      const { id, ...changes } = toRevisionValues(revision, new Date().toISOString());
      executor
        .insert(transformationRevisions)
        .values({ id, ...changes })
        .onConflictDoUpdate({ target: transformationRevisions.id, set: changes })
        .run();
    },

    delete(id) {
      const deleted = executor.delete(transformationRevisions).where(eq(transformationRevisions.id, id)).run();
      return deleted.changes > 0;
    },

    listNesting(workflowId) {
      return executor
        .select()
        .from(revisionNestings)
        .where(eq(revisionNestings.workflowId, workflowId))
        .all()
        .map(toNestingRow)
        .sort(compareNestingRows);
    },

    listNestingByDescendant(descendantId) {
      return executor
        .select()
        .from(revisionNestings)
        .where(eq(revisionNestings.descendantId, descendantId))
        .all()
        .map(toNestingRow)
        .sort(compareNestingRows);
    },

    replaceNesting(workflowId, rows) {
      executor.delete(revisionNestings).where(eq(revisionNestings.workflowId, workflowId)).run();
      if (rows.length === 0) {
        return;
      }
      executor
        .insert(revisionNestings)
        .values(
          rows.map(row => ({
            workflowId,
            descendantId: row.descendantId,
            viaOperatorPath: row.viaOperatorPath,
            depth: row.depth,
          })),
        )
        .run();
    },
  };
}

/**
 * `RevisionStore` over the SQLite schema. `transaction` runs on a single
 * better-sqlite3 transaction; calls nested inside it join the open transaction.
 */
export function createSqlRevisionStore(db: TessellateDatabase): RevisionStore {
  return {
    ...createRevisionQueries(db),
    transaction<T>(operation: (store: RevisionStore) => T): T {
      return db.transaction(tx => {
        const scoped: RevisionStore = {
          ...createRevisionQueries(tx),
          transaction: nested => nested(scoped),
        };
        return operation(scoped);
      });
    },
  };
}

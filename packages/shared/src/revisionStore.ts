import type { NestingRow, RevisionState, TransformationRevision, TransformationType } from './transformations.js';

export type RevisionListFilter = {
  type?: TransformationType;
  state?: RevisionState;
};

/**
 * Persistence contract for transformation revisions and their derived nesting rows.
 *
 * Reads return copies; callers never mutate stored state except through `put`,
 * `delete` and `replaceNesting`. `transaction` runs the operation atomically: if it
 * throws, none of its writes are visible afterwards.
 */
export interface RevisionStore {
  get(id: string): TransformationRevision | null;
  getByGroupAndTag(revisionGroupId: string, versionTag: string): TransformationRevision | null;
  list(filter?: RevisionListFilter): TransformationRevision[];
  put(revision: TransformationRevision): void;
  /** Removes the revision and the nesting rows it owns. Returns false when nothing was stored. */
  delete(id: string): boolean;
  listNesting(workflowId: string): NestingRow[];
  listNestingByDescendant(descendantId: string): NestingRow[];
  replaceNesting(workflowId: string, rows: readonly NestingRow[]): void;
  transaction<T>(operation: (store: RevisionStore) => T): T;
}

export type RevisionReader = Pick<RevisionStore, 'get'>;

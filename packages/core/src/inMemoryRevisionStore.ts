import {
  compareNestingRows,
  compareRevisionsForListing,
  type NestingRow,
  type RevisionListFilter,
  type RevisionStore,
  type TransformationRevision,
} from '@tessellate/shared';

/**
 * Process-local `RevisionStore`. Reads and writes copy values so callers never
 * share state with the store; a failed transaction restores the previous contents.
 */
export class InMemoryRevisionStore implements RevisionStore {
  private revisions = new Map<string, TransformationRevision>();
  private nestingByWorkflow = new Map<string, NestingRow[]>();
  private transactionDepth = 0;

  constructor(initial: readonly TransformationRevision[] = []) {
    for (const revision of initial) {
      this.put(revision);
    }
  }

  get(id: string): TransformationRevision | null {
    const revision = this.revisions.get(id);
    return revision ? structuredClone(revision) : null;
  }

  getByGroupAndTag(revisionGroupId: string, versionTag: string): TransformationRevision | null {
    for (const revision of this.revisions.values()) {
      if (revision.revisionGroupId === revisionGroupId && revision.versionTag === versionTag) {
        return structuredClone(revision);
      }
    }
    return null;
  }

  list(filter: RevisionListFilter = {}): TransformationRevision[] {
    return [...this.revisions.values()]
      .filter(revision => filter.type === undefined || revision.type === filter.type)
      .filter(revision => filter.state === undefined || revision.state === filter.state)
      .map(revision => structuredClone(revision))
      .sort(compareRevisionsForListing);
  }

  put(revision: TransformationRevision): void {
    this.revisions.set(revision.id, structuredClone(revision));
  }

  delete(id: string): boolean {
    this.nestingByWorkflow.delete(id);
    return this.revisions.delete(id);
  }

  listNesting(workflowId: string): NestingRow[] {
    return structuredClone(this.nestingByWorkflow.get(workflowId) ?? []).sort(compareNestingRows);
  }

  listNestingByDescendant(descendantId: string): NestingRow[] {
    return [...this.nestingByWorkflow.values()]
      .flat()
      .filter(row => row.descendantId === descendantId)
      .map(row => structuredClone(row))
      .sort(compareNestingRows);
  }

  replaceNesting(workflowId: string, rows: readonly NestingRow[]): void {
    if (rows.length === 0) {
      this.nestingByWorkflow.delete(workflowId);
      return;
    }
    this.nestingByWorkflow.set(workflowId, structuredClone([...rows]));
  }

  transaction<T>(operation: (store: RevisionStore) => T): T {
    if (this.transactionDepth > 0) {
      return operation(this);
    }

    const revisions = new Map(this.revisions);
    const nestingByWorkflow = new Map(this.nestingByWorkflow);
    this.transactionDepth += 1;
    try {
      return operation(this);
    } catch (error) {
      this.revisions = revisions;
      this.nestingByWorkflow = nestingByWorkflow;
      throw error;
    } finally {
      this.transactionDepth -= 1;
    }
  }
}

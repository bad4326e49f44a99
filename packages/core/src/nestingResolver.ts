import {
  compareNestingRows,
  compareStringsByCodeUnit,
  type NestingRow,
  type RevisionReader,
  type RevisionStore,
} from '@tessellate/shared';
import { RevisionNotFoundError, UnboundedNestingError } from './errors.js';
import type { Logger } from './logger.js';

export const DEFAULT_MAX_NESTING_DEPTH = 64;

export type NestingOptions = {
  maxDepth?: number;
  logger?: Logger;
};

type RelativeRow = {
  descendantId: string;
  viaOperatorPath: string[];
  depth: number;
};

type Expansion = {
  rows: RelativeRow[];
  /** Workflow levels in the expanded subtree, the expanded revision included. */
  levels: number;
};

/**
 * Derives the nesting closure of a workflow from the graphs currently in the
 * store: one direct row per operator, plus every row of the referenced revision
 * prefixed with that operator. Missing targets and components expand to nothing.
 *
 * A revision met again on the current expansion path, or an expansion deeper
 * than `maxDepth`, means the store holds a cycle; this fails with
 * `UnboundedNestingError` instead of looping.
 */
export function recomputeNesting(store: RevisionReader, workflowId: string, options: NestingOptions = {}): NestingRow[] {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_NESTING_DEPTH;
  const root = store.get(workflowId);
  if (!root) {
    throw new RevisionNotFoundError(workflowId);
  }

  const expanded = new Map<string, Expansion>();
  const path: string[] = [];

  const fail = (revisionId: string): never => {
    const error = new UnboundedNestingError(workflowId, [...path, revisionId]);
    options.logger?.error({ err: error, workflowId }, 'Nesting expansion did not terminate');
    throw error;
  };

  // maxDepth counts nested workflow levels, the root included
  const expand = (revisionId: string): Expansion => {
    if (path.includes(revisionId)) {
      fail(revisionId);
    }

    const cached = expanded.get(revisionId);
    if (cached) {
      if (path.length + cached.levels > maxDepth) {
        fail(revisionId);
      }
      return cached;
    }

    const revision = revisionId === workflowId ? root : store.get(revisionId);
    if (!revision || revision.type !== 'WORKFLOW') {
      return { rows: [], levels: 0 };
    }
    if (path.length >= maxDepth) {
      fail(revisionId);
    }

    path.push(revisionId);
    const rows: RelativeRow[] = [];
    let nestedLevels = 0;
    for (const operator of revision.content.operators) {
      rows.push({ descendantId: operator.transformationId, viaOperatorPath: [operator.id], depth: 1 });
      const nested = expand(operator.transformationId);
      nestedLevels = Math.max(nestedLevels, nested.levels);
      for (const row of nested.rows) {
        rows.push({
          descendantId: row.descendantId,
          viaOperatorPath: [operator.id, ...row.viaOperatorPath],
          depth: row.depth + 1,
        });
      }
    }
    path.pop();

    const expansion = { rows, levels: nestedLevels + 1 };
    expanded.set(revisionId, expansion);
    return expansion;
  };

  return expand(workflowId)
    .rows.map(row => ({ workflowId, ...row }))
    .sort(compareNestingRows);
}

/** Ids of every workflow whose nesting closure contains the revision, sorted. */
export function usedBy(store: Pick<RevisionStore, 'listNestingByDescendant'>, revisionId: string): string[] {
  const workflowIds = new Set(store.listNestingByDescendant(revisionId).map(row => row.workflowId));
  return [...workflowIds].sort(compareStringsByCodeUnit);
}

/** Like `usedBy`, without disabled workflows. */
export function activeUsedBy(store: Pick<RevisionStore, 'listNestingByDescendant' | 'get'>, revisionId: string): string[] {
  return usedBy(store, revisionId).filter(workflowId => store.get(workflowId)?.state !== 'DISABLED');
}

/**
 * Recomputes and stores the rows of the workflow and of every workflow that uses
 * it, so no stored row describes a graph that has since changed.
 */
export function refreshNesting(store: RevisionStore, workflowId: string, options: NestingOptions = {}): NestingRow[] {
  const rows = recomputeNesting(store, workflowId, options);
  store.replaceNesting(workflowId, rows);

  for (const ancestorId of usedBy(store, workflowId)) {
    if (ancestorId === workflowId) {
      continue;
    }
    store.replaceNesting(ancestorId, recomputeNesting(store, ancestorId, options));
  }

  return rows;
}

import type { NestingRow, TransformationRevision } from './transformations.js';

export * from './transformations.js';
export type { RevisionListFilter, RevisionReader, RevisionStore } from './revisionStore.js';

/**
 * Compares strings in locale-independent code-unit order.
 * Useful when deterministic ordering must not vary by runtime locale.
 */
export function compareStringsByCodeUnit(a: string, b: string): number {
  if (a < b) {
    return -1;
  }

  if (a > b) {
    return 1;
  }

  return 0;
}

// Element-wise path comparison; a proper prefix sorts first.
export function compareOperatorPaths(a: readonly string[], b: readonly string[]): number {
  const shared = Math.min(a.length, b.length);
  for (let index = 0; index < shared; index += 1) {
    const compared = compareStringsByCodeUnit(a[index] ?? '', b[index] ?? '');
    if (compared !== 0) {
      return compared;
    }
  }

  return a.length - b.length;
}

export function compareNestingRows(a: NestingRow, b: NestingRow): number {
  return (
    compareStringsByCodeUnit(a.workflowId, b.workflowId) ||
    compareStringsByCodeUnit(a.descendantId, b.descendantId) ||
    compareOperatorPaths(a.viaOperatorPath, b.viaOperatorPath)
  );
}

export function compareRevisionsForListing(a: TransformationRevision, b: TransformationRevision): number {
  return (
    compareStringsByCodeUnit(a.name, b.name) ||
    compareStringsByCodeUnit(a.versionTag, b.versionTag) ||
    compareStringsByCodeUnit(a.id, b.id)
  );
}

import type {
  NestingRow,
  RevisionListFilter,
  RevisionStore,
  TransformationRevision,
} from '@tessellate/shared';
import { compareStringsByCodeUnit } from '@tessellate/shared';
import { compileRevision, type ExecutableUnit } from './codeGenerator.js';
import {
  ConcurrentModificationError,
  ReferencedRevisionError,
  RevisionIdentityError,
  RevisionNotFoundError,
  RevisionStoreError,
  VersionTagConflictError,
  isCoreError,
} from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { activeUsedBy, refreshNesting, usedBy } from './nestingResolver.js';
import { assertValidRevision, sameIoInterface } from './revisionValidation.js';
import { authorizeRevisionWrite, type RevisionWriteKind } from './stateMachine.js';

export type RevisionServiceOptions = {
  logger?: Logger;
  /** ISO-8601 clock used for lifecycle timestamps. */
  now?: () => string;
  maxNestingDepth?: number;
};

export type StoredRevision = {
  revision: TransformationRevision;
  writeKind: RevisionWriteKind;
};

export type RevisionService = {
  validateAndStore(revision: TransformationRevision, allowOverwriteReleased?: boolean): StoredRevision;
  compileForExecution(revisionId: string): ExecutableUnit;
  checkDeletable(revisionId: string): void;
  deleteRevision(revisionId: string): void;
  getRevision(revisionId: string): TransformationRevision;
  listRevisions(filter?: RevisionListFilter): TransformationRevision[];
  listNesting(workflowId: string): NestingRow[];
  usedBy(revisionId: string): string[];
};

function operatorReferences(revision: TransformationRevision): string {
  if (revision.type === 'COMPONENT') {
    return '';
  }
  return revision.content.operators
    .map(operator => operator.transformationId)
    .sort(compareStringsByCodeUnit)
    .join('\n');
}

function fingerprint(revision: TransformationRevision | null): string {
  return revision === null ? 'null' : JSON.stringify(revision);
}

export function createRevisionService(store: RevisionStore, options: RevisionServiceOptions = {}): RevisionService {
  const logger = options.logger ?? createLogger('revision-service');
  const now = options.now ?? (() => new Date().toISOString());
  const nestingOptions = { maxDepth: options.maxNestingDepth, logger };

  // Store failures surface as RevisionStoreError; rejections by the core pass through unchanged.
  const withStore = <T>(operation: string, revisionId: string, run: () => T): T => {
    try {
      return run();
    } catch (error) {
      if (isCoreError(error)) {
        logger.warn({ err: error, revisionId, operation }, 'Revision operation rejected');
        throw error;
      }
      logger.error({ err: error, revisionId, operation }, 'Revision store failed');
      throw new RevisionStoreError(operation, { cause: error });
    }
  };

  const requireRevision = (reader: Pick<RevisionStore, 'get'>, revisionId: string): TransformationRevision => {
    const revision = reader.get(revisionId);
    if (!revision) {
      throw new RevisionNotFoundError(revisionId);
    }
    return revision;
  };

  const assertDeletable = (tx: RevisionStore, revisionId: string): void => {
    requireRevision(tx, revisionId);
    const referencedBy = activeUsedBy(tx, revisionId);
    if (referencedBy.length > 0) {
      throw new ReferencedRevisionError(revisionId, referencedBy, 'delete');
    }
  };

  return {
    validateAndStore(revision, allowOverwriteReleased = false) {
      return withStore('validate_and_store', revision.id, () =>
        store.transaction(tx => {
          const current = tx.get(revision.id);
          if (current && current.type !== revision.type) {
            throw new RevisionIdentityError(revision.id, 'type');
          }
          if (current && current.revisionGroupId !== revision.revisionGroupId) {
            throw new RevisionIdentityError(revision.id, 'revisionGroupId');
          }

          const writeKind = authorizeRevisionWrite(
            revision.id,
            current?.state ?? null,
            revision.state,
            allowOverwriteReleased,
          );

          if (writeKind === 'disable' && current) {
            // Disabling freezes the stored content; submitted field changes are ignored.
            const disabled: TransformationRevision = { ...current, state: 'DISABLED', disabledTimestamp: now() };
            tx.put(disabled);
            logger.info({ revisionId: revision.id, writeKind }, 'Disabled transformation revision');
            return { revision: disabled, writeKind };
          }

          const sameTag = tx.getByGroupAndTag(revision.revisionGroupId, revision.versionTag);
          if (sameTag && sameTag.id !== revision.id) {
            throw new VersionTagConflictError(revision.revisionGroupId, revision.versionTag, sameTag.id);
          }

          if (current) {
            // Active workflows hold a snapshot of this interface.
            const structuralChange =
              !sameIoInterface(current.ioInterface, revision.ioInterface) ||
              (writeKind === 'overwrite_released' && operatorReferences(current) !== operatorReferences(revision));
            const referencedBy = structuralChange ? activeUsedBy(tx, revision.id) : [];
            if (referencedBy.length > 0) {
              throw new ReferencedRevisionError(revision.id, referencedBy, 'overwrite');
            }
          }

          let releasedTimestamp: string | null = null;
          if (writeKind === 'release') {
            releasedTimestamp = current === null ? (revision.releasedTimestamp ?? now()) : now();
          } else if (writeKind === 'overwrite_released') {
            releasedTimestamp = current?.releasedTimestamp ?? revision.releasedTimestamp;
          }

          const next: TransformationRevision = { ...revision, releasedTimestamp, disabledTimestamp: null };
          assertValidRevision(next, { resolveRevision: id => tx.get(id) });

          tx.put(next);
          if (next.type === 'WORKFLOW') {
            refreshNesting(tx, next.id, nestingOptions);
          }

          logger.info({ revisionId: next.id, type: next.type, state: next.state, writeKind }, 'Stored transformation revision');
          return { revision: next, writeKind };
        }),
      );
    },

    compileForExecution(revisionId) {
      return withStore('compile_for_execution', revisionId, () =>
        store.transaction(tx => {
          const seen = new Map<string, string>();
          const loadRevision = (id: string): TransformationRevision | null => {
            const revision = tx.get(id);
            if (!seen.has(id)) {
              seen.set(id, fingerprint(revision));
            }
            return revision;
          };

          const unit = compileRevision(requireRevision({ get: loadRevision }, revisionId), { loadRevision, logger });

          const changed = [...seen]
            .filter(([id, before]) => fingerprint(tx.get(id)) !== before)
            .map(([id]) => id)
            .sort(compareStringsByCodeUnit);
          if (changed.length > 0) {
            throw new ConcurrentModificationError(changed);
          }

          logger.debug({ revisionId, revisionsRead: seen.size }, 'Compiled transformation revision');
          return unit;
        }),
      );
    },

    checkDeletable(revisionId) {
      withStore('check_deletable', revisionId, () => store.transaction(tx => assertDeletable(tx, revisionId)));
    },

    deleteRevision(revisionId) {
      withStore('delete', revisionId, () =>
        store.transaction(tx => {
          assertDeletable(tx, revisionId);
          tx.delete(revisionId);
          logger.info({ revisionId }, 'Deleted transformation revision');
        }),
      );
    },

    getRevision(revisionId) {
      return withStore('get', revisionId, () => requireRevision(store, revisionId));
    },

    listRevisions(filter) {
      return withStore('list', '*', () => store.list(filter));
    },

    listNesting(workflowId) {
      return withStore('list_nesting', workflowId, () => {
        requireRevision(store, workflowId);
        return store.listNesting(workflowId);
      });
    },

    usedBy(revisionId) {
      return withStore('used_by', revisionId, () => usedBy(store, revisionId));
    },
  };
}

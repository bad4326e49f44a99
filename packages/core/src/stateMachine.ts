import type { RevisionState } from '@tessellate/shared';
import { ImmutableRevisionError, InvalidTransitionError } from './errors.js';

const validRevisionTransitions: Record<RevisionState, RevisionState[]> = {
  DRAFT: ['DRAFT', 'RELEASED'],
  RELEASED: ['DISABLED'],
  DISABLED: [],
};

const creatableStates: readonly RevisionState[] = ['DRAFT', 'RELEASED'];

export type RevisionWriteKind = 'create' | 'edit_draft' | 'release' | 'overwrite_released' | 'disable';

export function canTransitionRevision(from: RevisionState, to: RevisionState): boolean {
  return validRevisionTransitions[from].includes(to);
}

export function isRevisionFrozen(state: RevisionState): boolean {
  return state !== 'DRAFT';
}

export function isRevisionTerminal(state: RevisionState): boolean {
  return validRevisionTransitions[state].length === 0;
}

/**
 * Decides how a write of `requested` over a stored revision in `current` (or over
 * nothing) may proceed. Released content is only replaced in place when
 * `allowOverwriteReleased` is set; disabling is always permitted from RELEASED.
 */
export function authorizeRevisionWrite(
  revisionId: string,
  current: RevisionState | null,
  requested: RevisionState,
  allowOverwriteReleased: boolean,
): RevisionWriteKind {
  if (current === null) {
    if (!creatableStates.includes(requested)) {
      throw new InvalidTransitionError(revisionId, current, requested);
    }
    return requested === 'RELEASED' ? 'release' : 'create';
  }

  if (current === 'RELEASED' && requested === 'RELEASED') {
    if (!allowOverwriteReleased) {
      throw new ImmutableRevisionError(revisionId);
    }
    return 'overwrite_released';
  }

  if (!canTransitionRevision(current, requested)) {
    throw new InvalidTransitionError(revisionId, current, requested);
  }

  if (requested === 'DISABLED') {
    return 'disable';
  }
  return requested === 'RELEASED' ? 'release' : 'edit_draft';
}

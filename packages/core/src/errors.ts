import type { DataType, RevisionState } from '@tessellate/shared';

export type CoreErrorCode =
  | 'STRUCTURAL_ERROR'
  | 'CONNECTIVITY_ERROR'
  | 'TYPE_MISMATCH'
  | 'DANGLING_REFERENCE'
  | 'INTERFACE_MISMATCH'
  | 'TEST_WIRING_INVALID'
  | 'REVISION_IDENTITY_CHANGED'
  | 'VERSION_TAG_CONFLICT'
  | 'INVALID_TRANSITION'
  | 'IMMUTABLE_REVISION'
  | 'REFERENCED_REVISION'
  | 'UNRESOLVED_DEPENDENCY'
  | 'UNBOUNDED_NESTING'
  | 'CONCURRENT_MODIFICATION'
  | 'REVISION_NOT_FOUND'
  | 'REVISION_STORE_FAILURE'
  | 'REVISION_DOCUMENT_INVALID'
  | 'UNIT_EXECUTION_FAILED';

export abstract class CoreError extends Error {
  abstract readonly code: CoreErrorCode;
  readonly retryable: boolean = false;
}

/** Rejection of a revision's content before anything is written. */
export abstract class ValidationError extends CoreError {}

export type CycleScope = 'operators' | 'revisions';

export class StructuralError extends ValidationError {
  readonly code = 'STRUCTURAL_ERROR';

  constructor(
    readonly cyclePath: string[],
    readonly scope: CycleScope,
  ) {
    const subject = scope === 'operators' ? 'operator graph' : 'revision references';
    super(`Cycle detected in ${subject}: ${cyclePath.join(' -> ')}.`);
    this.name = 'StructuralError';
  }
}

export type ConnectorRef = {
  operatorId: string | null;
  connectorId: string;
};

export type ConnectivityIssue =
  | 'missing_binding'
  | 'multiple_bindings'
  | 'unknown_endpoint'
  | 'duplicate_identifier';

function describeConnector(connector: ConnectorRef): string {
  return connector.operatorId === null
    ? `workflow connector "${connector.connectorId}"`
    : `connector "${connector.connectorId}" of operator "${connector.operatorId}"`;
}

const connectivityIssueText: Record<ConnectivityIssue, string> = {
  missing_binding: 'has no incoming link or constant',
  multiple_bindings: 'has more than one incoming link or constant',
  unknown_endpoint: 'does not exist or cannot be used at this link end',
  duplicate_identifier: 'reuses an identifier already declared in the graph',
};

export class ConnectivityError extends ValidationError {
  readonly code = 'CONNECTIVITY_ERROR';

  constructor(
    readonly connector: ConnectorRef,
    readonly issue: ConnectivityIssue,
  ) {
    super(`The ${describeConnector(connector)} ${connectivityIssueText[issue]}.`);
    this.name = 'ConnectivityError';
  }
}

export class TypeMismatchError extends ValidationError {
  readonly code = 'TYPE_MISMATCH';

  constructor(
    readonly linkId: string,
    readonly expected: DataType,
    readonly actual: DataType,
    readonly bindingKind: 'link' | 'constant' = 'link',
  ) {
    super(`The ${bindingKind} "${linkId}" carries ${actual} into a connector expecting ${expected}.`);
    this.name = 'TypeMismatchError';
  }
}

export type DanglingReferenceReason = 'missing' | 'disabled';

export class DanglingReferenceError extends ValidationError {
  readonly code = 'DANGLING_REFERENCE';

  constructor(
    readonly operatorId: string,
    readonly transformationId: string,
    readonly reason: DanglingReferenceReason,
  ) {
    const detail = reason === 'missing' ? 'does not exist' : 'is disabled and cannot be used by a released workflow';
    super(`Operator "${operatorId}" references transformation "${transformationId}", which ${detail}.`);
    this.name = 'DanglingReferenceError';
  }
}

export class InterfaceMismatchError extends ValidationError {
  readonly code = 'INTERFACE_MISMATCH';

  constructor(
    readonly revisionId: string,
    readonly detail: string,
    readonly operatorId: string | null = null,
  ) {
    const subject = operatorId === null ? `Revision "${revisionId}"` : `Operator "${operatorId}" of revision "${revisionId}"`;
    super(`${subject}: ${detail}`);
    this.name = 'InterfaceMismatchError';
  }
}

export class TestWiringError extends ValidationError {
  readonly code = 'TEST_WIRING_INVALID';

  constructor(
    readonly revisionId: string,
    readonly connectorName: string,
    readonly detail: string,
  ) {
    super(`Test wiring of revision "${revisionId}" for "${connectorName}" ${detail}.`);
    this.name = 'TestWiringError';
  }
}

export class RevisionIdentityError extends ValidationError {
  readonly code = 'REVISION_IDENTITY_CHANGED';

  constructor(
    readonly revisionId: string,
    readonly field: 'type' | 'revisionGroupId',
  ) {
    super(`The ${field} of revision "${revisionId}" cannot change once stored.`);
    this.name = 'RevisionIdentityError';
  }
}

export class VersionTagConflictError extends ValidationError {
  readonly code = 'VERSION_TAG_CONFLICT';

  constructor(
    readonly revisionGroupId: string,
    readonly versionTag: string,
    readonly existingRevisionId: string,
  ) {
    super(
      `Version tag "${versionTag}" is already used in revision group "${revisionGroupId}" by revision "${existingRevisionId}".`,
    );
    this.name = 'VersionTagConflictError';
  }
}

/** Rejection of a state change or of a write to a frozen revision. */
export abstract class LifecycleError extends CoreError {
  abstract readonly currentState: RevisionState | null;
  abstract readonly requestedState: RevisionState;
}

export class InvalidTransitionError extends LifecycleError {
  readonly code = 'INVALID_TRANSITION';

  constructor(
    readonly revisionId: string,
    readonly currentState: RevisionState | null,
    readonly requestedState: RevisionState,
  ) {
    super(`Invalid revision transition for "${revisionId}": ${currentState ?? 'NEW'} -> ${requestedState}`);
    this.name = 'InvalidTransitionError';
  }
}

export class ImmutableRevisionError extends LifecycleError {
  readonly code = 'IMMUTABLE_REVISION';
  readonly currentState = 'RELEASED';
  readonly requestedState = 'RELEASED';

  constructor(readonly revisionId: string) {
    super(`Revision "${revisionId}" is released; overwriting it requires allowOverwriteReleased.`);
    this.name = 'ImmutableRevisionError';
  }
}

export type ReferencedRevisionAction = 'delete' | 'overwrite';

export class ReferencedRevisionError extends CoreError {
  readonly code = 'REFERENCED_REVISION';

  constructor(
    readonly revisionId: string,
    readonly usedBy: string[],
    readonly action: ReferencedRevisionAction,
  ) {
    super(`Cannot ${action} revision "${revisionId}"; it is used by workflows ${usedBy.join(', ')}.`);
    this.name = 'ReferencedRevisionError';
  }
}

export type UnresolvedDependencyReason = 'missing' | 'interface_mismatch' | 'compile_failed';

export class UnresolvedDependencyError extends CoreError {
  readonly code = 'UNRESOLVED_DEPENDENCY';

  constructor(
    readonly workflowId: string,
    readonly operatorId: string,
    readonly transformationId: string,
    readonly reason: UnresolvedDependencyReason,
    options?: { cause?: unknown },
  ) {
    super(
      `Operator "${operatorId}" of workflow "${workflowId}" cannot use transformation "${transformationId}" (${reason}).`,
      options,
    );
    this.name = 'UnresolvedDependencyError';
  }
}

export class UnboundedNestingError extends CoreError {
  readonly code = 'UNBOUNDED_NESTING';

  constructor(
    readonly workflowId: string,
    readonly revisionPath: string[],
  ) {
    super(`Nesting of workflow "${workflowId}" does not terminate: ${revisionPath.join(' -> ')}.`);
    this.name = 'UnboundedNestingError';
  }
}

export class ConcurrentModificationError extends CoreError {
  readonly code = 'CONCURRENT_MODIFICATION';
  override readonly retryable = true;

  constructor(readonly revisionIds: string[]) {
    super(`Revisions changed while they were being read: ${revisionIds.join(', ')}.`);
    this.name = 'ConcurrentModificationError';
  }
}

export class RevisionNotFoundError extends CoreError {
  readonly code = 'REVISION_NOT_FOUND';

  constructor(readonly revisionId: string) {
    super(`No transformation revision found for id="${revisionId}".`);
    this.name = 'RevisionNotFoundError';
  }
}

export class RevisionStoreError extends CoreError {
  readonly code = 'REVISION_STORE_FAILURE';

  constructor(
    readonly operation: string,
    options: { cause: unknown },
  ) {
    super(`Revision store failed during ${operation}.`, options);
    this.name = 'RevisionStoreError';
  }
}

export class RevisionDocumentError extends CoreError {
  readonly code = 'REVISION_DOCUMENT_INVALID';

  constructor(readonly issues: string[]) {
    super(`Invalid transformation revision document: ${issues.join('; ')}`);
    this.name = 'RevisionDocumentError';
  }
}

export class UnitExecutionError extends CoreError {
  readonly code = 'UNIT_EXECUTION_FAILED';

  constructor(
    readonly transformationId: string,
    message: string,
  ) {
    super(message);
    this.name = 'UnitExecutionError';
  }
}

export function isCoreError(error: unknown): error is CoreError {
  return error instanceof CoreError;
}

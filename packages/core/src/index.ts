export * from './errors.js';
export {
  createLogger,
  createSilentLogger,
  isLogLevel,
  logLevels,
  resolveLogLevel,
  type LogLevel,
  type Logger,
  type LoggerOptions,
} from './logger.js';
export {
  endpointKey,
  findOperatorCycle,
  indexWorkflowGraph,
  orderOperators,
  type EndpointBinding,
  type IndexedEndpoint,
  type IndexedWorkflowGraph,
} from './graphIndex.js';
export {
  acceptsDataType,
  assertValidWorkflowGraph,
  findReferenceCycle,
  validateWorkflowGraph,
  type GraphValidationContext,
  type GraphValidationResult,
} from './graphValidation.js';
export { assertValidRevision, sameIoInterface, type RevisionValidationContext } from './revisionValidation.js';
export {
  authorizeRevisionWrite,
  canTransitionRevision,
  isRevisionFrozen,
  isRevisionTerminal,
  type RevisionWriteKind,
} from './stateMachine.js';
export {
  DEFAULT_MAX_NESTING_DEPTH,
  activeUsedBy,
  recomputeNesting,
  refreshNesting,
  usedBy,
  type NestingOptions,
} from './nestingResolver.js';
export {
  compileRevision,
  renderWorkflowSource,
  type CompileDependencies,
  type ComponentUnit,
  type ExecutableUnit,
  type ExecutionStep,
  type OutputBinding,
  type StepInput,
  type ValueSource,
  type WorkflowUnit,
} from './codeGenerator.js';
export {
  generateComponentCode,
  generatedHeaderEnd,
  generatedHeaderStart,
  readComponentInfo,
  toComponentInfo,
  updateComponentCode,
  type ComponentInfo,
} from './componentCode.js';
export {
  parseRevisionDocument,
  parseRevisionDocuments,
  revisionDocumentSchema,
  toRevisionDocument,
  type RevisionDocument,
} from './revisionDocument.js';
export {
  DIRECT_PROVISIONING_ADAPTER,
  resolveDirectProvisioningInputs,
  runExecutableUnit,
  type ComponentInvoker,
  type UnitRunResult,
  type UnitValues,
} from './unitRunner.js';
export { InMemoryRevisionStore } from './inMemoryRevisionStore.js';
export {
  createRevisionService,
  type RevisionService,
  type RevisionServiceOptions,
  type StoredRevision,
} from './revisionService.js';

export {
  makeSnapshot,
  contentKey,
  sameMode,
  recordsByPath,
  resolveOwningRoot,
  composeSnapshot,
  effectiveMode,
  findModeConflict,
  type ModeConflict,
  type SignatureMode,
  type FileRecord,
  type Snapshot,
  type ContentKey,
  type CatalogSnapshot,
} from "./snapshot.js";

export { buildSignatureIndex, type SignatureIndex } from "./signature-index.js";

export {
  matchSnapshots,
  type MoveEdge,
  type CopyIntent,
  type TransferIntent,
  type MatchResult,
} from "./matcher.js";

export {
  ScratchAllocator,
  buildMoveGraph,
  stronglyConnectedComponents,
  resolveMoves,
  type ResolvedMoves,
} from "./move-graph.js";

export {
  assemblePlan,
  checkPlan,
  planReconciliation,
  summarizePlan,
  type Operation,
  type OperationKind,
  type Plan,
  type PlanStats,
  type PlanOptions,
  type AssembleOptions,
} from "./plan.js";

export {
  findDuplicateGroups,
  formatDuplicateGroups,
  type DuplicateGroup,
} from "./duplicates.js";

export {
  computeSignature,
  fileDigest,
  partialDigest,
  normalizeHashAlg,
  listSupportedHashes,
  defaultHashAlg,
  describeMode,
  parseMode,
  type HashAlg,
} from "./hash.js";

export {
  CatalogStore,
  findCatalogRoots,
  loadHierarchy,
  loadRoots,
  type LoadedCatalog,
  type Hierarchy,
  type HierarchyOptions,
  type CatalogStoreOptions,
} from "./catalog.js";

export {
  updateCatalogs,
  DEFAULT_HASH_CONCURRENCY,
  type UpdateOptions,
  type CatalogUpdateStats,
} from "./scan.js";

export {
  renderScript,
  writeScript,
  shellQuote,
  type ScriptOptions,
} from "./script.js";

export { loadConfig, type DirplanConfig } from "./config.js";

export {
  PlanInvariantError,
  SnapshotError,
  CatalogError,
} from "./errors.js";

export {
  StructuredLogger,
  ConsoleLogger,
  NullLogger,
  memoryLogger,
  formatLogLine,
  parseLogLevel,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogMeta,
} from "./logger.js";

export { buildProgram } from "./cli.js";

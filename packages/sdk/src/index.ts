/**
 * leadlink SDK
 *
 * Index-stable datasets, a lead mapping ledger and a field registry for
 * multi-stage lead-enrichment pipelines
 */

export type {
  JsonValue,
  JsonObject,
  Segment,
  IndexedEntry,
  LeadRecord,
  MappingFile,
  RegisteredFile,
  RegistryFile,
  ResultRecord,
  ValueSource,
  Literal,
  WhereClause,
  ErrorResult,
  ExtractOptions,
  ExtractOutput,
  InitMappingOutput,
  UpdateMappingOutput,
  BulkRegisterOutput,
  LinkSummary,
  LinkOutput,
  RegisterOutput,
  LookupOutput,
  AppendResultsOutput,
  ListDatasetsOutput,
  DescribeRegistryOutput,
  UnlockOutput,
  BatchAnnotator,
  ActorRunner,
  EnrichOptions,
  EnrichSummary,
  EnrichOutput,
  CollectOptions,
  CollectOutput,
  WorkspaceOptions,
} from "./types.js";

export {
  LeadLinkError,
  NotFoundError,
  MalformedPathError,
  TypeMismatchError,
  OutOfRangeError,
  InvalidFilterError,
  DuplicateIndexError,
  ConfigurationError,
  DocumentReadError,
  DocumentWriteError,
  DirectoryError,
  LockTimeoutError,
  TargetDriftError,
  UnexpectedIndexError,
  ActorOutputError,
  toErrorResult,
} from "./errors.js";

export {
  IndexedList,
  parsePath,
  formatPath,
  evaluate,
  evaluateValue,
  isJsonObject,
  describeShape,
} from "./path.js";
export { parseWhere, coerceLiteral } from "./where.js";
export { ExtractionEngine, compileReader, paginate } from "./extract.js";
export { DatasetStore, datasetFileName, indexFieldFor } from "./datasets.js";
export { MappingStore, MAPPING_FILE, leadIndex, indexLeads } from "./mapping.js";
export type { InitSummary } from "./mapping.js";
export { FieldRegistry, REGISTRY_FILE } from "./registry.js";
export { LinkingEngine, isLinked, nextTargetIndex } from "./link.js";
export { ResultsStore, resultsFileName, toResultRecords } from "./results.js";
export { EnrichmentRunner, chunk } from "./enrich.js";
export { StageCollector, queriesInput } from "./stage.js";
export type { InputBuilder } from "./stage.js";
export { FileLock, LOCK_FILE } from "./lock.js";
export {
  DEFAULT_ROOT,
  DEFAULT_BATCH_SIZE,
  DEFAULT_LOCK_TIMEOUT_MS,
  defaultRoot,
  resolveBatchSize,
} from "./config.js";
export { Workspace, openWorkspace } from "./workspace.js";
export { logger } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";

/**
 * Core types for leadlink
 */

/**
 * Any value that survives a JSON round trip
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

/**
 * JSON object with arbitrary members
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * One step of a path expression
 */
export type Segment =
  | { kind: "key"; name: string }
  | { kind: "index"; position: number }
  | { kind: "all" };

/**
 * A value tagged with its row (or element) position
 */
export interface IndexedEntry<T = JsonValue> {
  index: number;
  value: T;
}

/**
 * A lead record: one row of the mapping ledger.
 * Keys ending in `Index` hold row positions into the matching dataset;
 * anything else is an attached enrichment field.
 */
export type LeadRecord = JsonObject;

/**
 * Mapping file layout (`mapping.json`)
 */
export interface MappingFile {
  leads: LeadRecord[];
}

/**
 * Registry entry for one output file
 */
export interface RegisteredFile {
  fields: string[];
  index_field: string;
}

/**
 * Registry file layout (`registry.json`)
 */
export interface RegistryFile {
  files: Record<string, RegisteredFile>;
  fields: Record<string, string>;
}

/**
 * One record of an enrichment output file
 */
export interface ResultRecord extends JsonObject {
  index: number;
}

/**
 * Where a field's value lives
 */
export type ValueSource =
  | { kind: "file"; field: string; outputFile: string; indexField: string | null }
  | { kind: "attached"; field: string };

/**
 * Literal accepted on the right-hand side of a where clause
 */
export type Literal = boolean | number | string;

/**
 * Parsed `field=value` predicate
 */
export interface WhereClause {
  field: string;
  value: Literal;
}

/**
 * Failure half of every status result
 */
export interface ErrorResult {
  status: "error";
  error: string;
  /** Stable error code of the underlying failure */
  code: string;
}

/**
 * Extraction request. Exactly one of `path` or `fields` must be set.
 */
export interface ExtractOptions {
  /** Dataset name (`.json` suffix optional) */
  source: string;
  /** Single path, e.g. `[*].author.name` */
  path?: string;
  /** Labelled projection, label → path */
  fields?: Record<string, string>;
  /** `field=value` qualification */
  where?: string;
  offset?: number;
  limit?: number;
  /** Persist the extracted values as a new dataset */
  saveAs?: string;
}

export type ExtractOutput =
  | {
      status: "success";
      data: IndexedEntry[];
      count: number;
      savedTo?: string;
    }
  | ErrorResult;

export type InitMappingOutput =
  | { status: "success"; created: number; skipped: number; totalLeads: number }
  | ErrorResult;

export type UpdateMappingOutput = { status: "success"; updated: number } | ErrorResult;

export interface LinkSummary {
  /** Source indices that received a new target index */
  linked: number[];
  /** Source indices that already carried a target index */
  skipped: number[];
  /** Source indices with no lead in the mapping */
  missing: number[];
  /** First target index assigned, null when nothing was linked */
  targetStart: number | null;
}

export type LinkOutput =
  | ({ status: "success" } & LinkSummary)
  | (ErrorResult & LinkSummary);

export type BulkRegisterOutput = { status: "success"; recorded: number } | ErrorResult;

export type RegisterOutput = { status: "success"; outputFile: string; fields: string[] } | ErrorResult;

export type LookupOutput = { status: "success"; value: JsonValue } | ErrorResult;

export type AppendResultsOutput =
  | { status: "success"; appended: number; total: number; outputFile: string }
  | ErrorResult;

export type ListDatasetsOutput = { status: "success"; datasets: string[] } | ErrorResult;

export type UnlockOutput = { status: "success"; removed: boolean } | ErrorResult;

export type DescribeRegistryOutput = { status: "success"; files: RegistryFile["files"] } | ErrorResult;

/**
 * LLM batch-completion collaborator.
 * Receives indexed items and returns one annotation record per item.
 */
export interface BatchAnnotator {
  annotate(request: {
    items: IndexedEntry[];
    task: string;
    outputFields: string[];
  }): Promise<JsonValue[]>;
}

/**
 * Actor/API collaborator: submit a job, wait, return its flat result list
 */
export interface ActorRunner {
  run(actorId: string, input: JsonObject): Promise<JsonValue[]>;
}

export interface EnrichOptions {
  source: string;
  path?: string;
  fields?: Record<string, string>;
  where?: string;
  /** Natural-language task handed to the annotator */
  task: string;
  outputFields: string[];
  batchSize?: number;
  /** Output file name; defaults to `<source>_<firstOutputField>.json` */
  resultsFile?: string;
  dryRun?: boolean;
}

export interface EnrichSummary {
  /** Records persisted by this run */
  processed: number;
  /** Items skipped because the results file already had them */
  skipped: number;
  /** Batches completed (or planned, for a dry run) */
  batches: number;
  resultsFile: string;
}

export type EnrichOutput =
  | ({ status: "success" | "dry_run" } & EnrichSummary)
  | (ErrorResult & EnrichSummary);

export interface CollectOptions {
  /** Dataset the input values come from */
  source: string;
  /** Path to the value each actor job needs, e.g. `[*].author.profileUrl` */
  path: string;
  where?: string;
  limit?: number;
  actorId: string;
  /** Dataset the actor items are appended to */
  target: string;
  /** Defaults to the index field derived from `target` */
  targetIndexField?: string;
}

export type CollectOutput =
  | ({ status: "success"; appended: number } & LinkSummary)
  | (ErrorResult & { appended: number });

export interface WorkspaceOptions {
  /** Directory holding datasets, mapping and registry */
  root: string;
  /** Serialize writers through an advisory lock file (default: true) */
  lock?: boolean;
  /** Default enrichment batch size (default: 20) */
  batchSize?: number;
  /** Maximum time to wait for the lock in ms (default: 30000) */
  lockTimeoutMs?: number;
}

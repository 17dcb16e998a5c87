/**
 * Workspace: every store and engine over one root directory
 *
 * Public operations return status results and never throw. Mutating
 * operations hold the root's advisory lock unless `lock: false`.
 */

import * as path from "node:path";
import { DEFAULT_LOCK_TIMEOUT_MS } from "./config.js";
import { DatasetStore, indexFieldFor } from "./datasets.js";
import { EnrichmentRunner } from "./enrich.js";
import { toErrorResult } from "./errors.js";
import { ExtractionEngine } from "./extract.js";
import { LinkingEngine } from "./link.js";
import { FileLock } from "./lock.js";
import { MAPPING_FILE, MappingStore } from "./mapping.js";
import { REGISTRY_FILE, FieldRegistry } from "./registry.js";
import { ResultsStore, toResultRecords } from "./results.js";
import { StageCollector, type InputBuilder } from "./stage.js";
import type {
  ActorRunner,
  AppendResultsOutput,
  BatchAnnotator,
  BulkRegisterOutput,
  CollectOptions,
  CollectOutput,
  DescribeRegistryOutput,
  EnrichOptions,
  EnrichOutput,
  ExtractOptions,
  ExtractOutput,
  InitMappingOutput,
  JsonObject,
  JsonValue,
  LinkOutput,
  ListDatasetsOutput,
  LookupOutput,
  RegisterOutput,
  UnlockOutput,
  UpdateMappingOutput,
  WorkspaceOptions,
} from "./types.js";

const BOOKKEEPING_FILES = new Set([MAPPING_FILE, REGISTRY_FILE]);

export class Workspace {
  readonly root: string;
  readonly datasets: DatasetStore;
  readonly registry: FieldRegistry;
  readonly mapping: MappingStore;
  readonly results: ResultsStore;

  #extraction: ExtractionEngine;
  #linking: LinkingEngine;
  #enrichment: EnrichmentRunner;
  #collector: StageCollector;
  #locking: boolean;
  #lockTimeoutMs: number;

  constructor(options: WorkspaceOptions) {
    this.root = path.resolve(options.root);
    this.datasets = new DatasetStore(this.root);
    this.registry = new FieldRegistry(this.root, this.datasets);
    this.mapping = new MappingStore(this.root, this.datasets, this.registry);
    this.results = new ResultsStore(this.datasets);

    this.#extraction = new ExtractionEngine(this.datasets, this.mapping, this.registry);
    this.#linking = new LinkingEngine(this.mapping);
    this.#enrichment = new EnrichmentRunner(
      this.datasets,
      this.#extraction,
      this.results,
      this.mapping,
      options.batchSize
    );
    this.#collector = new StageCollector(this.datasets, this.mapping, this.#extraction, this.#linking);
    this.#locking = options.lock ?? true;
    this.#lockTimeoutMs = options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
  }

  /**
   * Run a mutation with the root's lock held; any failure becomes `fail(err)`
   */
  async #exclusive<T>(fn: () => Promise<T>, fail: (err: unknown) => T): Promise<T> {
    try {
      if (!this.#locking) {
        return await fn();
      }
      return await new FileLock(this.root).withLock(fn, this.#lockTimeoutMs);
    } catch (err) {
      return fail(err);
    }
  }

  async extract(options: ExtractOptions): Promise<ExtractOutput> {
    if (!options.saveAs) {
      return this.#extraction.extract(options);
    }
    return this.#exclusive<ExtractOutput>(() => this.#extraction.extract(options), toErrorResult);
  }

  /**
   * Seed one lead per row of `source`; the index field defaults to the dataset's own
   */
  async initMapping(source: string, indexField: string = indexFieldFor(source)): Promise<InitMappingOutput> {
    return this.#exclusive<InitMappingOutput>(async () => {
      const summary = await this.mapping.init(source, indexField);
      return { status: "success", ...summary };
    }, toErrorResult);
  }

  async updateMapping(
    indexField: string,
    indices: number[],
    field: string,
    value: JsonValue
  ): Promise<UpdateMappingOutput> {
    return this.#exclusive<UpdateMappingOutput>(async () => {
      const updated = await this.mapping.updateField(indexField, indices, field, value);
      return { status: "success", updated };
    }, toErrorResult);
  }

  async bulkRegister(
    indexField: string,
    results: JsonObject[],
    outputFile?: string
  ): Promise<BulkRegisterOutput> {
    return this.#exclusive<BulkRegisterOutput>(async () => {
      const recorded = await this.mapping.bulkRegister(indexField, results, outputFile);
      return { status: "success", recorded };
    }, toErrorResult);
  }

  async link(
    sourceIndexField: string,
    sourceIndices: number[],
    targetIndexField: string
  ): Promise<LinkOutput> {
    return this.#exclusive<LinkOutput>(
      () => this.#linking.link(sourceIndexField, sourceIndices, targetIndexField),
      (err) => ({ ...toErrorResult(err), linked: [], skipped: [], missing: [], targetStart: null })
    );
  }

  async register(outputFile: string, fields: string[], indexField: string): Promise<RegisterOutput> {
    return this.#exclusive<RegisterOutput>(async () => {
      const carried = await this.registry.register(outputFile, fields, indexField);
      return { status: "success", outputFile, fields: carried };
    }, toErrorResult);
  }

  async lookup(field: string, index: number): Promise<LookupOutput> {
    const value = await this.registry.lookup(field, index);
    return { status: "success", value };
  }

  /**
   * Append `{index, ...}` records to an output file, then register it
   */
  async appendResults(
    outputFile: string,
    items: JsonValue[],
    indexField: string
  ): Promise<AppendResultsOutput> {
    return this.#exclusive<AppendResultsOutput>(async () => {
      const records = toResultRecords(items, outputFile);
      const total = await this.results.append(outputFile, records);
      await this.mapping.bulkRegister(indexField, records, outputFile);
      return { status: "success", appended: records.length, total, outputFile };
    }, toErrorResult);
  }

  /**
   * Dataset files under the root, without the mapping and registry
   */
  async listDatasets(): Promise<ListDatasetsOutput> {
    try {
      const files = await this.datasets.list();
      return { status: "success", datasets: files.filter((name) => !BOOKKEEPING_FILES.has(name)) };
    } catch (err) {
      return toErrorResult(err);
    }
  }

  async describeRegistry(): Promise<DescribeRegistryOutput> {
    try {
      const registry = await this.registry.load();
      return { status: "success", files: registry.files };
    } catch (err) {
      return toErrorResult(err);
    }
  }

  async enrich(options: EnrichOptions, annotator: BatchAnnotator): Promise<EnrichOutput> {
    return this.#exclusive<EnrichOutput>(
      () => this.#enrichment.run(options, annotator),
      (err) => ({
        ...toErrorResult(err),
        processed: 0,
        skipped: 0,
        batches: 0,
        resultsFile: options.resultsFile ?? "",
      })
    );
  }

  /**
   * Remove a lock file left behind by a crashed writer
   */
  async unlock(): Promise<UnlockOutput> {
    try {
      return { status: "success", removed: await FileLock.forceRemove(this.root) };
    } catch (err) {
      return toErrorResult(err);
    }
  }

  async collect(options: CollectOptions, runner: ActorRunner, build?: InputBuilder): Promise<CollectOutput> {
    return this.#exclusive<CollectOutput>(
      () => this.#collector.collect(options, runner, build),
      (err) => ({ ...toErrorResult(err), appended: 0 })
    );
  }
}

export function openWorkspace(options: WorkspaceOptions): Workspace {
  return new Workspace(options);
}

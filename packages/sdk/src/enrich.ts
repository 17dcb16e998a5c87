/**
 * Enrichment runner: the core side of an LLM stage
 *
 * Items come from an extraction, go to the annotator one batch at a time,
 * and every finished batch is appended to the results file and registered
 * before the next call. A rerun skips every index already in the file.
 * Annotations must only name indices from the batch they answer.
 */

import { resolveBatchSize } from "./config.js";
import { UnexpectedIndexError, toErrorResult } from "./errors.js";
import type { DatasetStore } from "./datasets.js";
import { indexFieldFor } from "./datasets.js";
import type { ExtractionEngine } from "./extract.js";
import type { MappingStore } from "./mapping.js";
import { logger } from "./observability/logs.js";
import { resultsFileName, toResultRecords, type ResultsStore } from "./results.js";
import type {
  BatchAnnotator,
  EnrichOptions,
  EnrichOutput,
  EnrichSummary,
  IndexedEntry,
  ResultRecord,
} from "./types.js";

/**
 * Split items into consecutive chunks of at most `size`
 */
export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * @throws UnexpectedIndexError if a record answers an item that was not sent
 */
function checkBatchIndices(records: ResultRecord[], items: IndexedEntry[], what: string): void {
  const sent = new Set(items.map((item) => item.index));
  const stray = records.map((record) => record.index).filter((index) => !sent.has(index));
  if (stray.length > 0) {
    throw new UnexpectedIndexError(what, stray, [...sent]);
  }
}

export class EnrichmentRunner {
  #datasets: DatasetStore;
  #extraction: ExtractionEngine;
  #results: ResultsStore;
  #mapping: MappingStore;
  #batchSize?: number;

  constructor(
    datasets: DatasetStore,
    extraction: ExtractionEngine,
    results: ResultsStore,
    mapping: MappingStore,
    batchSize?: number
  ) {
    this.#datasets = datasets;
    this.#extraction = extraction;
    this.#results = results;
    this.#mapping = mapping;
    this.#batchSize = batchSize;
  }

  async run(options: EnrichOptions, annotator: BatchAnnotator): Promise<EnrichOutput> {
    const summary: EnrichSummary = {
      processed: 0,
      skipped: 0,
      batches: 0,
      resultsFile: options.resultsFile ?? "",
    };

    let outputFile: string;
    let batchSize: number;
    try {
      outputFile = options.resultsFile ?? resultsFileName(options.source, options.outputFields);
      summary.resultsFile = this.#datasets.path(outputFile);
      batchSize = resolveBatchSize(options.batchSize ?? this.#batchSize);
    } catch (err) {
      return { ...toErrorResult(err), ...summary };
    }

    const extracted = await this.#extraction.extract({
      source: options.source,
      path: options.path,
      fields: options.fields,
      where: options.where,
    });
    if (extracted.status === "error") {
      return { ...extracted, ...summary };
    }

    let pending: IndexedEntry[];
    try {
      const done = await this.#results.processedIndices(outputFile);
      const candidates = extracted.data.filter((item) => item.value !== null);
      pending = candidates.filter((item) => !done.has(item.index));
      summary.skipped = candidates.length - pending.length;
    } catch (err) {
      return { ...toErrorResult(err), ...summary };
    }

    const batches = chunk(pending, batchSize);
    if (summary.skipped > 0) {
      logger.info("enrich.skip", {
        dataset: options.source,
        details: { skipped: summary.skipped, pending: pending.length },
      });
    }

    if (options.dryRun) {
      return { status: "dry_run", ...summary, batches: batches.length };
    }

    const indexField = indexFieldFor(options.source);

    for (const [position, items] of batches.entries()) {
      try {
        const annotations = await annotator.annotate({
          items,
          task: options.task,
          outputFields: options.outputFields,
        });
        const what = `Batch ${position + 1} annotations`;
        const records = toResultRecords(annotations, what);
        checkBatchIndices(records, items, what);

        await this.#results.append(outputFile, records);
        await this.#mapping.bulkRegister(indexField, records, outputFile);

        summary.processed += records.length;
        summary.batches++;
        logger.info("enrich.batch", {
          dataset: outputFile,
          details: { batch: position + 1, of: batches.length, records: records.length },
        });
      } catch (err) {
        logger.error("enrich.aborted", {
          dataset: outputFile,
          message: err instanceof Error ? err.message : String(err),
          details: { batch: position + 1, processed: summary.processed },
        });
        return { ...toErrorResult(err), ...summary };
      }
    }

    return { status: "success", ...summary };
  }
}

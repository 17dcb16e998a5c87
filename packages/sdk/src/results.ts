/**
 * Enrichment output files: `[{ "index": 3, "isHiring": true, ... }, ...]`
 *
 * `index` is in the producing stage's own index domain and is unique within
 * a file. Appends that would repeat an index fail before anything is written.
 */

import { DuplicateIndexError, TypeMismatchError } from "./errors.js";
import type { DatasetStore } from "./datasets.js";
import { datasetFileName } from "./datasets.js";
import { logger } from "./observability/logs.js";
import { describeShape, isJsonObject } from "./path.js";
import { parseShape, ResultRecordsSchema } from "./schema/shapes.js";
import type { JsonValue, ResultRecord } from "./types.js";

/**
 * Default output file name: `<source>_<firstOutputField>.json`
 */
export function resultsFileName(source: string, outputFields: string[]): string {
  const base = source.endsWith(".json") ? source.slice(0, -".json".length) : source;
  const first = outputFields[0];
  if (!first) {
    throw new TypeMismatchError("At least one output field is required to name a results file");
  }
  return `${base}_${first}.json`;
}

/**
 * Check that every item is an object with a non-negative integer `index`
 */
export function toResultRecords(items: JsonValue[], what: string): ResultRecord[] {
  items.forEach((item, position) => {
    if (!isJsonObject(item)) {
      throw new TypeMismatchError(
        `${what}: item ${position} must be an object, got ${describeShape(item)}`
      );
    }
    if (typeof item.index !== "number" || !Number.isInteger(item.index) || item.index < 0) {
      throw new TypeMismatchError(
        `${what}: item ${position} must carry a non-negative integer "index"`
      );
    }
  });
  return parseShape(ResultRecordsSchema, items, what);
}

export class ResultsStore {
  #datasets: DatasetStore;

  constructor(datasets: DatasetStore) {
    this.#datasets = datasets;
  }

  /**
   * Records already in an output file (empty when it doesn't exist)
   */
  async load(outputFile: string): Promise<ResultRecord[]> {
    if (!(await this.#datasets.exists(outputFile))) {
      return [];
    }
    const data = await this.#datasets.loadArray(outputFile);
    return toResultRecords(data, this.#datasets.path(outputFile));
  }

  /**
   * Indices already present in an output file
   */
  async processedIndices(outputFile: string): Promise<Set<number>> {
    const records = await this.load(outputFile);
    return new Set(records.map((record) => record.index));
  }

  /**
   * Append records to an output file
   * @returns total number of records in the file afterwards
   * @throws DuplicateIndexError if an index is already present or repeats in the batch;
   *   the file is left untouched
   */
  async append(outputFile: string, records: ResultRecord[]): Promise<number> {
    const existing = await this.load(outputFile);
    const seen = new Set(existing.map((record) => record.index));

    const duplicates = new Set<number>();
    for (const record of records) {
      if (seen.has(record.index)) {
        duplicates.add(record.index);
      }
      seen.add(record.index);
    }

    if (duplicates.size > 0) {
      throw new DuplicateIndexError(
        datasetFileName(outputFile),
        [...duplicates].sort((a, b) => a - b)
      );
    }

    const combined = [...existing, ...records];
    await this.#datasets.save(outputFile, combined);
    logger.info("results.append", {
      dataset: datasetFileName(outputFile),
      details: { appended: records.length, total: combined.length },
    });
    return combined.length;
  }
}

/**
 * Dataset store: one JSON array file per pipeline stage output
 *
 * Datasets are append-only. A row's index is its position in the array and
 * never changes once written.
 */

import { join } from "node:path";
import { TypeMismatchError } from "./errors.js";
import { fileExists, listFiles, readJsonFile, writeJsonFile } from "./io.js";
import { logger } from "./observability/logs.js";
import { describeShape } from "./path.js";
import type { JsonValue } from "./types.js";

/**
 * Normalize a dataset name to its file name (`postData` → `postData.json`)
 */
export function datasetFileName(name: string): string {
  return name.endsWith(".json") ? name : `${name}.json`;
}

/**
 * Index field of a dataset (`postData` → `postIndex`, `search` → `searchIndex`)
 */
export function indexFieldFor(name: string): string {
  const base = name.endsWith(".json") ? name.slice(0, -".json".length) : name;
  if (base.endsWith("Data")) {
    return `${base.slice(0, -"Data".length)}Index`;
  }
  return `${base}Index`;
}

export class DatasetStore {
  #root: string;

  constructor(root: string) {
    this.#root = root;
  }

  /**
   * Absolute path of a dataset file
   */
  path(name: string): string {
    return join(this.#root, datasetFileName(name));
  }

  async exists(name: string): Promise<boolean> {
    return fileExists(this.path(name));
  }

  /**
   * Load any JSON file under the root
   * @throws NotFoundError if the file doesn't exist
   */
  async load(name: string): Promise<JsonValue> {
    return readJsonFile(this.path(name));
  }

  /**
   * Load a dataset that must be an array
   * @throws TypeMismatchError if the file holds something else
   */
  async loadArray(name: string): Promise<JsonValue[]> {
    const data = await this.load(name);
    if (!Array.isArray(data)) {
      throw new TypeMismatchError(
        `Dataset must be an array: ${this.path(name)} holds ${describeShape(data)}`
      );
    }
    return data;
  }

  async save(name: string, rows: JsonValue[]): Promise<void> {
    await writeJsonFile(this.path(name), rows);
  }

  /**
   * Append rows to a dataset, creating it when missing
   * @returns the new dataset length
   */
  async append(name: string, rows: JsonValue[]): Promise<number> {
    const existing = (await this.exists(name)) ? await this.loadArray(name) : [];
    const combined = [...existing, ...rows];
    await this.save(name, combined);
    logger.info("dataset.append", {
      dataset: datasetFileName(name),
      details: { appended: rows.length, total: combined.length },
    });
    return combined.length;
  }

  /**
   * Dataset file names under the root, sorted
   */
  async list(): Promise<string[]> {
    return listFiles(this.#root, ".json");
  }
}

/**
 * Field registry: which output file is authoritative for each enrichment field
 *
 * Layout of `registry.json`:
 * ```json
 * {
 *   "files": { "postData_isHiring.json": { "fields": ["isHiring", "reasoning"], "index_field": "postIndex" } },
 *   "fields": { "isHiring": "postData_isHiring.json", "reasoning": "postData_isHiring.json" }
 * }
 * ```
 *
 * Invariants:
 * - A field maps to exactly one output file; the last registration wins
 * - The literal `index` key is never a resolvable field
 * - Whole-file read-modify-write; callers serialize writers
 */

import { join } from "node:path";
import { DatasetStore } from "./datasets.js";
import { fileExists, readJsonFile, writeJsonFile } from "./io.js";
import { logger } from "./observability/logs.js";
import { isJsonObject } from "./path.js";
import { parseShape, RegistryFileSchema } from "./schema/shapes.js";
import type { JsonValue, RegistryFile, ValueSource } from "./types.js";

export const REGISTRY_FILE = "registry.json";

export class FieldRegistry {
  #filePath: string;
  #datasets: DatasetStore;

  constructor(root: string, datasets: DatasetStore = new DatasetStore(root)) {
    this.#filePath = join(root, REGISTRY_FILE);
    this.#datasets = datasets;
  }

  get filePath(): string {
    return this.#filePath;
  }

  /**
   * Load the registry, or an empty one when none exists yet
   */
  async load(): Promise<RegistryFile> {
    if (!(await fileExists(this.#filePath))) {
      return { files: {}, fields: {} };
    }
    return parseShape(RegistryFileSchema, await readJsonFile(this.#filePath), this.#filePath);
  }

  async save(registry: RegistryFile): Promise<void> {
    await writeJsonFile(this.#filePath, registry);
  }

  /**
   * Register an output file and every field it carries
   * @param outputFile - Output file name, e.g. "postData_isHiring.json"
   * @param fields - Non-index fields carried by the file
   * @param indexField - Index field the file's `index` values belong to
   */
  async register(outputFile: string, fields: string[], indexField: string): Promise<string[]> {
    const registry = await this.load();
    const carried = fields.filter((field) => field !== "index");

    registry.files[outputFile] = { fields: carried, index_field: indexField };
    for (const field of carried) {
      registry.fields[field] = outputFile;
    }

    await this.save(registry);
    logger.info("registry.register", {
      dataset: outputFile,
      details: { fields: carried, index_field: indexField },
    });
    return carried;
  }

  /**
   * Output file authoritative for a field, or null
   */
  async resolve(field: string): Promise<string | null> {
    const registry = await this.load();
    return Object.hasOwn(registry.fields, field) ? registry.fields[field] : null;
  }

  /**
   * Decide where a field's values live
   */
  async resolveSource(field: string): Promise<ValueSource> {
    const registry = await this.load();
    if (!Object.hasOwn(registry.fields, field)) {
      return { kind: "attached", field };
    }

    const outputFile = registry.fields[field];
    const entry = Object.hasOwn(registry.files, outputFile) ? registry.files[outputFile] : null;
    return { kind: "file", field, outputFile, indexField: entry?.index_field ?? null };
  }

  /**
   * Value of a field for one own-domain index, or null when the file,
   * record or field is absent. Never throws.
   */
  async lookup(field: string, indexValue: number): Promise<JsonValue> {
    try {
      const outputFile = await this.resolve(field);
      if (outputFile === null || !(await this.#datasets.exists(outputFile))) {
        return null;
      }

      const data = await this.#datasets.load(outputFile);
      if (!Array.isArray(data)) {
        return null;
      }

      for (const item of data) {
        if (isJsonObject(item) && item.index === indexValue) {
          return Object.hasOwn(item, field) ? item[field] : null;
        }
      }
      return null;
    } catch (err) {
      logger.warn("registry.lookup_failed", {
        field,
        message: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }
}

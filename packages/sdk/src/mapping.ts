/**
 * Mapping store: the cross-dataset join ledger (`mapping.json`)
 *
 * Each lead record carries one `<stage>Index` key per dataset it has been
 * linked to, plus any enrichment fields attached the legacy way.
 *
 * Invariants:
 * - Leads are appended, mutated in place, never removed or reordered
 * - At most one value per index field per lead
 * - Whole-file read-modify-write; callers serialize writers
 */

import { join } from "node:path";
import { DatasetStore } from "./datasets.js";
import { fileExists, readJsonFile, writeJsonFile } from "./io.js";
import { logger } from "./observability/logs.js";
import { FieldRegistry } from "./registry.js";
import { MappingFileSchema, parseShape } from "./schema/shapes.js";
import type { JsonObject, JsonValue, LeadRecord, MappingFile } from "./types.js";

export const MAPPING_FILE = "mapping.json";

/**
 * Integer row index a lead carries for a field, if any
 */
export function leadIndex(lead: LeadRecord, indexField: string): number | undefined {
  if (!Object.hasOwn(lead, indexField)) return undefined;
  const value = lead[indexField];
  return typeof value === "number" && Number.isInteger(value) ? value : undefined;
}

/**
 * Map each index value to the first lead carrying it
 */
export function indexLeads(leads: LeadRecord[], indexField: string): Map<number, LeadRecord> {
  const lookup = new Map<number, LeadRecord>();
  for (const lead of leads) {
    const idx = leadIndex(lead, indexField);
    if (idx !== undefined && !lookup.has(idx)) {
      lookup.set(idx, lead);
    }
  }
  return lookup;
}

export interface InitSummary {
  created: number;
  skipped: number;
  totalLeads: number;
}

export class MappingStore {
  #filePath: string;
  #datasets: DatasetStore;
  #registry: FieldRegistry;

  constructor(
    root: string,
    datasets: DatasetStore = new DatasetStore(root),
    registry: FieldRegistry = new FieldRegistry(root, datasets)
  ) {
    this.#filePath = join(root, MAPPING_FILE);
    this.#datasets = datasets;
    this.#registry = registry;
  }

  get filePath(): string {
    return this.#filePath;
  }

  /**
   * Load the mapping, or an empty one when none exists yet
   */
  async load(): Promise<MappingFile> {
    if (!(await fileExists(this.#filePath))) {
      return { leads: [] };
    }
    return parseShape(MappingFileSchema, await readJsonFile(this.#filePath), this.#filePath);
  }

  /**
   * Overwrite the whole mapping file atomically
   */
  async save(mapping: MappingFile): Promise<void> {
    await writeJsonFile(this.#filePath, mapping);
  }

  /**
   * Add one lead per dataset row not yet present under `indexField`.
   * Existing leads are left untouched, so reruns only extend the mapping.
   * @throws NotFoundError if the dataset doesn't exist
   * @throws TypeMismatchError if the dataset is not an array
   */
  async init(source: string, indexField: string): Promise<InitSummary> {
    const rows = await this.#datasets.loadArray(source);
    const mapping = await this.load();

    const existing = new Set(indexLeads(mapping.leads, indexField).keys());

    let created = 0;
    let skipped = 0;
    for (let i = 0; i < rows.length; i++) {
      if (existing.has(i)) {
        skipped++;
        continue;
      }
      mapping.leads.push({ [indexField]: i });
      created++;
    }

    await this.save(mapping);
    logger.info("mapping.init", {
      dataset: source,
      field: indexField,
      details: { created, skipped, total_leads: mapping.leads.length },
    });

    return { created, skipped, totalLeads: mapping.leads.length };
  }

  /**
   * Set `field = value` on every lead whose `indexField` is in `indices`
   * @returns number of leads updated
   */
  async updateField(
    indexField: string,
    indices: number[],
    field: string,
    value: JsonValue
  ): Promise<number> {
    const wanted = new Set(indices);
    const mapping = await this.load();

    let updated = 0;
    for (const lead of mapping.leads) {
      const idx = leadIndex(lead, indexField);
      if (idx !== undefined && wanted.has(idx)) {
        lead[field] = value;
        updated++;
      }
    }

    await this.save(mapping);
    logger.info("mapping.update", { field, details: { index_field: indexField, updated } });
    return updated;
  }

  /**
   * Record a stage's `{index, ...}` results.
   *
   * With `outputFile`, the file and its fields are registered in the field
   * registry and the mapping is not touched. Without it, every non-index
   * field is copied onto the lead whose `indexField` equals the result's index.
   * @returns number of results recorded
   */
  async bulkRegister(
    indexField: string,
    results: JsonObject[],
    outputFile?: string
  ): Promise<number> {
    const fields = new Set<string>();
    for (const result of results) {
      for (const key of Object.keys(result)) {
        if (key !== "index") fields.add(key);
      }
    }

    if (outputFile) {
      await this.#registry.register(outputFile, [...fields], indexField);
      return results.length;
    }

    const mapping = await this.load();
    const lookup = indexLeads(mapping.leads, indexField);

    let updated = 0;
    for (const result of results) {
      const idx = result.index;
      const lead = typeof idx === "number" ? lookup.get(idx) : undefined;
      if (!lead) continue;

      for (const [field, value] of Object.entries(result)) {
        if (field !== "index") lead[field] = value;
      }
      updated++;
    }

    await this.save(mapping);
    logger.info("mapping.bulk_update", {
      details: { index_field: indexField, fields: [...fields], updated },
    });
    return updated;
  }
}

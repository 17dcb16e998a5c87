/**
 * Extraction engine: filtered, paginated, indexed projections of a dataset
 *
 * Semantics:
 * 1. Exactly one of `path` or `fields` selects what is read from each row
 * 2. Every extraction maps over all rows; a leading `[*]` is implied
 * 3. `where` narrows the rows through the registry or attached lead fields
 * 4. Rows are returned in ascending index order, then sliced by offset/limit
 * 5. A row (or projection label) that doesn't fit the path yields null
 * 6. Never throws: failures come back as `{ status: "error" }`
 */

import { ConfigurationError, OutOfRangeError, TypeMismatchError, toErrorResult } from "./errors.js";
import type { DatasetStore } from "./datasets.js";
import { indexFieldFor } from "./datasets.js";
import type { MappingStore } from "./mapping.js";
import { logger } from "./observability/logs.js";
import { evaluateValue, parsePath, stripLeadingAll } from "./path.js";
import type { FieldRegistry } from "./registry.js";
import type { ExtractOptions, ExtractOutput, IndexedEntry, JsonObject, JsonValue, Segment } from "./types.js";
import { parseWhere, qualifyIndices } from "./where.js";

type RowReader = (row: JsonValue) => JsonValue;

function readOrNull(row: JsonValue, segments: Segment[]): JsonValue {
  try {
    return evaluateValue(row, segments);
  } catch (err) {
    if (err instanceof TypeMismatchError || err instanceof OutOfRangeError) {
      return null;
    }
    throw err;
  }
}

/**
 * Validate the path/fields choice and parse every path up front
 * @throws ConfigurationError for neither or both of path/fields
 * @throws MalformedPathError for any unparsable path
 */
export function compileReader(options: Pick<ExtractOptions, "path" | "fields">): RowReader {
  const hasPath = options.path !== undefined && options.path !== "";
  const hasFields = options.fields !== undefined && Object.keys(options.fields).length > 0;

  if (!hasPath && !hasFields) {
    throw new ConfigurationError("Must provide either 'path' or 'fields'");
  }
  if (hasPath && hasFields) {
    throw new ConfigurationError("Provide only one of 'path' or 'fields'");
  }

  if (hasPath && options.path !== undefined) {
    const segments = stripLeadingAll(parsePath(options.path));
    return (row) => readOrNull(row, segments);
  }

  const projection = Object.entries(options.fields ?? {}).map(
    ([label, path]) => [label, stripLeadingAll(parsePath(path))] as const
  );
  return (row) => {
    const value: JsonObject = {};
    for (const [label, segments] of projection) {
      value[label] = readOrNull(row, segments);
    }
    return value;
  };
}

function checkWindow(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new ConfigurationError(`${name} must be a non-negative integer`);
  }
}

/**
 * Apply offset/limit as a plain slice
 */
export function paginate<T>(items: T[], offset = 0, limit?: number): T[] {
  const end = limit !== undefined ? offset + limit : undefined;
  return items.slice(offset, end);
}

export class ExtractionEngine {
  #datasets: DatasetStore;
  #mapping: MappingStore;
  #registry: FieldRegistry;

  constructor(datasets: DatasetStore, mapping: MappingStore, registry: FieldRegistry) {
    this.#datasets = datasets;
    this.#mapping = mapping;
    this.#registry = registry;
  }

  /**
   * Row indices of `source` selected by a where clause, ascending and unique
   */
  async #select(source: string, rowCount: number, where: string | undefined): Promise<number[]> {
    const all = Array.from({ length: rowCount }, (_, i) => i);
    if (where === undefined || where === "") {
      return all;
    }

    const clause = parseWhere(where);
    const valueSource = await this.#registry.resolveSource(clause.field);
    const { leads } = await this.#mapping.load();
    const qualified = new Set(
      await qualifyIndices(clause, valueSource, leads, indexFieldFor(source), this.#datasets)
    );

    logger.debug("extract.where", {
      dataset: source,
      field: clause.field,
      details: { resolved_via: valueSource.kind, qualified: qualified.size },
    });
    return all.filter((i) => qualified.has(i));
  }

  async extract(options: ExtractOptions): Promise<ExtractOutput> {
    try {
      const read = compileReader(options);
      checkWindow("offset", options.offset);
      checkWindow("limit", options.limit);
      if (options.where) {
        parseWhere(options.where);
      }

      const rows = await this.#datasets.loadArray(options.source);
      const selected = await this.#select(options.source, rows.length, options.where);
      const window = paginate(selected, options.offset ?? 0, options.limit);

      const data: IndexedEntry[] = window.map((index) => ({ index, value: read(rows[index]) }));

      if (options.saveAs && data.length > 0) {
        await this.#datasets.save(
          options.saveAs,
          data.map((entry) => entry.value)
        );
        return {
          status: "success",
          data,
          count: data.length,
          savedTo: this.#datasets.path(options.saveAs),
        };
      }

      return { status: "success", data, count: data.length };
    } catch (err) {
      logger.debug("extract.failed", {
        dataset: options.source,
        message: err instanceof Error ? err.message : String(err),
      });
      return toErrorResult(err);
    }
  }
}

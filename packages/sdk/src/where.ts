/**
 * Qualification filters: `field=value`
 *
 * A field resolves through the registry first (its authoritative output
 * file), and falls back to a property attached directly to lead records.
 */

import { InvalidFilterError } from "./errors.js";
import type { DatasetStore } from "./datasets.js";
import { leadIndex } from "./mapping.js";
import { isJsonObject } from "./path.js";
import type { JsonValue, LeadRecord, Literal, ValueSource, WhereClause } from "./types.js";

const WHERE_PATTERN = /^(\w+)\s*=\s*(.+)$/;

/**
 * Coerce a literal: true/false (any case) → boolean, all digits → integer, else string
 */
export function coerceLiteral(raw: string): Literal {
  const lowered = raw.toLowerCase();
  if (lowered === "true") return true;
  if (lowered === "false") return false;
  if (/^\d+$/.test(raw)) return Number.parseInt(raw, 10);
  return raw;
}

/**
 * Parse a `field=value` clause
 * @throws InvalidFilterError if the clause doesn't match the grammar
 */
export function parseWhere(clause: string): WhereClause {
  const match = WHERE_PATTERN.exec(clause.trim());
  if (!match) {
    throw new InvalidFilterError(clause);
  }
  return { field: match[1], value: coerceLiteral(match[2].trim()) };
}

function fieldEquals(record: { [key: string]: JsonValue }, field: string, value: Literal): boolean {
  return Object.hasOwn(record, field) && record[field] === value;
}

/**
 * Row indices (in `indexField`'s domain) whose field equals the clause's value.
 * Order follows the mapping's lead order; duplicates are possible.
 * @throws NotFoundError if the field's registered output file is missing
 */
export async function qualifyIndices(
  clause: WhereClause,
  source: ValueSource,
  leads: LeadRecord[],
  indexField: string,
  datasets: DatasetStore
): Promise<number[]> {
  const qualified: number[] = [];

  if (source.kind === "file") {
    const fileIndexField = source.indexField ?? indexField;
    const records = await datasets.loadArray(source.outputFile);

    const matching = new Set<number>();
    for (const record of records) {
      if (isJsonObject(record) && typeof record.index === "number") {
        if (fieldEquals(record, clause.field, clause.value)) {
          matching.add(record.index);
        }
      }
    }

    for (const lead of leads) {
      const own = leadIndex(lead, fileIndexField);
      const row = leadIndex(lead, indexField);
      if (own !== undefined && row !== undefined && matching.has(own)) {
        qualified.push(row);
      }
    }
    return qualified;
  }

  for (const lead of leads) {
    const row = leadIndex(lead, indexField);
    if (row !== undefined && fieldEquals(lead, clause.field, clause.value)) {
      qualified.push(row);
    }
  }
  return qualified;
}

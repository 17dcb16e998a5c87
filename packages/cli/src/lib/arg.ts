/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { coerceLiteral } from "@leadlink/sdk";
import type { JsonValue, Literal } from "@leadlink/sdk";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  return Number.parseInt(trimmed, 10);
}

/**
 * Parse a comma-separated index list like `0,2,5`
 */
export function parseIndexList(value: string, name: string): number[] {
  const parts = value
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean);

  if (parts.length === 0) {
    throw new InvalidArgumentError(`${name} must list at least one index`);
  }

  return parts.map((part) => parseNonNegativeInt(part, name));
}

/**
 * Parse a comma-separated name list like `isHiring,reasoning`
 */
export function parseNameList(value: string, name: string): string[] {
  const names = value
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean);

  if (names.length === 0) {
    throw new InvalidArgumentError(`${name} must list at least one name`);
  }

  return names;
}

/**
 * Parse a projection like `name=author.name,url=author.profileUrl`
 */
export function parseFieldMap(value: string, name: string): Record<string, string> {
  const fields: Record<string, string> = {};

  for (const pair of value.split(",")) {
    const trimmed = pair.trim();
    if (!trimmed) continue;

    const eq = trimmed.indexOf("=");
    const label = eq === -1 ? "" : trimmed.slice(0, eq).trim();
    const path = eq === -1 ? "" : trimmed.slice(eq + 1).trim();
    if (!label || !path) {
      throw new InvalidArgumentError(`${name} entries must look like label=path, got "${trimmed}"`);
    }
    fields[label] = path;
  }

  if (Object.keys(fields).length === 0) {
    throw new InvalidArgumentError(`${name} must contain at least one label=path entry`);
  }

  return fields;
}

/**
 * Coerce a value the way where-clause literals are coerced
 */
export function parseLiteral(value: string): Literal {
  return coerceLiteral(value.trim());
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): JsonValue {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    const parsed: JsonValue = JSON.parse(cleaned);
    return parsed;
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Validate a dataset or output file name (no directory traversal)
 */
export function parseFileName(value: string, name: string): string {
  const segments = value.split(/[\\/]+/).filter(Boolean);

  if (segments.length === 0) {
    throw new InvalidArgumentError(`${name} must not be empty`);
  }
  if (segments.some((segment) => segment === "..")) {
    throw new InvalidArgumentError(
      `${name} cannot contain ".." path segments (directory traversal)`
    );
  }

  return value;
}

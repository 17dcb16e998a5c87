/**
 * Path expressions over arbitrary JSON
 *
 * Grammar: `.` introduces a member access, `[n]` a fixed array position and
 * `[*]` maps over every element of the current array.
 *
 * Invariants:
 * - Evaluation is pure: the input value is never mutated
 * - Only the first `[*]` yields an IndexedList; any later `[*]` yields a plain
 *   array for the element it runs inside
 * - Element positions are those of the original array, never renumbered
 * - Shape failures inside a `[*]` become `null` for that element only
 */

import { MalformedPathError, OutOfRangeError, TypeMismatchError } from "./errors.js";
import type { IndexedEntry, JsonObject, JsonValue, Segment } from "./types.js";

type StepSegment = Exclude<Segment, { kind: "all" }>;

/**
 * Result of a path whose first `[*]` set up an index domain
 */
export class IndexedList {
  constructor(readonly entries: IndexedEntry[]) {}

  get length(): number {
    return this.entries.length;
  }

  toJSON(): IndexedEntry[] {
    return this.entries;
  }
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Human-readable shape name used in error messages
 */
export function describeShape(value: JsonValue): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Parse path notation like `[*].author.name` into segments
 * @throws MalformedPathError on an unclosed `[` or bad bracket contents
 */
export function parsePath(path: string): Segment[] {
  const segments: Segment[] = [];
  let current = "";

  const flush = (): void => {
    if (current) {
      segments.push({ kind: "key", name: current });
      current = "";
    }
  };

  let i = 0;
  while (i < path.length) {
    const ch = path[i];

    if (ch === "[") {
      flush();
      const close = path.indexOf("]", i);
      if (close === -1) {
        throw new MalformedPathError(path, `unclosed "[" at position ${i}`);
      }

      const content = path.slice(i + 1, close);
      if (content === "*") {
        segments.push({ kind: "all" });
      } else if (/^\d+$/.test(content)) {
        segments.push({ kind: "index", position: Number.parseInt(content, 10) });
      } else {
        throw new MalformedPathError(
          path,
          `expected "*" or a non-negative integer inside brackets, got "${content}"`
        );
      }
      i = close + 1;
    } else if (ch === ".") {
      flush();
      i++;
    } else {
      current += ch;
      i++;
    }
  }

  flush();
  return segments;
}

/**
 * Render segments back to path notation
 */
export function formatPath(segments: Segment[]): string {
  let out = "";
  for (const segment of segments) {
    switch (segment.kind) {
      case "key":
        out += out ? `.${segment.name}` : segment.name;
        break;
      case "index":
        out += `[${segment.position}]`;
        break;
      case "all":
        out += "[*]";
        break;
    }
  }
  return out;
}

/**
 * Drop a leading `[*]`: extraction always maps over every row
 */
export function stripLeadingAll(segments: Segment[]): Segment[] {
  return segments.length > 0 && segments[0].kind === "all" ? segments.slice(1) : segments;
}

function step(value: JsonValue, segment: StepSegment): JsonValue {
  if (segment.kind === "key") {
    if (!isJsonObject(value)) {
      throw new TypeMismatchError(
        `Expected object for .${segment.name}, got ${describeShape(value)}`
      );
    }
    return Object.hasOwn(value, segment.name) ? value[segment.name] : null;
  }

  if (!Array.isArray(value)) {
    throw new TypeMismatchError(
      `Expected array for [${segment.position}], got ${describeShape(value)}`
    );
  }
  if (segment.position >= value.length) {
    throw new OutOfRangeError(segment.position, value.length);
  }
  return value[segment.position];
}

function mapElements(value: JsonValue, rest: Segment[]): IndexedEntry[] {
  if (!Array.isArray(value)) {
    throw new TypeMismatchError(`Expected array for [*], got ${describeShape(value)}`);
  }

  return value.map((element, index) => {
    try {
      return { index, value: evaluateValue(element, rest) };
    } catch (err) {
      if (err instanceof TypeMismatchError || err instanceof OutOfRangeError) {
        return { index, value: null };
      }
      throw err;
    }
  });
}

/**
 * Evaluate segments where every `[*]` yields a plain array
 */
export function evaluateValue(value: JsonValue, segments: Segment[]): JsonValue {
  let current = value;
  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    if (segment.kind === "all") {
      return mapElements(current, segments.slice(i + 1)).map((entry) => entry.value);
    }
    current = step(current, segment);
  }
  return current;
}

/**
 * Evaluate segments against a value
 * @returns the addressed value, or an IndexedList when the path contains `[*]`
 * @throws TypeMismatchError / OutOfRangeError for failures outside any `[*]`
 */
export function evaluate(value: JsonValue, segments: Segment[]): JsonValue | IndexedList {
  let current = value;
  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    if (segment.kind === "all") {
      return new IndexedList(mapElements(current, segments.slice(i + 1)));
    }
    current = step(current, segment);
  }
  return current;
}

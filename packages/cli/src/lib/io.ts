/**
 * Result-record input for append-results: --file, --data or piped stdin
 */

import * as fs from "node:fs/promises";
import { InvalidArgumentError } from "commander";
import type { JsonValue } from "@leadlink/sdk";
import { parseJson } from "./arg.js";

// 10MB
const MAX_STDIN_BYTES = 10 * 1024 * 1024;

export interface RecordInputOptions {
  file?: string;
  data?: string;
}

/**
 * Read all of stdin as UTF-8, refusing more than `maxBytes`
 */
export async function readStdin(
  stream: NodeJS.ReadableStream = process.stdin,
  maxBytes = MAX_STDIN_BYTES
): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of stream) {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    size += buffer.length;
    if (size > maxBytes) {
      throw new InvalidArgumentError(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`);
    }
    chunks.push(buffer);
  }

  return Buffer.concat(chunks).toString("utf8");
}

async function readSource(options: RecordInputOptions): Promise<JsonValue> {
  if (options.file !== undefined && options.data !== undefined) {
    throw new InvalidArgumentError("Cannot use both --file and --data; choose one or use stdin");
  }

  if (options.file !== undefined) {
    return parseJson(await fs.readFile(options.file, "utf8"), `file ${options.file}`);
  }
  if (options.data !== undefined) {
    return parseJson(options.data, "--data");
  }

  if (process.stdin.isTTY) {
    throw new InvalidArgumentError("No input provided. Use --file, --data, or pipe JSON to stdin");
  }
  const stdin = await readStdin();
  if (!stdin.trim()) {
    throw new InvalidArgumentError("stdin is empty");
  }
  return parseJson(stdin, "stdin");
}

/**
 * The JSON array of `{index, ...}` records to append
 */
export async function readRecordInput(options: RecordInputOptions): Promise<JsonValue[]> {
  const items = await readSource(options);
  if (!Array.isArray(items)) {
    throw new InvalidArgumentError("Results must be a JSON array of {index, ...} records");
  }
  return items;
}

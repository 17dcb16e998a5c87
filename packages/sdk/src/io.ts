/**
 * File I/O for datasets, mapping and registry files
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Reads try UTF-8, then UTF-16, then Latin-1, keeping the first decoding that parses
 * - Missing files throw NotFoundError
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import {
  NotFoundError,
  DocumentReadError,
  DocumentWriteError,
  DirectoryError,
} from "./errors.js";
import { logger } from "./observability/logs.js";
import type { JsonValue } from "./types.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

/**
 * Error code of a failed fs call, if any
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new DirectoryError(String(dirPath), {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // EINVAL / ENOTSUP / EBADF: platform has no directory fsync
    const code = errnoCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF") {
      logger.debug("io.dir_fsync_failed", { message: `${dir}: ${errorMessage(err)}` });
    }
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content, "utf-8");

    try {
      await fileHandle.datasync();
    } catch (err) {
      // EINVAL: some CIFS/FUSE mounts report this instead of ENOTSUP
      const code = errnoCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    try {
      await fs.rename(tmp, filePath);
    } catch (err) {
      // Windows: antivirus or indexing may hold the file briefly
      const code = errnoCode(err);
      if ((code === "EPERM" || code === "EACCES" || code === "EBUSY") && process.platform === "win32") {
        await new Promise((resolve) => setTimeout(resolve, 10));
        await fs.rename(tmp, filePath);
      } else {
        throw err;
      }
    }

    if (ENABLE_DIR_FSYNC) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.close_failed", { message: errorMessage(closeErr) });
      });
    }
    await fs.rm(tmp, { force: true });

    throw new DocumentWriteError(filePath, { cause: err });
  }
}

/**
 * Serialize a value the way every leadlink file is stored
 */
export function serializeJson(data: unknown): string {
  return JSON.stringify(data, null, 2) + "\n";
}

/**
 * Atomically write a JSON value (2-space indent, trailing newline)
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await atomicWrite(filePath, serializeJson(data));
}

/**
 * Read raw file bytes
 * @throws NotFoundError if file doesn't exist
 * @throws DocumentReadError for other read failures
 */
export async function readBytes(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new NotFoundError(filePath, { cause: err });
    }
    throw new DocumentReadError(filePath, { cause: err });
  }
}

interface Decoding {
  label: string;
  decode(bytes: Buffer): string;
}

function utf16Decoding(bytes: Buffer): Decoding {
  // FE FF marks big-endian; otherwise little-endian, BOM or not
  const bigEndian = bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff;
  const label = bigEndian ? "utf-16be" : "utf-16le";
  return {
    label: "utf-16",
    decode: (b) => new TextDecoder(label, { fatal: true }).decode(b),
  };
}

function decodingsFor(bytes: Buffer): Decoding[] {
  return [
    { label: "utf-8", decode: (b) => new TextDecoder("utf-8", { fatal: true }).decode(b) },
    utf16Decoding(bytes),
    { label: "latin-1", decode: (b) => b.toString("latin1") },
  ];
}

/**
 * Decode and parse JSON bytes, trying UTF-8, then UTF-16, then Latin-1
 * @throws DocumentReadError when no decoding yields valid JSON
 */
export function decodeJson(bytes: Buffer, filePath: string): JsonValue {
  const failures: string[] = [];

  for (const decoding of decodingsFor(bytes)) {
    try {
      const data: JsonValue = JSON.parse(decoding.decode(bytes));
      if (decoding.label !== "utf-8") {
        logger.debug("io.decode_fallback", { message: `${filePath} decoded as ${decoding.label}` });
      }
      return data;
    } catch (err) {
      failures.push(`${decoding.label}: ${errorMessage(err)}`);
    }
  }

  throw new DocumentReadError(filePath, {
    cause: new Error(`Could not decode ${filePath} (${failures.join("; ")})`),
  });
}

/**
 * Read and parse a JSON file with encoding fallback
 */
export async function readJsonFile(filePath: string): Promise<JsonValue> {
  return decodeJson(await readBytes(filePath), filePath);
}

/**
 * Check whether a regular file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return false;
    }
    throw new DocumentReadError(filePath, { cause: err });
  }
}

/**
 * List files in a directory, optionally filtering by extension
 * @param dirPath - Directory path to list
 * @param extension - Optional file extension to filter by (e.g., ".json")
 * @returns Sorted array of filenames (not full paths)
 */
export async function listFiles(dirPath: string, extension?: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });

    let files = entries
      .filter((entry) => entry.isFile() && !entry.isSymbolicLink())
      .map((entry) => entry.name);

    if (extension) {
      const ext = extension.startsWith(".") ? extension : `.${extension}`;
      files = files.filter((name) => name.endsWith(ext));
    }

    return files.sort();
  } catch (err) {
    // Missing directory simply has no files
    if (errnoCode(err) === "ENOENT") {
      return [];
    }
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * File system test utilities
 */

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { datasetFileName, openWorkspace } from "@leadlink/sdk";
import type { JsonValue, Workspace, WorkspaceOptions } from "@leadlink/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "leadlink-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempRoot(prefix = "leadlink-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write a dataset (or any JSON file) under a root, 2-space indented
 */
export async function writeDataset(root: string, name: string, data: JsonValue): Promise<string> {
  const filePath = join(root, datasetFileName(name));
  await writeFile(filePath, JSON.stringify(data, null, 2) + "\n", "utf8");
  return filePath;
}

/**
 * Read and parse a JSON file under a root
 */
export async function readDataset(root: string, name: string): Promise<unknown> {
  return JSON.parse(await readFile(join(root, datasetFileName(name)), "utf8"));
}

/**
 * Execute a function with a workspace over a temporary root, cleaning up after
 * @param fn - Function to execute with the workspace
 * @param options - Optional workspace options (root will be overridden)
 * @returns Result of fn
 */
export async function withTempWorkspace<T>(
  fn: (workspace: Workspace, root: string) => Promise<T>,
  options?: Partial<WorkspaceOptions>
): Promise<T> {
  const root = await createTempRoot();
  try {
    return await fn(openWorkspace({ ...options, root }), root);
  } finally {
    await removeDir(root);
  }
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempRoot();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

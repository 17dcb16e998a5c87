/**
 * Workspace configuration defaults and environment overrides
 */

import { ConfigurationError } from "./errors.js";

export const DEFAULT_ROOT = ".tmp";
export const DEFAULT_BATCH_SIZE = 20;
export const DEFAULT_LOCK_TIMEOUT_MS = 30000;

/**
 * Workspace root: explicit value, then LEADLINK_ROOT, then `.tmp`
 */
export function defaultRoot(env: NodeJS.ProcessEnv = process.env): string {
  return env.LEADLINK_ROOT || DEFAULT_ROOT;
}

/**
 * Enrichment batch size: explicit value, then LEADLINK_BATCH_SIZE, then 20
 * @throws ConfigurationError for a non-positive or non-integer size
 */
export function resolveBatchSize(explicit?: number, env: NodeJS.ProcessEnv = process.env): number {
  if (explicit !== undefined) {
    if (!Number.isInteger(explicit) || explicit < 1) {
      throw new ConfigurationError(`batchSize must be a positive integer, got ${explicit}`);
    }
    return explicit;
  }

  const envSize = env.LEADLINK_BATCH_SIZE;
  if (envSize !== undefined && envSize !== "") {
    const size = parseInt(envSize, 10);
    if (isNaN(size) || size < 1) {
      throw new ConfigurationError(`LEADLINK_BATCH_SIZE must be a positive integer, got "${envSize}"`);
    }
    return size;
  }

  return DEFAULT_BATCH_SIZE;
}

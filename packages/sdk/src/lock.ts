/**
 * Advisory file lock serializing writers of one workspace root
 * Uses exclusive create, so only one holder exists at a time
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { LockTimeoutError } from "./errors.js";
import { errnoCode } from "./io.js";
import { logger } from "./observability/logs.js";

export const LOCK_FILE = ".leadlink.lock";

export class FileLock {
  #lockPath: string;
  #fd?: fs.FileHandle;
  #acquired = false;

  constructor(root: string, lockName: string = LOCK_FILE) {
    this.#lockPath = path.join(root, lockName);
  }

  get lockPath(): string {
    return this.#lockPath;
  }

  /**
   * Acquire the lock, retrying until the timeout
   * @param timeoutMs - Maximum time to wait for lock (default: 30000ms)
   * @param retryIntervalMs - Time between retry attempts (default: 50ms)
   * @throws LockTimeoutError if the lock is still held after `timeoutMs`
   */
  async acquire(timeoutMs: number = 30000, retryIntervalMs: number = 50): Promise<void> {
    if (this.#acquired) {
      throw new Error("Lock already acquired");
    }

    const startTime = Date.now();
    await fs.mkdir(path.dirname(this.#lockPath), { recursive: true });

    while (true) {
      let handle: fs.FileHandle;
      try {
        handle = await fs.open(this.#lockPath, "wx");
      } catch (err) {
        if (errnoCode(err) !== "EEXIST") {
          throw err;
        }

        if (Date.now() - startTime > timeoutMs) {
          throw new LockTimeoutError(this.#lockPath, timeoutMs);
        }

        await new Promise((resolve) => setTimeout(resolve, retryIntervalMs));
        continue;
      }

      try {
        // PID and timestamp help when diagnosing a stale lock
        const lockInfo = {
          pid: process.pid,
          acquiredAt: new Date().toISOString(),
        };
        await handle.writeFile(JSON.stringify(lockInfo, null, 2));
        await handle.sync();
      } catch (err) {
        await handle.close();
        await fs.rm(this.#lockPath, { force: true });
        throw err;
      }

      this.#fd = handle;
      this.#acquired = true;
      return;
    }
  }

  async release(): Promise<void> {
    if (!this.#acquired) {
      return;
    }

    try {
      if (this.#fd) {
        await this.#fd.close();
        this.#fd = undefined;
      }
      await fs.unlink(this.#lockPath);
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") {
        logger.error("lock.release_failed", {
          message: err instanceof Error ? err.message : String(err),
          details: { lock: this.#lockPath },
        });
      }
    } finally {
      this.#acquired = false;
    }
  }

  isAcquired(): boolean {
    return this.#acquired;
  }

  /**
   * Run `fn` with the lock held
   */
  async withLock<T>(fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    await this.acquire(timeoutMs);
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  /**
   * Remove a stale lock file left by a crashed process
   * @returns whether a lock file was there to remove
   */
  static async forceRemove(root: string, lockName: string = LOCK_FILE): Promise<boolean> {
    try {
      await fs.unlink(path.join(root, lockName));
      return true;
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") {
        throw err;
      }
      return false;
    }
  }
}

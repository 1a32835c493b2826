/**
 * File-based advisory lock guarding a settings file
 * Uses exclusive file open so one holder at a time, across processes
 * and across store instances within a process.
 *
 * A lock file whose recorded pid no longer runs on this host is stale:
 * waiters remove it and retry inside the same timeout window.
 */

import * as fs from "node:fs/promises";
import { LockTimeoutError } from "./errors.js";
import { errnoCode } from "./io.js";
import { safeParseJson } from "./format/canonical.js";
import { LockHolderSchema } from "./schemas.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";

/**
 * Intent recorded with the lock; both modes are exclusive
 */
export type LockMode = "read" | "write";

/**
 * Lock metadata written into the lock file for debugging
 */
export interface LockInfo {
  pid: number;
  mode: LockMode;
  acquiredAt: string;
}

const DEFAULT_RETRY_INTERVAL_MS = 50;

/**
 * Pid recorded in a lock file; undefined while the holder is still writing it
 */
function holderPid(raw: string): number | undefined {
  const parsed = safeParseJson(raw);
  if (!parsed.success) {
    return undefined;
  }
  const holder = LockHolderSchema.safeParse(parsed.data);
  return holder.success ? holder.data.pid : undefined;
}

/**
 * Signal 0 probes for a process without touching it; EPERM still means alive
 */
function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return errnoCode(err) !== "ESRCH";
  }
}

/**
 * Simple file-based lock using exclusive open on `<target>.lock`
 */
export class FileLock {
  #targetPath: string;
  #lockPath: string;
  #fd?: fs.FileHandle;
  #acquired = false;

  constructor(targetPath: string) {
    this.#targetPath = targetPath;
    this.#lockPath = FileLock.lockPathFor(targetPath);
  }

  /**
   * Path of the lock file beside the guarded file
   */
  get lockPath(): string {
    return this.#lockPath;
  }

  /**
   * Acquire the lock, polling until it is free or the timeout elapses
   * @param timeoutMs - Maximum time to wait; 0 makes a single attempt
   * @param retryIntervalMs - Time between attempts
   * @throws LockTimeoutError when the window closes without the lock
   */
  async acquire(
    mode: LockMode,
    timeoutMs: number,
    retryIntervalMs: number = DEFAULT_RETRY_INTERVAL_MS
  ): Promise<void> {
    if (this.#acquired) {
      throw new Error("Lock already acquired");
    }

    const startTime = Date.now();

    while (true) {
      const fd = await this.#tryOpen();

      if (!fd) {
        if (await this.#removeIfStale()) {
          continue;
        }

        // Held by someone else
        const elapsed = Date.now() - startTime;
        if (elapsed >= timeoutMs) {
          metrics.recordLockTimeout(this.#targetPath);
          logger.warn("lock.timeout", {
            file: this.#lockPath,
            details: { mode, timeoutMs },
          });
          throw new LockTimeoutError(this.#lockPath, timeoutMs);
        }

        const wait = Math.min(retryIntervalMs, timeoutMs - elapsed);
        await new Promise((resolve) => setTimeout(resolve, wait));
        continue;
      }

      this.#fd = fd;
      this.#acquired = true;
      metrics.recordLockWait(this.#targetPath, Date.now() - startTime);

      try {
        const info: LockInfo = {
          pid: process.pid,
          mode,
          acquiredAt: new Date().toISOString(),
        };
        await fd.writeFile(JSON.stringify(info, null, 2));
        await fd.sync();
      } catch (err) {
        await this.release();
        throw err;
      }

      logger.debug("lock.acquired", { file: this.#lockPath, details: { mode } });
      return;
    }
  }

  /**
   * Create the lock file exclusively; null when it already exists
   */
  async #tryOpen(): Promise<fs.FileHandle | null> {
    try {
      return await fs.open(this.#lockPath, "wx");
    } catch (err) {
      if (errnoCode(err) === "EEXIST") {
        return null;
      }
      throw err;
    }
  }

  /**
   * Remove the lock file when its holder has died
   * @returns true when the lock file is gone and acquiring can be retried at once
   */
  async #removeIfStale(): Promise<boolean> {
    const raw = await this.#readHolder();
    if (raw === null) {
      return true;
    }

    const pid = holderPid(raw);
    if (pid === undefined || isProcessAlive(pid)) {
      return false;
    }

    // Another waiter may have cleared it and taken the lock since the first read
    if ((await this.#readHolder()) !== raw) {
      return false;
    }

    try {
      await fs.unlink(this.#lockPath);
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") {
        throw err;
      }
    }

    logger.warn("lock.stale_removed", { file: this.#lockPath, details: { pid } });
    return true;
  }

  /**
   * Lock file contents; null when it no longer exists
   */
  async #readHolder(): Promise<string | null> {
    try {
      return await fs.readFile(this.#lockPath, "utf-8");
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        return null;
      }
      throw err;
    }
  }

  /**
   * Release the lock; a no-op when not held
   */
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
      // Already cleaned up by someone else
      if (errnoCode(err) !== "ENOENT") {
        logger.error("lock.release_failed", { file: this.#lockPath, message: String(err) });
      }
    } finally {
      this.#fd = undefined;
      this.#acquired = false;
    }
  }

  /**
   * Execute a function with the lock held
   * Release runs on every exit path
   */
  async withLock<T>(mode: LockMode, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
    await this.acquire(mode, timeoutMs);
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  /**
   * Lock file path used for a guarded file
   */
  static lockPathFor(targetPath: string): string {
    return `${targetPath}.lock`;
  }

  /**
   * Force remove a lock file regardless of its holder
   * DANGEROUS - only use if you're sure no process still holds it
   */
  static async forceRemove(targetPath: string): Promise<void> {
    try {
      await fs.unlink(FileLock.lockPathFor(targetPath));
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") {
        throw err;
      }
    }
  }
}

/**
 * Record locking
 * Exclusive per-record locks shared by every process using the same data
 * directory. A lock is a `<record>.lock` file created with exclusive-create;
 * whoever creates it owns the record until the file is removed.
 */

import { link, open, readFile, rename, stat, unlink } from 'fs/promises';
import { randomUUID } from 'crypto';
import { LockContentionError } from '../errors/index.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

/**
 * Lock state for a record
 */
export interface RecordLock {
  key: string;
  path: string;
  token: string;
  pid: number;
  acquiredAt: Date;
}

/**
 * Lock acquisition result
 */
export interface LockResult {
  success: boolean;
  lock?: RecordLock;
  error?: string;
  waitedMs: number;
}

/**
 * What a lock file says about its holder
 */
export interface LockInfo {
  token?: string;
  pid?: number;
  ageMs: number;
}

/**
 * Lock manager configuration
 */
export interface RecordLockConfig {
  /** Age after which a lock is treated as abandoned. Default: 30 seconds */
  staleLockMs: number;
  /** Max time to wait for lock acquisition in ms. Default: 2 seconds */
  acquireTimeoutMs: number;
  /** Polling interval when waiting for lock in ms. Default: 25ms */
  pollIntervalMs: number;
}

export const DEFAULT_LOCK_CONFIG: RecordLockConfig = {
  staleLockMs: 30 * 1000,
  acquireTimeoutMs: 2 * 1000,
  pollIntervalMs: 25,
};

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

function isProcessAlive(pid: number): boolean {
  if (pid === process.pid) return true;
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM means the process exists but belongs to someone else
    return !isErrno(err, 'ESRCH');
  }
}

function parseLockContent(content: string): { token?: string; pid?: number } {
  try {
    const data: unknown = JSON.parse(content);
    if (typeof data !== 'object' || data === null) return {};
    const token = 'token' in data && typeof data.token === 'string' ? data.token : undefined;
    const pid = 'pid' in data && typeof data.pid === 'number' ? data.pid : undefined;
    return { token, pid };
  } catch {
    // Holder may still be writing it; age decides
    return {};
  }
}

/**
 * Record lock manager
 *
 * Usage:
 * ```typescript
 * const locks = new RecordLockManager({ acquireTimeoutMs: 500 });
 *
 * await locks.withLock('/data/sessions/cl2-main.json.lock', 'cl2-main', async () => {
 *   // read, modify, write the record
 * });
 * ```
 */
export class RecordLockManager {
  private readonly config: RecordLockConfig;
  private readonly logger: Logger;

  constructor(config: Partial<RecordLockConfig> = {}, logger?: Logger) {
    this.config = { ...DEFAULT_LOCK_CONFIG, ...config };
    this.logger = logger ?? createLogger({ module: 'record-lock' });
  }

  /**
   * Acquire the lock file at `lockPath`, waiting up to acquireTimeoutMs
   *
   * @param lockPath - Lock file location
   * @param key - Record key, for messages
   */
  async acquire(lockPath: string, key: string = lockPath): Promise<LockResult> {
    const startTime = Date.now();

    for (;;) {
      const token = randomUUID();
      const acquiredAt = new Date();

      try {
        const handle = await open(lockPath, 'wx');
        try {
          await handle.writeFile(
            JSON.stringify({ token, pid: process.pid, acquiredAt: acquiredAt.toISOString() }),
            'utf-8'
          );
        } finally {
          await handle.close();
        }

        return {
          success: true,
          lock: { key, path: lockPath, token, pid: process.pid, acquiredAt },
          waitedMs: Date.now() - startTime,
        };
      } catch (err) {
        if (!isErrno(err, 'EEXIST')) {
          throw err;
        }
      }

      if (await this.removeIfStale(lockPath)) {
        continue;
      }

      const waitedMs = Date.now() - startTime;
      if (waitedMs >= this.config.acquireTimeoutMs) {
        this.logger.warn({ key, waitedMs }, 'Timed out waiting for record lock');
        return {
          success: false,
          error: `Timeout waiting for record lock: ${key}`,
          waitedMs,
        };
      }

      await new Promise(r => setTimeout(r, this.config.pollIntervalMs));
    }
  }

  /**
   * Release a lock
   *
   * @returns true if the lock file was ours and is gone, false otherwise
   */
  async release(lock: RecordLock): Promise<boolean> {
    const info = await this.inspect(lock.path);
    if (!info || info.token !== lock.token) {
      this.logger.warn({ key: lock.key }, 'Lock was taken over before release');
      return false;
    }

    try {
      await unlink(lock.path);
      return true;
    } catch (err) {
      if (isErrno(err, 'ENOENT')) return false;
      throw err;
    }
  }

  /**
   * Read the holder of a lock file, or null when unlocked
   */
  async inspect(lockPath: string): Promise<LockInfo | null> {
    try {
      const [content, stats] = await Promise.all([
        readFile(lockPath, 'utf-8'),
        stat(lockPath),
      ]);
      return {
        ...parseLockContent(content),
        ageMs: Math.max(0, Date.now() - stats.mtimeMs),
      };
    } catch (err) {
      if (isErrno(err, 'ENOENT')) return null;
      throw err;
    }
  }

  /**
   * A lock is stale once it is older than staleLockMs or its process is gone
   */
  isStale(info: LockInfo): boolean {
    if (info.ageMs > this.config.staleLockMs) return true;
    return info.pid !== undefined && !isProcessAlive(info.pid);
  }

  /**
   * Remove a stale lock left by a crashed process
   *
   * @returns true if the lock is gone (removed here or elsewhere)
   */
  async removeIfStale(lockPath: string): Promise<boolean> {
    const info = await this.inspect(lockPath);
    if (!info) return true;
    if (!this.isStale(info)) return false;

    const removed = await this.discardIfHeldBy(lockPath, info.token);
    if (removed) {
      this.logger.warn({ lockPath, pid: info.pid, ageMs: info.ageMs }, 'Removed stale record lock');
    }
    return removed;
  }

  /**
   * Remove the lock file only if it still carries `token`.
   *
   * The file is first renamed to a private path, so only one process can
   * claim a given lock file; one that turns out to hold another token was
   * replaced after inspection and is linked back in place.
   *
   * @returns true if the lock is gone, false if a different holder keeps it
   */
  async discardIfHeldBy(lockPath: string, token: string | undefined): Promise<boolean> {
    const claimedPath = `${lockPath}.stale-${randomUUID()}`;
    try {
      await rename(lockPath, claimedPath);
    } catch (err) {
      if (isErrno(err, 'ENOENT')) return true;
      throw err;
    }

    try {
      const claimed = parseLockContent(await readFile(claimedPath, 'utf-8'));
      if (claimed.token === token) {
        return true;
      }

      try {
        await link(claimedPath, lockPath);
      } catch (err) {
        if (!isErrno(err, 'EEXIST')) throw err;
        this.logger.warn({ lockPath, token: claimed.token }, 'Lock was replaced while restoring it');
      }
      return false;
    } finally {
      await unlink(claimedPath);
    }
  }

  /**
   * Execute a function while holding a record lock
   * Automatically releases the lock when done (even on error)
   *
   * @throws LockContentionError if the lock cannot be acquired in time
   */
  async withLock<T>(lockPath: string, key: string, fn: (lock: RecordLock) => Promise<T>): Promise<T> {
    const result = await this.acquire(lockPath, key);

    if (!result.success || !result.lock) {
      throw new LockContentionError(key, result.waitedMs, result.error);
    }

    try {
      return await fn(result.lock);
    } finally {
      await this.release(result.lock);
    }
  }
}

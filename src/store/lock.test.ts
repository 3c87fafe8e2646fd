/**
 * Tests for record locking
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, readdir, rm, utimes, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { LockContentionError } from '../errors/index.js';
import { RecordLockManager } from './lock.js';

describe('RecordLockManager', () => {
  let testDir: string;
  let lockPath: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `cohort-lock-test-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    lockPath = join(testDir, 'cl2-main.json.lock');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('acquire', () => {
    it('should create the lock file with its token and pid', async () => {
      const manager = new RecordLockManager();
      const result = await manager.acquire(lockPath, 'cl2-main');

      expect(result.success).toBe(true);
      expect(result.lock?.key).toBe('cl2-main');
      expect(result.lock?.pid).toBe(process.pid);

      const content: unknown = JSON.parse(await readFile(lockPath, 'utf-8'));
      expect(content).toMatchObject({ token: result.lock?.token, pid: process.pid });
    });

    it('should wait for a held lock to be released', async () => {
      const manager = new RecordLockManager({ acquireTimeoutMs: 2000, pollIntervalMs: 5 });

      const first = await manager.acquire(lockPath);
      expect(first.success).toBe(true);

      const second = manager.acquire(lockPath);
      setTimeout(() => {
        if (first.lock) void manager.release(first.lock);
      }, 50);

      const result = await second;
      expect(result.success).toBe(true);
      expect(result.lock?.token).not.toBe(first.lock?.token);
    });

    it('should time out on a fresh lock held by a live process', async () => {
      const manager = new RecordLockManager({ acquireTimeoutMs: 60, pollIntervalMs: 5 });
      await writeFile(lockPath, JSON.stringify({ token: 'other', pid: process.pid }));

      const result = await manager.acquire(lockPath, 'cl2-main');

      expect(result.success).toBe(false);
      expect(result.error).toBe('Timeout waiting for record lock: cl2-main');
      expect(result.waitedMs).toBeGreaterThanOrEqual(60);
      expect(existsSync(lockPath)).toBe(true);
    });

    it('should take over a lock older than staleLockMs', async () => {
      const manager = new RecordLockManager({ acquireTimeoutMs: 200, staleLockMs: 1000 });
      await writeFile(lockPath, JSON.stringify({ token: 'crashed', pid: process.pid }));
      const old = new Date(Date.now() - 60_000);
      await utimes(lockPath, old, old);

      const result = await manager.acquire(lockPath);

      expect(result.success).toBe(true);
      expect(result.lock?.token).not.toBe('crashed');
    });
  });

  describe('stale takeover', () => {
    async function writeStaleLock(token: string): Promise<void> {
      await writeFile(lockPath, JSON.stringify({ token, pid: process.pid }));
      const old = new Date(Date.now() - 60_000);
      await utimes(lockPath, old, old);
    }

    it('should let only one of two managers into a recovered lock at a time', async () => {
      await writeStaleLock('crashed');
      const config = { acquireTimeoutMs: 2000, pollIntervalMs: 5, staleLockMs: 1000 };
      const first = new RecordLockManager(config);
      const second = new RecordLockManager(config);

      let inside = 0;
      let maxInside = 0;
      const critical = async () => {
        inside++;
        maxInside = Math.max(maxInside, inside);
        await new Promise(r => setTimeout(r, 20));
        inside--;
      };

      await Promise.all([
        first.withLock(lockPath, 'cl2-main', critical),
        second.withLock(lockPath, 'cl2-main', critical),
        first.withLock(lockPath, 'cl2-main', critical),
      ]);

      expect(maxInside).toBe(1);
      expect(await readdir(testDir)).toEqual([]);
    });

    it('should keep a lock that was replaced after inspection', async () => {
      const manager = new RecordLockManager({ staleLockMs: 1000 });
      await writeFile(lockPath, JSON.stringify({ token: 'fresh', pid: process.pid }));

      expect(await manager.discardIfHeldBy(lockPath, 'crashed')).toBe(false);

      const content: unknown = JSON.parse(await readFile(lockPath, 'utf-8'));
      expect(content).toMatchObject({ token: 'fresh' });
      expect(await readdir(testDir)).toEqual(['cl2-main.json.lock']);
    });

    it('should remove a lock that still carries the inspected token', async () => {
      const manager = new RecordLockManager();
      await writeStaleLock('crashed');

      expect(await manager.discardIfHeldBy(lockPath, 'crashed')).toBe(true);
      expect(await readdir(testDir)).toEqual([]);
    });

    it('should treat a lock removed elsewhere as gone', async () => {
      expect(await new RecordLockManager().discardIfHeldBy(lockPath, 'crashed')).toBe(true);
    });
  });

  describe('release', () => {
    it('should remove its own lock file', async () => {
      const manager = new RecordLockManager();
      const result = await manager.acquire(lockPath);

      expect(result.lock && await manager.release(result.lock)).toBe(true);
      expect(existsSync(lockPath)).toBe(false);
    });

    it('should leave a lock that was taken over in place', async () => {
      const manager = new RecordLockManager();
      const result = await manager.acquire(lockPath);
      await writeFile(lockPath, JSON.stringify({ token: 'someone-else', pid: process.pid }));

      expect(result.lock && await manager.release(result.lock)).toBe(false);
      expect(existsSync(lockPath)).toBe(true);
    });
  });

  describe('isStale', () => {
    it('should judge by age and holder process', () => {
      const manager = new RecordLockManager({ staleLockMs: 1000 });

      expect(manager.isStale({ ageMs: 10, pid: process.pid })).toBe(false);
      expect(manager.isStale({ ageMs: 5000, pid: process.pid })).toBe(true);
      expect(manager.isStale({ ageMs: 10 })).toBe(false);
    });
  });

  describe('withLock', () => {
    it('should release the lock when the function throws', async () => {
      const manager = new RecordLockManager();

      await expect(manager.withLock(lockPath, 'k', async () => {
        throw new Error('boom');
      })).rejects.toThrow('boom');

      expect(existsSync(lockPath)).toBe(false);
    });

    it('should throw LockContentionError when the lock stays held', async () => {
      const manager = new RecordLockManager({ acquireTimeoutMs: 30, pollIntervalMs: 5 });
      await writeFile(lockPath, JSON.stringify({ token: 'other', pid: process.pid }));

      await expect(manager.withLock(lockPath, 'cl2-main', async () => 'never')).rejects.toThrow(LockContentionError);
    });
  });
});

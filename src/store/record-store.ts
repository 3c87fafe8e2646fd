/**
 * Key-record store
 * A minimal embedded store: one record per key, replaced atomically.
 */

import { mkdir, open, readFile, readdir, rename, unlink } from 'fs/promises';
import { join } from 'path';
import { randomBytes } from 'crypto';
import { InvalidArgumentError } from '../errors/index.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { RecordLockManager } from './lock.js';
import type { RecordLockConfig } from './lock.js';

/**
 * Storage contract shared by the file and in-memory implementations.
 *
 * Writers hold `withLock(key)` around read-modify-write; readers never lock
 * and always see either the old or the new content of a record.
 */
export interface RecordStore {
  read(key: string): Promise<string | null>;
  write(key: string, content: string): Promise<void>;
  keys(): Promise<string[]>;
  withLock<T>(key: string, fn: () => Promise<T>): Promise<T>;
}

const KEY_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Reject keys that could escape the store directory
 */
export function assertValidKey(key: string): void {
  if (!KEY_PATTERN.test(key) || key.includes('..') || key.endsWith('.tmp') || key.endsWith('.lock')) {
    throw new InvalidArgumentError(`Invalid record key: '${key}'`, { key });
  }
}

export interface FileRecordStoreOptions {
  /** Directory holding the records */
  dir: string;
  /** File extension including the dot, e.g. `.json` */
  extension: string;
  lock?: Partial<RecordLockConfig>;
  logger?: Logger;
}

/**
 * File-backed record store
 *
 * Each record is `<dir>/<key><extension>`. Writes go to a temporary file that
 * is fsynced and renamed over the record; locks live beside the record as
 * `<key><extension>.lock`.
 */
export class FileRecordStore implements RecordStore {
  readonly dir: string;
  private readonly extension: string;
  private readonly locks: RecordLockManager;
  private readonly logger: Logger;

  constructor(options: FileRecordStoreOptions) {
    this.dir = options.dir;
    this.extension = options.extension;
    this.logger = options.logger ?? createLogger({ module: 'record-store', dir: options.dir });
    this.locks = new RecordLockManager(options.lock, this.logger);
  }

  /**
   * Path of a record file
   */
  pathFor(key: string): string {
    assertValidKey(key);
    return join(this.dir, `${key}${this.extension}`);
  }

  lockPathFor(key: string): string {
    return `${this.pathFor(key)}.lock`;
  }

  async read(key: string): Promise<string | null> {
    try {
      return await readFile(this.pathFor(key), 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return null;
      }
      throw err;
    }
  }

  async write(key: string, content: string): Promise<void> {
    const target = this.pathFor(key);
    await mkdir(this.dir, { recursive: true });

    const tmpPath = `${target}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;
    try {
      const handle = await open(tmpPath, 'w');
      try {
        await handle.writeFile(content, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmpPath, target);
    } catch (err) {
      await unlink(tmpPath).catch((cleanupErr: unknown) => {
        this.logger.debug({ err: cleanupErr, tmpPath }, 'Temporary file already gone');
      });
      throw err;
    }

    this.logger.debug({ key, bytes: Buffer.byteLength(content) }, 'Record written');
  }

  async keys(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return [];
      }
      throw err;
    }

    return names
      .filter(name => name.endsWith(this.extension))
      .map(name => name.slice(0, -this.extension.length))
      .filter(key => KEY_PATTERN.test(key))
      .sort();
  }

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const lockPath = this.lockPathFor(key);
    await mkdir(this.dir, { recursive: true });
    return this.locks.withLock(lockPath, key, () => fn());
  }
}

/**
 * In-memory record store with the same contract, for tests and embedding
 */
export class MemoryRecordStore implements RecordStore {
  private readonly records = new Map<string, string>();
  private readonly queues = new Map<string, Promise<void>>();

  async read(key: string): Promise<string | null> {
    assertValidKey(key);
    return this.records.get(key) ?? null;
  }

  async write(key: string, content: string): Promise<void> {
    assertValidKey(key);
    this.records.set(key, content);
  }

  async keys(): Promise<string[]> {
    return [...this.records.keys()].sort();
  }

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    assertValidKey(key);

    let release: () => void = () => undefined;
    const held = new Promise<void>(resolve => {
      release = resolve;
    });
    const previous = this.queues.get(key) ?? Promise.resolve();
    const tail = previous.then(() => held);
    this.queues.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.queues.get(key) === tail) {
        this.queues.delete(key);
      }
    }
  }
}

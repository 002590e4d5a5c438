/**
 * CacheStore: persistent key → record map backing alert deduplication.
 *
 * Each store is written by exactly one owner (a checker inside the scheduling
 * loop, or the counterparty directory). Reads and writes are synchronous
 * in-memory operations; only `load` and `persist` touch the disk. No locking
 * is done: single-writer access is an invariant callers must keep.
 *
 * @module cache/cache-store
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { CacheCorruptionError } from '../types/errors.js';
import type { Logger } from '../utils/logger.js';

export interface CacheRecord {
  firstSeen: Date;
  lastAlerted: Date;
  /** Opaque summary of the alert-relevant state */
  fingerprint: string;
}

const CacheFileSchema = z.object({
  version: z.literal(1),
  records: z.array(
    z.object({
      key: z.string().min(1),
      first_seen: z.string().datetime({ offset: true }),
      last_alerted: z.string().datetime({ offset: true }),
      fingerprint: z.string(),
    }),
  ),
});
type CacheFile = z.infer<typeof CacheFileSchema>;

export interface CacheStoreOptions {
  logger: Logger;
}

export interface LoadOptions {
  now?: Date;
  /** Purge records older than this right after loading */
  retentionMs?: number;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class CacheStore {
  readonly filePath: string;
  private readonly logger: Logger;
  private records = new Map<string, CacheRecord>();
  private mutations = 0;
  private persistedMutations = 0;
  private writeSeq = 0;
  private writing: Promise<unknown> = Promise.resolve();

  constructor(filePath: string, options: CacheStoreOptions) {
    this.filePath = filePath;
    this.logger = options.logger.child({ cache: path.basename(filePath) });
  }

  get size(): number {
    return this.records.size;
  }

  get(key: string): CacheRecord | undefined {
    const record = this.records.get(key);
    return record ? { ...record } : undefined;
  }

  has(key: string): boolean {
    return this.records.has(key);
  }

  put(key: string, record: CacheRecord): void {
    this.records.set(key, { ...record });
    this.mutations++;
  }

  delete(key: string): boolean {
    const removed = this.records.delete(key);
    if (removed) this.mutations++;
    return removed;
  }

  clear(): void {
    if (this.records.size === 0) return;
    this.records.clear();
    this.mutations++;
  }

  entries(): Array<[string, CacheRecord]> {
    return [...this.records].map(([key, record]) => [key, { ...record }]);
  }

  isDirty(): boolean {
    return this.mutations !== this.persistedMutations;
  }

  /**
   * Replace the in-memory map with the file contents. A missing, unreadable or
   * malformed file leaves the store empty; the problem is logged, not thrown.
   *
   * @returns number of records kept
   */
  async load(options: LoadOptions = {}): Promise<number> {
    this.records.clear();
    this.mutations = 0;
    this.persistedMutations = 0;

    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.debug({ file: this.filePath }, 'No cache file yet, starting empty');
      } else {
        this.reportCorruption(new CacheCorruptionError(this.filePath, 'Cache file unreadable', { cause: error }));
      }
      return 0;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.reportCorruption(new CacheCorruptionError(this.filePath, 'Cache file is not valid JSON', { cause: error }));
      return 0;
    }

    const result = CacheFileSchema.safeParse(parsed);
    if (!result.success) {
      this.reportCorruption(
        new CacheCorruptionError(this.filePath, `Cache file schema mismatch: ${result.error.issues[0]?.message ?? 'unknown'}`),
      );
      return 0;
    }

    for (const entry of result.data.records) {
      this.records.set(entry.key, {
        firstSeen: new Date(entry.first_seen),
        lastAlerted: new Date(entry.last_alerted),
        fingerprint: entry.fingerprint,
      });
    }

    if (options.retentionMs !== undefined) {
      this.purgeExpired(options.now ?? new Date(), options.retentionMs);
    }

    this.logger.debug({ records: this.records.size }, 'Cache loaded');
    return this.records.size;
  }

  /**
   * Atomically write the full map (temp file, fsync, rename). Writes are
   * serialised; a clean store is skipped unless `force` is set.
   *
   * @returns whether a file was written
   */
  persist(options: { force?: boolean } = {}): Promise<boolean> {
    const run = this.writing.then(() => this.writeFile(options.force ?? false));
    this.writing = run.catch(() => undefined);
    return run;
  }

  /**
   * Drop records whose last alert is older than `retentionMs`.
   */
  purgeExpired(now: Date, retentionMs: number): number {
    const cutoff = now.getTime() - retentionMs;
    let removed = 0;

    for (const [key, record] of this.records) {
      if (record.lastAlerted.getTime() < cutoff) {
        this.records.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      this.mutations++;
      this.logger.info({ removed, remaining: this.records.size }, 'Purged expired cache records');
    }
    return removed;
  }

  private async writeFile(force: boolean): Promise<boolean> {
    if (!force && !this.isDirty()) return false;

    const mutationsAtWrite = this.mutations;
    const contents: CacheFile = {
      version: 1,
      records: [...this.records].map(([key, record]) => ({
        key,
        first_seen: record.firstSeen.toISOString(),
        last_alerted: record.lastAlerted.toISOString(),
        fingerprint: record.fingerprint,
      })),
    };

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.${++this.writeSeq}.tmp`;

    try {
      const handle = await fs.open(tempPath, 'w', 0o600);
      try {
        await handle.writeFile(JSON.stringify(contents, null, 2), 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }

    this.persistedMutations = mutationsAtWrite;
    return true;
  }

  private reportCorruption(error: CacheCorruptionError): void {
    this.logger.warn({ err: error, file: error.filePath }, 'Cache file unusable, starting with an empty cache');
  }
}

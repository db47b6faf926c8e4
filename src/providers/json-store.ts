/**
 * JSON Document Store Provider
 *
 * Each persistent structure (run index, seen URLs, delivery history, extraction
 * cache) is one JSON document. Documents are validated with zod on every load and
 * replaced whole on every write: serialise to a temp file beside the target, then
 * rename over it, so a crash mid-write never leaves a torn document.
 *
 * Writers in the same process are serialised by a per-path lock, keyed by the
 * resolved path. Writers in other processes are excluded by a `<path>.lock` file
 * created exclusively and held from load to rename; a lock file older than
 * `staleLockMs` is treated as left behind by a crashed writer and removed.
 * The `revision` counter still guards against writers that bypass the lock file:
 * if it moved between our read and our swap the read-modify-write is redone, and
 * after the last attempt a StoreWriteConflict is raised.
 */

import { mkdir, open, readFile, rename, rm, stat, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { randomUUID } from 'crypto';
import type { z } from 'zod';
import type { StoreHeader } from '../types/store.js';
import { HistoryStoreCorrupt, StoreWriteConflict, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('json-store');

export type AsyncLock = <R>(fn: () => Promise<R>) => Promise<R>;

export function createAsyncLock(): AsyncLock {
  let tail: Promise<unknown> = Promise.resolve();
  return <R>(fn: () => Promise<R>): Promise<R> => {
    const run = tail.then(fn);
    tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  };
}

/**
 * Replace a JSON file atomically: temp file in the same directory, then rename.
 */
export async function writeJsonAtomic(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.${process.pid}.${randomUUID()}.tmp`;
  await writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  try {
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

const STORE_LOCKS = new Map<string, AsyncLock>();

function resolveStoreLock(path: string): AsyncLock {
  const key = resolve(path);
  const existing = STORE_LOCKS.get(key);
  if (existing) {
    return existing;
  }
  const created = createAsyncLock();
  STORE_LOCKS.set(key, created);
  return created;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

function isMissingFile(error: unknown): boolean {
  return hasErrorCode(error, 'ENOENT');
}

export interface FileLockOptions {
  /** Give up waiting for another writer after this long (default 5s) */
  timeoutMs?: number;
  /** A lock file older than this was left by a crashed writer (default 30s) */
  staleMs?: number;
  retryDelayMs?: number;
}

async function lockAge(lockPath: string): Promise<number | null> {
  try {
    const info = await stat(lockPath);
    return Date.now() - info.mtimeMs;
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Run `fn` while holding `<path>.lock`, shared with every process that opens the
 * same store. Raises StoreWriteConflict when the lock stays taken past the timeout.
 */
export async function withFileLock<R>(path: string, fn: () => Promise<R>, options: FileLockOptions = {}): Promise<R> {
  const lockPath = `${path}.lock`;
  const timeoutMs = options.timeoutMs ?? 5000;
  const staleMs = options.staleMs ?? 30000;
  const retryDelayMs = options.retryDelayMs ?? 50;
  const deadline = Date.now() + timeoutMs;

  await mkdir(dirname(lockPath), { recursive: true });

  for (;;) {
    try {
      const handle = await open(lockPath, 'wx');
      try {
        await handle.writeFile(`${process.pid}\n`, 'utf-8');
      } finally {
        await handle.close();
      }
      break;
    } catch (error) {
      if (!hasErrorCode(error, 'EEXIST')) {
        throw error;
      }
    }

    const age = await lockAge(lockPath);
    if (age === null) {
      continue;
    }
    if (age > staleMs) {
      log.error(`Removing stale lock ${lockPath} (${Math.round(age / 1000)}s old)`);
      await rm(lockPath, { force: true });
      continue;
    }
    if (Date.now() >= deadline) {
      throw new StoreWriteConflict(path, 0, `lock ${lockPath} held by another writer for over ${timeoutMs}ms`);
    }
    await new Promise(resolveDelay => setTimeout(resolveDelay, retryDelayMs));
  }

  try {
    return await fn();
  } finally {
    await rm(lockPath, { force: true });
  }
}

export interface JsonDocumentStoreOptions<T extends StoreHeader> {
  /** Human readable name used in logs and errors */
  name: string;
  path: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  createEmpty: (nowIso: string) => T;
  /** Total read-modify-write attempts before giving up (default 2: one retry) */
  maxAttempts?: number;
  fileLock?: FileLockOptions;
  now?: () => Date;
}

export interface UpdateResult<T, R> {
  document: T;
  result: R;
}

export class JsonDocumentStore<T extends StoreHeader> {
  private readonly lock: AsyncLock;
  private readonly maxAttempts: number;
  private readonly now: () => Date;

  constructor(private readonly options: JsonDocumentStoreOptions<T>) {
    this.lock = resolveStoreLock(options.path);
    this.maxAttempts = options.maxAttempts ?? 2;
    this.now = options.now ?? (() => new Date());
  }

  get path(): string {
    return this.options.path;
  }

  get name(): string {
    return this.options.name;
  }

  /**
   * Load the full document. A missing file yields an empty document at revision 0;
   * anything unreadable raises HistoryStoreCorrupt.
   */
  async load(): Promise<T> {
    const raw = await this.readRaw();
    if (raw === null) {
      log.debug(`${this.options.name} not found at ${this.path}, starting empty`);
      return this.options.createEmpty(this.now().toISOString());
    }
    return this.parse(raw);
  }

  /**
   * Read-modify-write the whole document under the store lock.
   * `mutate` may run more than once when a concurrent writer is detected, so it
   * must derive everything it changes from the document it is handed.
   */
  async update<R>(mutate: (document: T) => R | Promise<R>): Promise<UpdateResult<T, R>> {
    return this.lock(() => withFileLock(this.path, () => this.readModifyWrite(mutate), this.options.fileLock));
  }

  private async readModifyWrite<R>(mutate: (document: T) => R | Promise<R>): Promise<UpdateResult<T, R>> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const document = await this.load();
      const baseRevision = document.revision;
      const result = await mutate(document);

      const revisionOnDisk = await this.readRevision();
      if (revisionOnDisk !== baseRevision) {
        log.error(
          `${this.options.name} changed on disk during update (revision ${baseRevision} -> ${revisionOnDisk}), attempt ${attempt}/${this.maxAttempts}`
        );
        continue;
      }

      document.revision = baseRevision + 1;
      document.updatedAt = this.now().toISOString();
      await writeJsonAtomic(this.path, document);
      log.debug(`Wrote ${this.options.name} revision ${document.revision}`);
      return { document, result };
    }

    throw new StoreWriteConflict(this.path, this.maxAttempts);
  }

  private async readRaw(): Promise<string | null> {
    try {
      return await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw new HistoryStoreCorrupt(this.options.name, this.path, errorMessage(error), { cause: error });
    }
  }

  private parse(raw: string): T {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new HistoryStoreCorrupt(this.options.name, this.path, `invalid JSON (${errorMessage(error)})`, {
        cause: error
      });
    }

    const parsed = this.options.schema.safeParse(json);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .slice(0, 3)
        .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new HistoryStoreCorrupt(this.options.name, this.path, detail, { cause: parsed.error });
    }
    return parsed.data;
  }

  private async readRevision(): Promise<number> {
    const raw = await this.readRaw();
    if (raw === null) {
      return 0;
    }
    return this.parse(raw).revision;
  }
}

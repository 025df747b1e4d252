/**
 * Alert-record persistence: the only state that outlives a scan.
 * Load at scan start, mutate an in-memory ledger, save once at scan end.
 * A file store serializes overlapping scans with an exclusive lock file and
 * replaces the store atomically (temp file + rename).
 */

import {
  closeSync,
  existsSync,
  linkSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from "fs";
import { dirname } from "path";
import { z } from "zod";
import { AlertStoreError } from "../errors";
import type { AlertRecord } from "../types";

const STORE_VERSION = 1;

const StoreFileSchema = z.object({
  version: z.literal(STORE_VERSION),
  records: z.array(
    z.object({
      key: z.string().min(1),
      lastAlertedAt: z.string().datetime(),
    })
  ),
});

export interface AlertRecordStore {
  /** Run fn while holding the store exclusively. */
  withLock<T>(fn: () => Promise<T>): Promise<T>;
  load(): AlertRecord[];
  save(records: AlertRecord[]): void;
}

export interface FileStoreOptions {
  lockStaleMs: number;
  lockRetries: number;
  lockRetryDelayMs: number;
}

const DEFAULT_FILE_STORE_OPTIONS: FileStoreOptions = {
  lockStaleMs: 10 * 60 * 1000,
  lockRetries: 20,
  lockRetryDelayMs: 250,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function removeQuietly(path: string): void {
  try {
    rmSync(path, { force: true });
  } catch (e) {
    console.warn(`[store] Failed to remove ${path}:`, String(e));
  }
}

function errorCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}

export class FileAlertStore implements AlertRecordStore {
  readonly path: string;
  private readonly options: FileStoreOptions;

  constructor(path: string, options: Partial<FileStoreOptions> = {}) {
    this.path = path;
    this.options = { ...DEFAULT_FILE_STORE_OPTIONS, ...options };
  }

  get lockPath(): string {
    return `${this.path}.lock`;
  }

  private ensureDir(): void {
    const dir = dirname(this.path);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  }

  private tryAcquire(): boolean {
    try {
      const fd = openSync(this.lockPath, "wx");
      writeFileSync(fd, JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() }));
      closeSync(fd);
      return true;
    } catch (e) {
      if (errorCode(e) !== "EEXIST") {
        throw new AlertStoreError(this.path, "cannot create lock file", { cause: e });
      }
      return false;
    }
  }

  /** Content and age of the current lock file, or null when there is none. */
  private readLock(): { content: string; ageMs: number } | null {
    try {
      const ageMs = Date.now() - statSync(this.lockPath).mtimeMs;
      return { content: readFileSync(this.lockPath, "utf-8"), ageMs };
    } catch (e) {
      if (errorCode(e) === "ENOENT") return null;
      throw new AlertStoreError(this.path, "cannot inspect lock file", { cause: e });
    }
  }

  private breakIfStale(): void {
    const lock = this.readLock();
    if (!lock || lock.ageMs <= this.options.lockStaleMs) return;
    if (this.breakLock(lock.content)) {
      console.warn(`[store] Broke stale lock (${Math.round(lock.ageMs / 1000)}s old): ${this.lockPath}`);
    }
  }

  /**
   * Remove the lock file only if it still holds `staleContent`. The file is moved
   * aside first, so a lock another scan took in the meantime is put back, not deleted.
   */
  breakLock(staleContent: string): boolean {
    const aside = `${this.lockPath}.${process.pid}.stale`;
    try {
      renameSync(this.lockPath, aside);
    } catch (e) {
      if (errorCode(e) === "ENOENT") return false;
      throw new AlertStoreError(this.path, "cannot break stale lock", { cause: e });
    }
    try {
      if (readFileSync(aside, "utf-8") === staleContent) return true;
      try {
        linkSync(aside, this.lockPath);
      } catch (e) {
        if (errorCode(e) !== "EEXIST") throw e;
      }
      return false;
    } catch (e) {
      throw new AlertStoreError(this.path, "cannot restore lock file", { cause: e });
    } finally {
      removeQuietly(aside);
    }
  }

  private release(): void {
    try {
      unlinkSync(this.lockPath);
    } catch (e) {
      if (errorCode(e) !== "ENOENT") console.warn(`[store] Failed to release lock ${this.lockPath}:`, String(e));
    }
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    try {
      this.ensureDir();
    } catch (e) {
      throw new AlertStoreError(this.path, "cannot create store directory", { cause: e });
    }
    let acquired = false;
    for (let attempt = 0; attempt <= this.options.lockRetries; attempt++) {
      this.breakIfStale();
      if (this.tryAcquire()) {
        acquired = true;
        break;
      }
      if (attempt < this.options.lockRetries) await sleep(this.options.lockRetryDelayMs);
    }
    if (!acquired) {
      throw new AlertStoreError(this.path, `store is locked by another scan (${this.lockPath})`);
    }
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /** Missing file = empty store. Corrupt file = AlertStoreError. */
  load(): AlertRecord[] {
    if (!existsSync(this.path)) return [];
    let data: unknown;
    try {
      data = JSON.parse(readFileSync(this.path, "utf-8"));
    } catch (e) {
      throw new AlertStoreError(this.path, "cannot read alert store", { cause: e });
    }
    const result = StoreFileSchema.safeParse(data);
    if (!result.success) {
      const msg = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new AlertStoreError(this.path, `invalid alert store: ${msg}`);
    }
    return result.data.records;
  }

  save(records: AlertRecord[]): void {
    const tmp = `${this.path}.${process.pid}.tmp`;
    try {
      this.ensureDir();
      writeFileSync(tmp, JSON.stringify({ version: STORE_VERSION, records }, null, 2), "utf-8");
      renameSync(tmp, this.path);
    } catch (e) {
      removeQuietly(tmp);
      throw new AlertStoreError(this.path, "cannot write alert store", { cause: e });
    }
  }
}

/** Same contract, no I/O. Used by demo mode and tests. */
export class InMemoryAlertStore implements AlertRecordStore {
  private records: AlertRecord[];
  private locked = false;
  saveCount = 0;

  constructor(initial: AlertRecord[] = []) {
    this.records = initial.map((r) => ({ ...r }));
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    while (this.locked) await sleep(1);
    this.locked = true;
    try {
      return await fn();
    } finally {
      this.locked = false;
    }
  }

  load(): AlertRecord[] {
    return this.records.map((r) => ({ ...r }));
  }

  save(records: AlertRecord[]): void {
    this.records = records.map((r) => ({ ...r }));
    this.saveCount++;
  }
}

/**
 * Working copy of the store for one scan. Purge, lookup and upsert happen here;
 * nothing is persisted until the caller saves `records()`.
 */
export class AlertLedger {
  private readonly byKey = new Map<string, number>();

  constructor(records: AlertRecord[] = []) {
    for (const r of records) {
      const ts = Date.parse(r.lastAlertedAt);
      if (Number.isNaN(ts)) continue;
      const prev = this.byKey.get(r.key);
      if (prev === undefined || ts > prev) this.byKey.set(r.key, ts);
    }
  }

  /** Drop records alerted strictly before `cutoff`. Returns how many were removed. */
  purgeOlderThan(cutoff: Date): number {
    let removed = 0;
    for (const [key, ts] of this.byKey) {
      if (ts < cutoff.getTime()) {
        this.byKey.delete(key);
        removed++;
      }
    }
    return removed;
  }

  has(key: string): boolean {
    return this.byKey.has(key);
  }

  upsert(key: string, at: Date): void {
    this.byKey.set(key, at.getTime());
  }

  get size(): number {
    return this.byKey.size;
  }

  records(): AlertRecord[] {
    return Array.from(this.byKey.entries())
      .sort((a, b) => a[0].localeCompare(b[0]))
      .map(([key, ts]) => ({ key, lastAlertedAt: new Date(ts).toISOString() }));
  }
}

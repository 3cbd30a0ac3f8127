import * as path from "path";
import * as fs from "fs/promises";
import type { Dirent, Stats } from "fs";
import type { Readable } from "stream";
import { Inject, Injectable } from "@nestjs/common";
import { v4 as uuidv4 } from "uuid";
import { StandardService } from "@/common/base";
import { CacheReadCorruptionError, CacheWriteError, ConfigError, errnoCode } from "@/common/errors/proxy.errors";
import type {
  CacheEntry,
  CacheKey,
  CacheLookupResult,
  CacheSweepReport,
  DiskCache,
  OpenedEntry,
  ResourceKind,
  StagedWrite,
} from "@/common/types/cache";
import { asError } from "@/common/utils/error.utils";
import { CLOCK, PROXY_CONFIG, type Clock, type ProxyConfig } from "@/config/proxy-config";
import { INDEX_FILE_NAME, TEMP_FILE_PATTERN, entryRelativePath, resourceKindOf } from "./cache-key";
import { FreshnessPolicy } from "./freshness-policy";
import { FileStagedWrite } from "./staged-write";

/**
 * Owns the cache directory. Entries mirror request paths under the cache root;
 * `storedAt` is the file's mtime, set at install time from the injected clock.
 */
@Injectable()
export class DiskCacheStoreService extends StandardService implements DiskCache {
  private readonly root: string;
  private readonly freshness: FreshnessPolicy;

  constructor(
    @Inject(PROXY_CONFIG) proxyConfig: ProxyConfig,
    @Inject(CLOCK) private readonly clock: Clock
  ) {
    super();
    this.root = proxyConfig.cacheRoot;
    this.freshness = FreshnessPolicy.fromConfig(proxyConfig);
  }

  /**
   * Creates the cache root, proves it writable and clears temp files a previous process left behind
   */
  override async initialize(): Promise<void> {
    const probePath = path.join(this.root, `.write-probe.${uuidv4()}.tmp`);
    try {
      await fs.mkdir(this.root, { recursive: true });
      await fs.writeFile(probePath, "");
      await fs.unlink(probePath);
    } catch (error) {
      throw new ConfigError(`Cache root ${this.root} is not writable`, [asError(error).message], { cause: error });
    }

    const removed = await this.sanitize();
    this.logCriticalOperation("cache_root_ready", { root: this.root, removedTempFiles: removed });
  }

  async lookup(key: CacheKey): Promise<CacheLookupResult> {
    const kind = resourceKindOf(key);
    const filePath = this.pathFor(key, kind);

    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) {
        throw new CacheReadCorruptionError(key, filePath, new Error("not a regular file"));
      }
      await fs.access(filePath, fs.constants.R_OK);
      return {
        found: true,
        entry: { key, kind, filePath, storedAt: Math.round(stats.mtimeMs), sizeBytes: stats.size },
      };
    } catch (error) {
      return this.missFor(key, filePath, error);
    }
  }

  isFresh(entry: CacheEntry): boolean {
    return this.freshness.isFresh(entry, this.clock.now());
  }

  async stage(key: CacheKey): Promise<StagedWrite> {
    const kind = resourceKindOf(key);
    const finalPath = this.pathFor(key, kind);
    const tempPath = `${finalPath}.${uuidv4()}.tmp`;

    try {
      await fs.mkdir(path.dirname(finalPath), { recursive: true });
      const handle = await fs.open(tempPath, "wx");
      return new FileStagedWrite(
        key,
        kind,
        finalPath,
        tempPath,
        handle,
        () => this.clock.now(),
        failure => this.recordWriteFailure(failure)
      );
    } catch (error) {
      const failure = new CacheWriteError(key, tempPath, error);
      this.recordWriteFailure(failure);
      throw failure;
    }
  }

  /**
   * Writes a whole body and installs it. On any failure the temp file is removed
   * and nothing becomes visible under `key`.
   */
  async put(key: CacheKey, body: Buffer | Readable): Promise<CacheEntry> {
    const staged = await this.stage(key);
    try {
      if (Buffer.isBuffer(body)) {
        await staged.write(body);
      } else {
        for await (const chunk of body) {
          await staged.write(toBuffer(chunk));
        }
      }
      const entry = await staged.commit();
      this.recordStored(entry);
      return entry;
    } catch (error) {
      await staged.discard();
      throw error;
    }
  }

  /**
   * Counts an entry installed through `stage`/`commit` by a caller
   */
  recordStored(entry: CacheEntry): void {
    this.incrementCounter("stores");
    this.logCacheEvent("stored", entry.key, { sizeBytes: entry.sizeBytes });
  }

  /**
   * Recovered failure: the caller serves the response without warming the cache
   */
  private recordWriteFailure(error: CacheWriteError): void {
    this.incrementCounter("write_failures");
    this.logError(error, "persist", { key: error.key, path: error.path });
  }

  async openBody(entry: CacheEntry): Promise<OpenedEntry | undefined> {
    let handle: fs.FileHandle;
    try {
      handle = await fs.open(entry.filePath, "r");
    } catch (error) {
      await this.missFor(entry.key, entry.filePath, error);
      return undefined;
    }

    try {
      const stats = await handle.stat();
      return {
        entry: { ...entry, storedAt: Math.round(stats.mtimeMs), sizeBytes: stats.size },
        body: handle.createReadStream(),
      };
    } catch (error) {
      await handle.close();
      await this.missFor(entry.key, entry.filePath, error);
      return undefined;
    }
  }

  async readBody(entry: CacheEntry): Promise<Buffer> {
    return fs.readFile(entry.filePath);
  }

  async evict(key: CacheKey): Promise<boolean> {
    try {
      await fs.unlink(this.pathFor(key, resourceKindOf(key)));
      this.incrementCounter("evictions");
      return true;
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return false;
      }
      throw error;
    }
  }

  /**
   * Deletes every stale entry under the root. Temp files belong to fills in progress and are left alone.
   */
  async sweep(): Promise<CacheSweepReport> {
    const startedAt = performance.now();
    const now = this.clock.now();
    const report: CacheSweepReport = {
      scannedEntries: 0,
      removedEntries: 0,
      freedBytes: 0,
      retainedBytes: 0,
      durationMs: 0,
    };

    for await (const filePath of this.walk(this.root)) {
      if (TEMP_FILE_PATTERN.test(filePath)) {
        continue;
      }
      report.scannedEntries++;

      const kind: ResourceKind = path.basename(filePath) === INDEX_FILE_NAME ? "index" : "file";
      try {
        const stats = await fs.stat(filePath);
        if (this.freshness.isFresh({ kind, storedAt: Math.round(stats.mtimeMs) }, now)) {
          report.retainedBytes += stats.size;
          continue;
        }
        if (!(await this.unlinkIfUnchanged(filePath, stats))) {
          continue;
        }
        report.removedEntries++;
        report.freedBytes += stats.size;
      } catch (error) {
        if (errnoCode(error) !== "ENOENT") {
          this.handleError(asError(error), "sweep", { shouldThrow: false, additionalData: { filePath } });
        }
      }
    }

    report.durationMs = performance.now() - startedAt;
    this.incrementCounter("swept_entries", report.removedEntries);
    return report;
  }

  /**
   * Removes leftover temp files. Only safe while no fill is running, i.e. at startup.
   */
  async sanitize(): Promise<number> {
    let removed = 0;
    for await (const filePath of this.walk(this.root)) {
      if (!TEMP_FILE_PATTERN.test(filePath)) {
        continue;
      }
      try {
        await fs.unlink(filePath);
        removed++;
      } catch (error) {
        if (errnoCode(error) !== "ENOENT") {
          this.handleError(asError(error), "sanitize", { shouldThrow: false, additionalData: { filePath } });
        }
      }
    }
    return removed;
  }

  /**
   * A fill may have installed a new entry at `filePath` since `judged` was taken
   */
  private async unlinkIfUnchanged(filePath: string, judged: Stats): Promise<boolean> {
    const current = await fs.stat(filePath);
    if (current.ino !== judged.ino || current.mtimeMs !== judged.mtimeMs) {
      return false;
    }
    await fs.unlink(filePath);
    return true;
  }

  private pathFor(key: CacheKey, kind: ResourceKind): string {
    return path.join(this.root, entryRelativePath(key, kind));
  }

  /**
   * Absent files are a plain miss; anything else unreadable is logged as corruption and also a miss
   */
  private async missFor(key: CacheKey, filePath: string, error: unknown): Promise<CacheLookupResult> {
    const code = errnoCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return { found: false };
    }

    const corruption =
      error instanceof CacheReadCorruptionError ? error : new CacheReadCorruptionError(key, filePath, error);
    this.incrementCounter("corrupt_reads");
    this.logWarning(corruption.message, "lookup");
    return { found: false };
  }

  private async *walk(dir: string): AsyncGenerator<string> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return;
      }
      throw error;
    }

    for (const dirent of entries) {
      const fullPath = path.join(dir, dirent.name);
      if (dirent.isDirectory()) {
        yield* this.walk(fullPath);
      } else if (dirent.isFile()) {
        yield fullPath;
      }
    }
  }
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (typeof chunk === "string") {
    return Buffer.from(chunk);
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }
  throw new TypeError("Cache bodies must be byte streams");
}

import type { Readable } from "stream";

/**
 * Normalised request path ("/software/v1.tar.gz"). GET and HEAD share a key;
 * the query string is never part of it.
 */
export type CacheKey = string;

/**
 * "file" for artifacts (last path segment has an extension), "index" for directory listings
 */
export type ResourceKind = "file" | "index";

/**
 * Metadata of an installed entry. The body stays on disk and is opened on demand.
 */
export interface CacheEntry {
  key: CacheKey;
  kind: ResourceKind;
  /** Absolute path of the installed body */
  filePath: string;
  /** Epoch millis of installation */
  storedAt: number;
  sizeBytes: number;
}

export type CacheLookupResult = { found: true; entry: CacheEntry } | { found: false };

/**
 * An entry opened for reading. `entry` reflects the file actually opened,
 * which may be newer than the one `lookup` reported.
 */
export interface OpenedEntry {
  entry: CacheEntry;
  body: Readable;
}

/**
 * A body being written to a temporary file. Nothing is visible under the key until `commit`.
 */
export interface StagedWrite {
  readonly key: CacheKey;
  readonly tempPath: string;
  readonly bytesWritten: number;
  write(chunk: Buffer): Promise<void>;
  /** Installs the body atomically, replacing any previous entry */
  commit(): Promise<CacheEntry>;
  /** Removes the temporary file; safe to call more than once */
  discard(): Promise<void>;
}

export interface CacheSweepReport {
  scannedEntries: number;
  removedEntries: number;
  freedBytes: number;
  retainedBytes: number;
  durationMs: number;
}

/**
 * Operations the proxy needs from the disk cache
 */
export interface DiskCache {
  lookup(key: CacheKey): Promise<CacheLookupResult>;
  isFresh(entry: CacheEntry): boolean;
  put(key: CacheKey, body: Buffer | Readable): Promise<CacheEntry>;
  stage(key: CacheKey): Promise<StagedWrite>;
  /** Undefined when the entry vanished or became unreadable since lookup */
  openBody(entry: CacheEntry): Promise<OpenedEntry | undefined>;
  readBody(entry: CacheEntry): Promise<Buffer>;
  evict(key: CacheKey): Promise<boolean>;
  sweep(): Promise<CacheSweepReport>;
}

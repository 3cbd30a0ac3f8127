import type { Readable } from "stream";
import type { CacheEntry, CacheKey } from "../cache";
import type { CacheWriteError } from "@/common/errors/proxy.errors";

/**
 * A successful origin response whose body has not been consumed yet
 */
export interface UpstreamResponse {
  url: string;
  status: number;
  /** Declared body length, when the origin sent one */
  contentLength?: number;
  body: Readable;
}

export interface UpstreamClient {
  /** Rejects with UpstreamError for anything but a 2xx response */
  fetch(url: string): Promise<UpstreamResponse>;
}

export type FetchRole = "leader" | "waiter";

/**
 * A caller's place in a coalesced fetch. `result` settles with the leader's outcome for every caller.
 */
export interface FetchHandle<T> {
  role: FetchRole;
  result: Promise<T>;
}

export interface InFlightFetch<T> {
  key: CacheKey;
  promise: Promise<T>;
  /** Callers that joined after the leader */
  waiters: number;
  startedAt: number;
}

export interface InFlightFetchSummary {
  key: CacheKey;
  waiters: number;
  ageMs: number;
}

/**
 * Result of one upstream fill. When the body could not be installed, `body` holds it
 * for waiters if it fit in the fallback buffer.
 */
export type FillOutcome =
  | { status: "stored"; entry: CacheEntry }
  | { status: "unstored"; key: CacheKey; sizeBytes: number; body?: Buffer; writeError?: CacheWriteError };

import { ErrorCode, ErrorSeverity } from "@/common/types/error-handling";

/**
 * Base class for every failure the proxy classifies itself.
 * `retryable` tells clients whether repeating the same request may succeed.
 */
export abstract class ProxyError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly severity: ErrorSeverity;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  constructor(
    message: string,
    readonly context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid or unusable configuration. Fatal at startup.
 */
export class ConfigError extends ProxyError {
  readonly code = ErrorCode.CONFIGURATION_ERROR;
  readonly severity = ErrorSeverity.CRITICAL;
  readonly retryable = false;

  constructor(
    message: string,
    readonly problems: readonly string[] = [],
    options?: { cause?: unknown }
  ) {
    super(problems.length > 0 ? `${message}: ${problems.join("; ")}` : message, { problems }, options);
  }
}

export type UpstreamFailureKind = "timeout" | "connection" | "status" | "truncated";

/**
 * The origin could not deliver a complete, successful response.
 */
export class UpstreamError extends ProxyError {
  readonly severity = ErrorSeverity.MEDIUM;
  readonly retryable = true;
  readonly code: ErrorCode;

  constructor(
    message: string,
    readonly kind: UpstreamFailureKind,
    readonly url: string,
    readonly upstreamStatus?: number,
    options?: { cause?: unknown }
  ) {
    super(message, { kind, url, upstreamStatus }, options);
    this.code = UPSTREAM_CODES[kind];
  }

  get timedOut(): boolean {
    return this.kind === "timeout";
  }
}

const UPSTREAM_CODES: Record<UpstreamFailureKind, ErrorCode> = {
  timeout: ErrorCode.UPSTREAM_TIMEOUT,
  connection: ErrorCode.UPSTREAM_ERROR,
  status: ErrorCode.UPSTREAM_BAD_STATUS,
  truncated: ErrorCode.UPSTREAM_TRUNCATED,
};

/**
 * Persisting a fetched body failed (disk full, permissions, path collision).
 * Recovered: the response is served without warming the cache.
 */
export class CacheWriteError extends ProxyError {
  readonly code = ErrorCode.CACHE_WRITE_FAILED;
  readonly severity = ErrorSeverity.HIGH;
  readonly retryable = true;

  constructor(
    readonly key: string,
    readonly path: string,
    cause: unknown
  ) {
    super(`Failed to persist cache entry for ${key}: ${describeCause(cause)}`, { key, path }, { cause });
  }
}

/**
 * A stored entry exists but cannot be read. Treated as a cache miss.
 */
export class CacheReadCorruptionError extends ProxyError {
  readonly code = ErrorCode.CACHE_READ_CORRUPT;
  readonly severity = ErrorSeverity.LOW;
  readonly retryable = true;

  constructor(
    readonly key: string,
    readonly path: string,
    cause: unknown
  ) {
    super(`Unreadable cache entry for ${key}: ${describeCause(cause)}`, { key, path }, { cause });
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    const code = errnoCode(cause);
    return code ? `${code} ${cause.message}` : cause.message;
  }
  return String(cause);
}

/**
 * Node system errors carry a string `code` such as ENOENT
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

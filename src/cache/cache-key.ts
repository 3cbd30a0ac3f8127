import type { CacheKey, ResourceKind } from "@/common/types/cache";

export type PathClassification = { valid: true; key: CacheKey } | { valid: false; reason: string };

export const INDEX_FILE_NAME = "index.json";

/**
 * Temp files are `<final path>.<uuid>.tmp`. Keys whose last segment has that shape are refused,
 * so nothing but a temp file in the cache root matches.
 */
export const TEMP_FILE_PATTERN = /\.[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\.tmp$/;

/**
 * Decodes a request path and reduces it to its cache key: empty segments dropped,
 * no trailing slash, "/" for the root. Paths with "." or ".." segments, NUL bytes,
 * broken percent-encoding or a temp-file name at the end are invalid.
 */
export function classifyPath(rawPath: string): PathClassification {
  const pathOnly = rawPath.split("?", 1)[0];

  let decoded: string;
  try {
    decoded = decodeURIComponent(pathOnly);
  } catch {
    return { valid: false, reason: "malformed percent-encoding" };
  }

  if (decoded.includes("\0")) {
    return { valid: false, reason: "NUL byte in path" };
  }

  const segments = decoded.split("/").filter(segment => segment.length > 0);
  if (segments.some(segment => segment === "." || segment === "..")) {
    return { valid: false, reason: "dot segment in path" };
  }

  if (segments.length > 0 && TEMP_FILE_PATTERN.test(segments[segments.length - 1])) {
    return { valid: false, reason: "temp file name in path" };
  }

  return { valid: true, key: "/" + segments.join("/") };
}

/**
 * The path exactly as the client sent it, decoded, for comparison against its key
 */
export function decodedRequestPath(rawPath: string): string {
  const pathOnly = rawPath.split("?", 1)[0];
  try {
    return decodeURIComponent(pathOnly);
  } catch {
    return pathOnly;
  }
}

export function resourceKindOf(key: CacheKey): ResourceKind {
  const lastSegment = key.slice(key.lastIndexOf("/") + 1);
  return lastSegment.includes(".") ? "file" : "index";
}

/**
 * Location of the entry relative to the cache root. Listings live in an index.json
 * inside the directory that mirrors their path, so the front door can serve both by path.
 */
export function entryRelativePath(key: CacheKey, kind: ResourceKind = resourceKindOf(key)): string {
  const relative = key.replace(/^\/+/, "");
  if (kind === "index") {
    return relative === "" ? INDEX_FILE_NAME : `${relative}/${INDEX_FILE_NAME}`;
  }
  return relative;
}

/**
 * Percent-encodes each segment of a key so it can be put back into a URL
 */
export function encodeKeyPath(key: CacheKey): string {
  return key.split("/").map(encodeURIComponent).join("/");
}

/**
 * Origin URL for a key: files at their path, listings at the directory URL with a trailing slash
 */
export function backendUrlFor(backendPrefix: string, key: CacheKey, kind: ResourceKind = resourceKindOf(key)): string {
  const encodedPath = key === "/" ? "" : encodeKeyPath(key);
  return `${backendPrefix}${encodedPath}${kind === "index" ? "/" : ""}`;
}

/**
 * Whether `key` equals `prefix` or lies below it on a segment boundary
 */
export function isUnderPrefix(key: CacheKey, prefix: string): boolean {
  if (prefix === "/") {
    return true;
  }
  return key === prefix || key.startsWith(`${prefix}/`);
}

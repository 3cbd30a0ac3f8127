import type { ClassifiedRequest, RedirectRule } from "@/common/types/routing";
import type { ProxyConfig } from "@/config/proxy-config";
import { encodeKeyPath, isUnderPrefix } from "@/cache/cache-key";

export const NO_STORE: Readonly<Record<string, string>> = Object.freeze({ "Cache-Control": "no-store" });

/**
 * Host header without port, lowercased. IPv6 literals keep their brackets.
 */
export function normalizeHost(host: string): string {
  const lowered = host.trim().toLowerCase();
  if (lowered.startsWith("[")) {
    const end = lowered.indexOf("]");
    return end === -1 ? lowered : lowered.slice(0, end + 1);
  }
  return lowered.split(":", 1)[0];
}

/**
 * Path rules applied after the host and method checks, in priority order
 */
export function buildRedirectRules(config: ProxyConfig): readonly RedirectRule[] {
  const rules: RedirectRule[] = [];

  if (config.allowedPathPrefixes.length > 0) {
    rules.push({
      reason: "outside-allowed-prefixes",
      status: 302,
      headers: NO_STORE,
      matches: request => !config.allowedPathPrefixes.some(prefix => isUnderPrefix(request.key, prefix)),
      target: () => config.redirectInvalidTo,
    });
  }

  rules.push({
    reason: "normalize",
    status: 301,
    headers: {},
    matches: request => request.decodedPath !== request.key,
    target: request => encodeKeyPath(request.key) + (request.query ? `?${request.query}` : ""),
  });

  if (config.staticHandoffPaths.length > 0) {
    rules.push({
      reason: "static-handoff",
      status: 302,
      headers: {},
      matches: (request: ClassifiedRequest) =>
        config.staticHandoffPaths.some(prefix => isUnderPrefix(request.key, prefix)),
      target: request => `${config.staticRedirectPrefix}${encodeKeyPath(request.key)}`,
    });
  }

  return Object.freeze(rules.map(rule => Object.freeze(rule)));
}

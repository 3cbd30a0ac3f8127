import type { CacheKey, ResourceKind } from "../cache";

/**
 * The parts of an inbound request the router looks at
 */
export interface RoutedRequest {
  method: string;
  /** Raw Host header, port included */
  host?: string;
  /** Raw request target: path plus optional query string */
  rawPath: string;
}

export type RedirectReason = "disallowed-host" | "invalid-path" | "outside-allowed-prefixes" | "normalize" | "static-handoff";

export type RoutingDecision =
  | {
      action: "redirect";
      status: 301 | 302;
      location: string;
      reason: RedirectReason;
      headers: Readonly<Record<string, string>>;
    }
  | { action: "reject"; status: 405; allow: readonly string[] }
  | { action: "proxy"; key: CacheKey; kind: ResourceKind; method: "GET" | "HEAD" };

/**
 * Classified request after method and path checks passed
 */
export interface ClassifiedRequest {
  host?: string;
  key: CacheKey;
  decodedPath: string;
  query?: string;
}

/**
 * One immutable redirect rule: a predicate plus where matching requests are sent
 */
export interface RedirectRule {
  readonly reason: RedirectReason;
  readonly status: 301 | 302;
  readonly headers: Readonly<Record<string, string>>;
  matches(request: ClassifiedRequest): boolean;
  target(request: ClassifiedRequest): string;
}

import { Inject, Injectable } from "@nestjs/common";
import { StandardService } from "@/common/base";
import type { RedirectReason, RedirectRule, RoutedRequest, RoutingDecision } from "@/common/types/routing";
import { PROXY_CONFIG, type ProxyConfig } from "@/config/proxy-config";
import { classifyPath, decodedRequestPath, resourceKindOf } from "@/cache/cache-key";
import { NO_STORE, buildRedirectRules, normalizeHost } from "./redirect-rules";

const PROXIED_METHODS = ["GET", "HEAD"] as const;

type ProxiedMethod = (typeof PROXIED_METHODS)[number];

function isProxiedMethod(method: string): method is ProxiedMethod {
  return PROXIED_METHODS.some(allowed => allowed === method);
}

/**
 * Decides what happens to a request before the cache is consulted:
 * 1. Host not in the allowed list: 302 to the fallback URL
 * 2. Method other than GET/HEAD: 405
 * 3. Path that cannot be a cache key: 302 to the fallback URL
 * 4. Path outside the allowed prefixes: 302 to the fallback URL
 * 5. Path not in normal form: 301 to the normal form
 * 6. Path under a static hand-off prefix: 302 to the front door's static location
 * 7. Anything else is proxied
 *
 * Holds no per-request state.
 */
@Injectable()
export class RedirectPolicyService extends StandardService {
  private readonly allowedHosts: ReadonlySet<string>;
  private readonly rules: readonly RedirectRule[];

  constructor(@Inject(PROXY_CONFIG) private readonly proxyConfig: ProxyConfig) {
    super();
    this.allowedHosts = new Set(proxyConfig.allowedHosts.map(normalizeHost));
    this.rules = buildRedirectRules(proxyConfig);
  }

  decide(request: RoutedRequest): RoutingDecision {
    if (!this.isHostAllowed(request.host)) {
      return this.toFallback("disallowed-host");
    }

    const method = request.method.toUpperCase();
    if (!isProxiedMethod(method)) {
      this.incrementCounter("rejected_methods");
      return { action: "reject", status: 405, allow: PROXIED_METHODS };
    }

    const classification = classifyPath(request.rawPath);
    if (!classification.valid) {
      this.logDebug(`Invalid path ${request.rawPath}: ${classification.reason}`, "decide");
      return this.toFallback("invalid-path");
    }

    const queryStart = request.rawPath.indexOf("?");
    const classified = {
      host: request.host,
      key: classification.key,
      decodedPath: decodedRequestPath(request.rawPath),
      query: queryStart === -1 ? undefined : request.rawPath.slice(queryStart + 1),
    };

    const rule = this.rules.find(candidate => candidate.matches(classified));
    if (rule) {
      this.incrementCounter(`redirect_${rule.reason}`);
      return {
        action: "redirect",
        status: rule.status,
        location: rule.target(classified),
        reason: rule.reason,
        headers: rule.headers,
      };
    }

    return { action: "proxy", key: classified.key, kind: resourceKindOf(classified.key), method };
  }

  /**
   * An empty allow-list accepts every host
   */
  isHostAllowed(host: string | undefined): boolean {
    if (this.allowedHosts.size === 0) {
      return true;
    }
    return host !== undefined && this.allowedHosts.has(normalizeHost(host));
  }

  private toFallback(reason: RedirectReason): RoutingDecision {
    this.incrementCounter(`redirect_${reason}`);
    return {
      action: "redirect",
      status: 302,
      location: this.proxyConfig.redirectInvalidTo,
      reason,
      headers: NO_STORE,
    };
  }
}

/**
 * Proxy configuration value and the injection tokens components receive it under.
 */

export interface ProxyConfig {
  /** Origin URL prefix without a trailing slash; the request path is appended */
  readonly backendPrefix: string;
  /** Absolute path of the cache directory */
  readonly cacheRoot: string;
  /** Freshness window for artifact files */
  readonly fileFreshnessMs: number;
  /** Freshness window for directory listings */
  readonly indexFreshnessMs: number;
  /** Where disallowed hosts and invalid paths are sent */
  readonly redirectInvalidTo: string;
  /** Lowercased host names; empty accepts any host */
  readonly allowedHosts: readonly string[];
  /** Empty serves every path */
  readonly allowedPathPrefixes: readonly string[];
  readonly staticHandoffPaths: readonly string[];
  readonly staticRedirectPrefix: string;
  readonly upstreamConnectTimeoutMs: number;
  readonly upstreamReadTimeoutMs: number;
  /** 0 disables the waiter redirect */
  readonly waitRedirectMs: number;
  readonly fallbackBufferMaxBytes: number;
  /** 0 disables the expiry sweep */
  readonly sweepIntervalMs: number;
}

export const PROXY_CONFIG = "PROXY_CONFIG";

/**
 * Source of "now" for freshness decisions
 */
export interface Clock {
  now(): number;
}

export const CLOCK = "CLOCK";

export const systemClock: Clock = {
  now: () => Date.now(),
};

import * as path from "path";
import { Injectable } from "@nestjs/common";
import { StandardService } from "@/common/base";
import { ConfigError } from "@/common/errors/proxy.errors";
import { EnvironmentUtils, type EnvironmentSource } from "@/common/utils/environment.utils";
import type { ProxyConfig } from "./proxy-config";

export interface ConfigValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
  config?: ProxyConfig;
}

const SECOND_MS = 1000;

@Injectable()
export class ConfigValidationService extends StandardService {
  constructor() {
    super();
  }

  /**
   * Build the proxy configuration from `env` and validate it.
   * Throws ConfigError naming every problem found.
   */
  loadAndValidate(env: EnvironmentSource = process.env): ProxyConfig {
    const result = this.validate(env);

    if (!result.isValid || !result.config) {
      this.logger.error("Proxy configuration validation failed:");
      result.errors.forEach(error => this.logger.error(`  - ${error}`));
      throw new ConfigError("Invalid proxy configuration", result.errors);
    }

    if (result.warnings.length > 0) {
      this.logger.warn("Proxy configuration warnings:");
      result.warnings.forEach(warning => this.logger.warn(`  - ${warning}`));
    }

    this.logCriticalOperation("config_loaded", {
      backendPrefix: result.config.backendPrefix,
      cacheRoot: result.config.cacheRoot,
    });
    return result.config;
  }

  validate(env: EnvironmentSource): ConfigValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    const backendPrefix = this.requireHttpUrl("PROXY_BACKEND_PREFIX", env, errors);
    const cacheRoot = this.requireAbsolutePath("PROXY_CACHE_ROOT", env, errors);
    const redirectInvalidTo = this.requireRedirectTarget("PROXY_REDIRECT_INVALID_TO", env, errors);

    const staticRedirectPrefix = stripTrailingSlash(
      EnvironmentUtils.parseString("PROXY_STATIC_REDIRECT_PREFIX", "/static", env)
    );
    // "/" strips to "", meaning the front door serves the cache at its root
    if (staticRedirectPrefix !== "" && !isRedirectTarget(staticRedirectPrefix)) {
      errors.push(`PROXY_STATIC_REDIRECT_PREFIX: "${staticRedirectPrefix}" must start with "/" or be an http(s) URL`);
    }

    const allowedHosts = EnvironmentUtils.parseList("PROXY_ALLOWED_HOSTS", [], env).map(host => host.toLowerCase());
    const allowedPathPrefixes = this.parsePathList("PROXY_ALLOWED_PATH_PREFIXES", env, errors);
    const staticHandoffPaths = this.parsePathList("PROXY_STATIC_HANDOFF_PATHS", env, errors);

    const fileDurationSec = EnvironmentUtils.parseInt("PROXY_CACHE_FILE_DURATION_SEC", 1_209_600, { min: 1 }, env);
    const indexDurationSec = EnvironmentUtils.parseInt("PROXY_CACHE_INDEX_DURATION_SEC", 60, { min: 1 }, env);
    const upstreamConnectTimeoutMs = EnvironmentUtils.parseInt(
      "PROXY_UPSTREAM_CONNECT_TIMEOUT_MS",
      300_000,
      { min: 1 },
      env
    );
    const upstreamReadTimeoutMs = EnvironmentUtils.parseInt("PROXY_UPSTREAM_READ_TIMEOUT_MS", 300_000, { min: 1 }, env);
    const waitRedirectSec = EnvironmentUtils.parseInt("PROXY_WAIT_REDIRECT_SEC", 0, { min: 0 }, env);
    const fallbackBufferMaxBytes = EnvironmentUtils.parseInt(
      "PROXY_FALLBACK_BUFFER_MAX_BYTES",
      8 * 1024 * 1024,
      { min: 0 },
      env
    );
    const sweepIntervalMs = EnvironmentUtils.parseInt("PROXY_CACHE_SWEEP_INTERVAL_MS", 60_000, { min: 0 }, env);

    if (allowedHosts.length === 0) {
      warnings.push("PROXY_ALLOWED_HOSTS is empty: requests for any Host are proxied");
    }
    if (indexDurationSec > fileDurationSec) {
      warnings.push(
        `PROXY_CACHE_INDEX_DURATION_SEC (${indexDurationSec}) exceeds PROXY_CACHE_FILE_DURATION_SEC (${fileDurationSec})`
      );
    }

    if (errors.length > 0 || backendPrefix === undefined || cacheRoot === undefined || redirectInvalidTo === undefined) {
      return { isValid: false, errors, warnings };
    }

    const config: ProxyConfig = Object.freeze({
      backendPrefix,
      cacheRoot,
      fileFreshnessMs: fileDurationSec * SECOND_MS,
      indexFreshnessMs: indexDurationSec * SECOND_MS,
      redirectInvalidTo,
      allowedHosts: Object.freeze(allowedHosts),
      allowedPathPrefixes: Object.freeze(allowedPathPrefixes),
      staticHandoffPaths: Object.freeze(staticHandoffPaths),
      staticRedirectPrefix,
      upstreamConnectTimeoutMs,
      upstreamReadTimeoutMs,
      waitRedirectMs: waitRedirectSec * SECOND_MS,
      fallbackBufferMaxBytes,
      sweepIntervalMs,
    });

    return { isValid: true, errors, warnings, config };
  }

  private requireHttpUrl(key: string, env: EnvironmentSource, errors: string[]): string | undefined {
    const value = EnvironmentUtils.parseRequired(key, env);
    if (value === undefined) {
      errors.push(`${key} is required`);
      return undefined;
    }
    if (!isHttpUrl(value)) {
      errors.push(`${key}: "${value}" is not an http(s) URL`);
      return undefined;
    }
    return stripTrailingSlash(value);
  }

  private requireAbsolutePath(key: string, env: EnvironmentSource, errors: string[]): string | undefined {
    const value = EnvironmentUtils.parseRequired(key, env);
    if (value === undefined) {
      errors.push(`${key} is required`);
      return undefined;
    }
    if (!path.isAbsolute(value)) {
      errors.push(`${key}: "${value}" must be an absolute path`);
      return undefined;
    }
    return path.resolve(value);
  }

  private requireRedirectTarget(key: string, env: EnvironmentSource, errors: string[]): string | undefined {
    const value = EnvironmentUtils.parseRequired(key, env);
    if (value === undefined) {
      errors.push(`${key} is required`);
      return undefined;
    }
    if (!isRedirectTarget(value)) {
      errors.push(`${key}: "${value}" must start with "/" or be an http(s) URL`);
      return undefined;
    }
    return value;
  }

  private parsePathList(key: string, env: EnvironmentSource, errors: string[]): string[] {
    const prefixes: string[] = [];
    for (const entry of EnvironmentUtils.parseList(key, [], env)) {
      if (!entry.startsWith("/")) {
        errors.push(`${key}: "${entry}" must start with "/"`);
        continue;
      }
      prefixes.push(stripTrailingSlash(entry) || "/");
    }
    return prefixes;
  }
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

function isRedirectTarget(value: string): boolean {
  return (value.startsWith("/") && !value.startsWith("//")) || isHttpUrl(value);
}

function stripTrailingSlash(value: string): string {
  return value.replace(/\/+$/, "");
}

import { ConfigValidationService } from "../config-validation.service";
import { ConfigError } from "@/common/errors/proxy.errors";
import { ErrorCode } from "@/common/types/error-handling";

const REQUIRED = {
  PROXY_BACKEND_PREFIX: "https://origin.example.test/repo/",
  PROXY_CACHE_ROOT: "/var/cache/artifacts",
  PROXY_REDIRECT_INVALID_TO: "https://search.example.test/",
};

describe("ConfigValidationService", () => {
  let service: ConfigValidationService;

  beforeEach(() => {
    service = new ConfigValidationService();
  });

  describe("loadAndValidate", () => {
    it("should apply defaults when only required keys are set", () => {
      const config = service.loadAndValidate(REQUIRED);

      expect(config).toEqual({
        backendPrefix: "https://origin.example.test/repo",
        cacheRoot: "/var/cache/artifacts",
        fileFreshnessMs: 1_209_600_000,
        indexFreshnessMs: 60_000,
        redirectInvalidTo: "https://search.example.test/",
        allowedHosts: [],
        allowedPathPrefixes: [],
        staticHandoffPaths: [],
        staticRedirectPrefix: "/static",
        upstreamConnectTimeoutMs: 300_000,
        upstreamReadTimeoutMs: 300_000,
        waitRedirectMs: 0,
        fallbackBufferMaxBytes: 8_388_608,
        sweepIntervalMs: 60_000,
      });
    });

    it("should return a frozen value", () => {
      const config = service.loadAndValidate(REQUIRED);

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.allowedHosts)).toBe(true);
    });

    it("should parse lists, durations and timeouts", () => {
      const config = service.loadAndValidate({
        ...REQUIRED,
        PROXY_ALLOWED_HOSTS: "Mirror.Example.Test, cache.example.test",
        PROXY_ALLOWED_PATH_PREFIXES: "/software/, /docs",
        PROXY_STATIC_HANDOFF_PATHS: "/software/releases/",
        PROXY_STATIC_REDIRECT_PREFIX: "/cached/",
        PROXY_CACHE_FILE_DURATION_SEC: "2592000",
        PROXY_CACHE_INDEX_DURATION_SEC: "30",
        PROXY_UPSTREAM_CONNECT_TIMEOUT_MS: "1500",
        PROXY_UPSTREAM_READ_TIMEOUT_MS: "2500",
        PROXY_WAIT_REDIRECT_SEC: "5",
        PROXY_FALLBACK_BUFFER_MAX_BYTES: "1024",
        PROXY_CACHE_SWEEP_INTERVAL_MS: "0",
      });

      expect(config.allowedHosts).toEqual(["mirror.example.test", "cache.example.test"]);
      expect(config.allowedPathPrefixes).toEqual(["/software", "/docs"]);
      expect(config.staticHandoffPaths).toEqual(["/software/releases"]);
      expect(config.staticRedirectPrefix).toBe("/cached");
      expect(config.fileFreshnessMs).toBe(2_592_000_000);
      expect(config.indexFreshnessMs).toBe(30_000);
      expect(config.upstreamConnectTimeoutMs).toBe(1500);
      expect(config.upstreamReadTimeoutMs).toBe(2500);
      expect(config.waitRedirectMs).toBe(5000);
      expect(config.fallbackBufferMaxBytes).toBe(1024);
      expect(config.sweepIntervalMs).toBe(0);
    });

    it("should fall back to the default for out-of-range numbers", () => {
      const config = service.loadAndValidate({ ...REQUIRED, PROXY_CACHE_FILE_DURATION_SEC: "0" });

      expect(config.fileFreshnessMs).toBe(1_209_600_000);
    });

    it("should report every missing required key at once", () => {
      let caught: unknown;
      try {
        service.loadAndValidate({});
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      if (!(caught instanceof ConfigError)) return;
      expect(caught.code).toBe(ErrorCode.CONFIGURATION_ERROR);
      expect(caught.problems).toEqual([
        "PROXY_BACKEND_PREFIX is required",
        "PROXY_CACHE_ROOT is required",
        "PROXY_REDIRECT_INVALID_TO is required",
      ]);
    });

    it("should reject malformed values", () => {
      expect(() =>
        service.loadAndValidate({
          PROXY_BACKEND_PREFIX: "ftp://origin.example.test",
          PROXY_CACHE_ROOT: "relative/cache",
          PROXY_REDIRECT_INVALID_TO: "//evil.example.test",
          PROXY_STATIC_HANDOFF_PATHS: "releases",
        })
      ).toThrow(
        'Invalid proxy configuration: PROXY_BACKEND_PREFIX: "ftp://origin.example.test" is not an http(s) URL; ' +
          'PROXY_CACHE_ROOT: "relative/cache" must be an absolute path; ' +
          'PROXY_REDIRECT_INVALID_TO: "//evil.example.test" must start with "/" or be an http(s) URL; ' +
          'PROXY_STATIC_HANDOFF_PATHS: "releases" must start with "/"'
      );
    });
  });

  describe("validate", () => {
    it("should warn when no host restriction is configured", () => {
      const result = service.validate(REQUIRED);

      expect(result.isValid).toBe(true);
      expect(result.warnings).toContain("PROXY_ALLOWED_HOSTS is empty: requests for any Host are proxied");
    });

    it("should warn when listings outlive files", () => {
      const result = service.validate({
        ...REQUIRED,
        PROXY_ALLOWED_HOSTS: "mirror.example.test",
        PROXY_CACHE_FILE_DURATION_SEC: "10",
        PROXY_CACHE_INDEX_DURATION_SEC: "20",
      });

      expect(result.warnings).toEqual([
        "PROXY_CACHE_INDEX_DURATION_SEC (20) exceeds PROXY_CACHE_FILE_DURATION_SEC (10)",
      ]);
    });

    it("should accept a root static prefix", () => {
      const result = service.validate({ ...REQUIRED, PROXY_STATIC_REDIRECT_PREFIX: "/" });

      expect(result.config?.staticRedirectPrefix).toBe("");
    });
  });
});

/**
 * Environment Constants - bootstrap-level settings (listen address, logging, shutdown).
 * Proxy behaviour settings are not read here; see proxy-config.ts.
 */

import { EnvironmentUtils } from "@/common/utils/environment.utils";
import { isLogLevel, type LogLevel } from "@/common/types/logging";

function parseLogLevel(): LogLevel {
  const value = EnvironmentUtils.parseString("LOG_LEVEL", "log").toLowerCase();
  if (isLogLevel(value)) {
    return value;
  }
  console.warn(`Invalid LOG_LEVEL "${value}", using default "log"`);
  return "log";
}

export const ENV_HELPERS = {
  isTest: (): boolean => ENV.APPLICATION.NODE_ENV === "test",
  isProduction: (): boolean => ENV.APPLICATION.NODE_ENV === "production",
};

export const ENV = {
  APPLICATION: {
    NODE_ENV: EnvironmentUtils.parseString("NODE_ENV", "production"),
    HOST: EnvironmentUtils.parseString("PROXY_HOST", "0.0.0.0"),
    PORT: EnvironmentUtils.parseInt("PROXY_PORT", 8181, {
      min: 1,
      max: 65535,
      fieldName: "PROXY_PORT",
    }),
  },

  LOGGING: {
    LOG_LEVEL: parseLogLevel(),
    LOG_DIRECTORY: EnvironmentUtils.parseString("LOG_DIRECTORY", "logs"),
    ENABLE_FILE_LOGGING: EnvironmentUtils.parseBoolean("ENABLE_FILE_LOGGING", false),
    ENABLE_PERFORMANCE_LOGGING: EnvironmentUtils.parseBoolean("ENABLE_PERFORMANCE_LOGGING", false),
    ENABLE_DEBUG_LOGGING: EnvironmentUtils.parseBoolean("ENABLE_DEBUG_LOGGING", false),
  },

  TIMEOUTS: {
    GRACEFUL_SHUTDOWN_MS: EnvironmentUtils.parseInt("GRACEFUL_SHUTDOWN_TIMEOUT_MS", 30000, { min: 1000, max: 300000 }),
  },
} as const;

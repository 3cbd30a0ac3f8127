import * as fs from "fs";
import * as path from "path";
import { Logger } from "@nestjs/common";
import type {
  LogMessage,
  EnhancedLogContext,
  LogParameters,
  StructuredLogEntry,
  LogLevel,
  LoggerConfig,
} from "../types/logging";
import { shouldLog } from "../types/logging";
import { ErrorLogger, type ErrorStatistics } from "./error-logger";
import { PerformanceLogger, type PerformanceStatistics } from "./performance-logger";

import { ENV } from "@/config/environment.constants";

export type CacheEvent = "hit" | "miss" | "joined" | "stored" | "unstored" | "evicted" | "swept";

export function loggerConfigFromEnv(): LoggerConfig {
  return {
    enableFileLogging: ENV.LOGGING.ENABLE_FILE_LOGGING,
    enablePerformanceLogging: ENV.LOGGING.ENABLE_PERFORMANCE_LOGGING,
    enableDebugLogging: ENV.LOGGING.ENABLE_DEBUG_LOGGING,
    logDirectory: path.join(process.cwd(), ENV.LOGGING.LOG_DIRECTORY),
    level: ENV.LOGGING.LOG_LEVEL,
  };
}

/**
 * Structured logger with optional JSON-lines file output, error history and operation timers.
 */
export class EnhancedLoggerService {
  private readonly logger: Logger;
  private readonly errorLogger: ErrorLogger;
  private readonly performanceLogger: PerformanceLogger;

  constructor(
    context: string = "EnhancedLogger",
    private readonly config: LoggerConfig = loggerConfigFromEnv()
  ) {
    this.logger = new Logger(context);

    this.initializeLogDirectory();

    this.errorLogger = new ErrorLogger(context, config.logDirectory, 1000, config.enableFileLogging);
    this.performanceLogger = new PerformanceLogger(
      context,
      config.logDirectory,
      config.enablePerformanceLogging,
      config.enableFileLogging
    );
  }

  log(message: LogMessage, context?: EnhancedLogContext, ...optionalParams: LogParameters): void {
    this.emit("log", message, context, optionalParams);
  }

  /**
   * Error objects go through the error history so they show up in statistics
   */
  error(message: LogMessage, context?: EnhancedLogContext, ...optionalParams: LogParameters): void {
    if (!shouldLog("error", this.config.level)) {
      return;
    }
    if (message instanceof Error) {
      this.errorLogger.logError(message, context);
      return;
    }
    this.emit("error", message, context, optionalParams);
  }

  warn(message: LogMessage, context?: EnhancedLogContext, ...optionalParams: LogParameters): void {
    this.emit("warn", message, context, optionalParams);
  }

  debug(message: LogMessage, context?: EnhancedLogContext, ...optionalParams: LogParameters): void {
    if (!this.config.enableDebugLogging) {
      return;
    }
    this.emit("debug", message, context, optionalParams);
  }

  verbose(message: LogMessage, context?: EnhancedLogContext, ...optionalParams: LogParameters): void {
    this.emit("verbose", message, context, optionalParams);
  }

  fatal(message: LogMessage, context?: EnhancedLogContext, ...optionalParams: LogParameters): void {
    this.emit("fatal", message, context, optionalParams);
  }

  startPerformanceTimer(
    operationId: string,
    operation: string,
    component: string,
    metadata?: Record<string, unknown>
  ): void {
    this.performanceLogger.startTimer(operationId, operation, component, metadata);
  }

  endPerformanceTimer(operationId: string, success = true, additionalMetadata?: Record<string, unknown>): void {
    this.performanceLogger.endTimer(operationId, success, additionalMetadata);
  }

  /**
   * Startup, shutdown and sanitisation steps; also written to audit.log
   */
  logCriticalOperation(operation: string, component: string, details: Record<string, unknown>, success = true): void {
    const context: EnhancedLogContext = {
      component,
      operation,
      severity: success ? "low" : "high",
      metadata: details,
    };

    const message = `Critical Operation: ${operation} ${success ? "completed successfully" : "failed"}`;
    if (success) {
      this.log(message, context);
    } else {
      this.error(message, context);
    }

    if (this.config.enableFileLogging) {
      this.appendLine("audit.log", {
        timestamp: new Date().toISOString(),
        operation,
        component,
        success,
        details,
        pid: process.pid,
      });
    }
  }

  logCacheEvent(event: CacheEvent, key: string, details?: Record<string, unknown>): void {
    const context: EnhancedLogContext = {
      component: "DiskCache",
      operation: `cache_${event}`,
      metadata: { key, ...details },
    };

    if (event === "unstored") {
      this.warn(`Cache ${event}: ${key}`, context);
    } else {
      this.debug(`Cache ${event}: ${key}`, context);
    }
  }

  logUpstreamFetch(url: string, outcome: "ok" | "failed", details?: Record<string, unknown>): void {
    const context: EnhancedLogContext = {
      component: "Upstream",
      operation: "upstream_fetch",
      metadata: { url, ...details },
    };

    if (outcome === "ok") {
      this.log(`Upstream fetch ok: ${url}`, context);
    } else {
      this.warn(`Upstream fetch failed: ${url}`, context);
    }
  }

  getErrorStatistics(): ErrorStatistics {
    return this.errorLogger.getStatistics();
  }

  getPerformanceStatistics(): PerformanceStatistics {
    return this.performanceLogger.getStatistics();
  }

  private emit(
    level: LogLevel,
    message: LogMessage,
    context: EnhancedLogContext | undefined,
    optionalParams: LogParameters
  ): void {
    if (!shouldLog(level, this.config.level)) {
      return;
    }

    const entry = this.createLogEntry(level, message, context, optionalParams);
    switch (level) {
      case "fatal":
        this.logger.error(`[FATAL] ${entry.message}`, entry.context);
        break;
      case "error":
        this.logger.error(entry.message, entry.context);
        break;
      case "warn":
        this.logger.warn(entry.message, entry.context);
        break;
      case "debug":
        this.logger.debug(entry.message, entry.context);
        break;
      case "verbose":
        this.logger.verbose(entry.message, entry.context);
        break;
      default:
        this.logger.log(entry.message, entry.context);
    }

    if (this.config.enableFileLogging) {
      this.appendLine(level === "debug" ? "debug.log" : "application.log", {
        ...entry,
        timestamp: new Date(entry.timestamp).toISOString(),
      });
    }
  }

  private createLogEntry(
    level: LogLevel,
    message: LogMessage,
    context?: EnhancedLogContext,
    optionalParams?: LogParameters
  ): StructuredLogEntry {
    const hasParams = optionalParams !== undefined && optionalParams.length > 0;
    const logContext: EnhancedLogContext = {
      pid: process.pid,
      ...context,
    };
    if (hasParams) {
      logContext.additionalParams = optionalParams;
    }

    return {
      level,
      message: typeof message === "string" ? message : message.message,
      timestamp: Date.now(),
      context: logContext,
      data: hasParams ? { additionalParams: optionalParams } : undefined,
    };
  }

  private initializeLogDirectory(): void {
    if (!this.config.enableFileLogging) {
      return;
    }

    try {
      fs.mkdirSync(this.config.logDirectory, { recursive: true });
    } catch (error) {
      this.logger.error("Failed to create log directory:", error);
    }
  }

  private appendLine(fileName: string, record: Record<string, unknown>): void {
    try {
      fs.appendFileSync(path.join(this.config.logDirectory, fileName), JSON.stringify(record) + "\n");
    } catch (error) {
      // Not routed through this.logger: a failing log file must not recurse
      console.error(`Failed to write to ${fileName}:`, error);
    }
  }
}

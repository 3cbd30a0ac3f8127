import { Logger } from "@nestjs/common";
import { EnhancedLoggerService, type CacheEvent } from "../../logging/enhanced-logger.service";
import type { MixinBase } from "../../types/services/mixins";

/**
 * Logging capabilities interface
 */
export interface LoggingCapabilities {
  readonly logger: Logger;
  enhancedLogger?: EnhancedLoggerService;
  initializeEnhancedLogging(useEnhancedLogging: boolean): void;
  logInitialization(message?: string): void;
  logShutdown(message?: string): void;
  logPerformance(operation: string, duration: number, threshold?: number): void;
  logError(error: Error, context?: string, additionalData?: Record<string, unknown>): void;
  logWarning(message: string, context?: string, additionalData?: Record<string, unknown>): void;
  logDebug(message: string, context?: string, additionalData?: unknown): void;
  logCriticalOperation(operation: string, details: Record<string, unknown>, success?: boolean): void;
  logCacheEvent(event: CacheEvent, key: string, details?: Record<string, unknown>): void;
  logUpstreamFetch(url: string, outcome: "ok" | "failed", details?: Record<string, unknown>): void;
  startPerformanceTimer(operationId: string, operation: string, metadata?: Record<string, unknown>): void;
  endPerformanceTimer(operationId: string, success?: boolean, additionalMetadata?: Record<string, unknown>): void;
}

/**
 * Mixin that adds logging capabilities to a service
 */
export function WithLogging<TBase extends MixinBase>(Base: TBase) {
  abstract class LoggingMixin extends Base implements LoggingCapabilities {
    public readonly logger: Logger;
    public enhancedLogger?: EnhancedLoggerService;

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
      this.logger = new Logger(this.constructor.name);
    }

    initializeEnhancedLogging(useEnhancedLogging: boolean): void {
      this.enhancedLogger = useEnhancedLogging ? new EnhancedLoggerService(this.constructor.name) : undefined;
    }

    logInitialization(message?: string): void {
      this.logger.log(message ?? `${this.constructor.name} initialized`);
    }

    logShutdown(message?: string): void {
      this.logger.log(message ?? `${this.constructor.name} shutting down`);
    }

    logPerformance(operation: string, duration: number, threshold = 1000): void {
      if (duration > threshold) {
        this.logger.warn(`Performance warning: ${operation} took ${duration}ms (threshold: ${threshold}ms)`);
      } else {
        this.logger.debug(`${operation} completed in ${duration}ms`);
      }
    }

    logError(error: Error, context?: string, additionalData?: Record<string, unknown>): void {
      if (this.enhancedLogger) {
        this.enhancedLogger.error(error, { component: this.constructor.name, operation: context, ...additionalData });
        return;
      }
      const contextMessage = context ? `[${context}] ` : "";
      if (additionalData) {
        this.logger.error(`${contextMessage}${error.message}`, error.stack, additionalData);
      } else {
        this.logger.error(`${contextMessage}${error.message}`, error.stack);
      }
    }

    logWarning(message: string, context?: string, additionalData?: Record<string, unknown>): void {
      const contextMessage = context ? `[${context}] ` : "";
      if (additionalData) {
        this.logger.warn(`${contextMessage}${message}`, additionalData);
      } else {
        this.logger.warn(`${contextMessage}${message}`);
      }
    }

    logDebug(message: string, context?: string, additionalData?: unknown): void {
      const contextMessage = context ? `[${context}] ` : "";
      if (additionalData !== undefined) {
        this.logger.debug(`${contextMessage}${message}`, additionalData);
      } else {
        this.logger.debug(`${contextMessage}${message}`);
      }
    }

    logCriticalOperation(operation: string, details: Record<string, unknown>, success = true): void {
      if (this.enhancedLogger) {
        this.enhancedLogger.logCriticalOperation(operation, this.constructor.name, details, success);
        return;
      }
      const message = `Critical Operation: ${operation} ${success ? "completed successfully" : "failed"}`;
      if (success) {
        this.logger.log(message, details);
      } else {
        this.logger.error(message, details);
      }
    }

    /**
     * Unstored fills warn; every other event is debug output
     */
    logCacheEvent(event: CacheEvent, key: string, details?: Record<string, unknown>): void {
      if (this.enhancedLogger) {
        this.enhancedLogger.logCacheEvent(event, key, details);
        return;
      }
      const message = `Cache ${event}: ${key}`;
      const write = event === "unstored" ? this.logger.warn.bind(this.logger) : this.logger.debug.bind(this.logger);
      if (details) {
        write(message, details);
      } else {
        write(message);
      }
    }

    logUpstreamFetch(url: string, outcome: "ok" | "failed", details?: Record<string, unknown>): void {
      if (this.enhancedLogger) {
        this.enhancedLogger.logUpstreamFetch(url, outcome, details);
        return;
      }
      const message = `Upstream fetch ${outcome}: ${url}`;
      const write = outcome === "ok" ? this.logger.log.bind(this.logger) : this.logger.warn.bind(this.logger);
      if (details) {
        write(message, details);
      } else {
        write(message);
      }
    }

    startPerformanceTimer(operationId: string, operation: string, metadata?: Record<string, unknown>): void {
      this.enhancedLogger?.startPerformanceTimer(operationId, operation, this.constructor.name, metadata);
    }

    endPerformanceTimer(operationId: string, success = true, additionalMetadata?: Record<string, unknown>): void {
      this.enhancedLogger?.endPerformanceTimer(operationId, success, additionalMetadata);
    }
  }

  return LoggingMixin;
}

import type { MixinBase } from "../../types/services/mixins";
import type { LoggingCapabilities } from "./logging.mixin";

export interface HandleErrorOptions {
  shouldThrow?: boolean;
  shouldLog?: boolean;
  threshold?: number;
  additionalData?: Record<string, unknown>;
}

/**
 * Error handling capabilities
 */
export interface ErrorHandlingCapabilities {
  handleError(error: Error, context: string, options?: HandleErrorOptions): void;
  getErrorCount(context: string): number;
  getLastError(context: string): { error: Error; timestamp: number } | undefined;
  resetErrorTracking(context?: string): void;
}

/**
 * Mixin that counts and logs failures per operation context
 */
export function WithErrorHandling<TBase extends MixinBase<LoggingCapabilities>>(Base: TBase) {
  abstract class ErrorHandlingMixin extends Base implements ErrorHandlingCapabilities {
    public errorCounts = new Map<string, number>();
    public lastErrors = new Map<string, { error: Error; timestamp: number }>();

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
    }

    /**
     * Throws `error` back unless `shouldThrow` is false
     */
    handleError(error: Error, context: string, options: HandleErrorOptions = {}): void {
      const { shouldThrow = true, shouldLog = true, threshold, additionalData } = options;

      const count = (this.errorCounts.get(context) ?? 0) + 1;
      this.errorCounts.set(context, count);
      this.lastErrors.set(context, { error, timestamp: Date.now() });

      if (shouldLog) {
        this.logError(error, context, additionalData);
      }

      if (threshold !== undefined && count >= threshold) {
        this.logger.error(`Error threshold exceeded for ${context}: ${count} errors (threshold ${threshold})`);
      }

      if (shouldThrow) {
        throw error;
      }
    }

    getErrorCount(context: string): number {
      return this.errorCounts.get(context) ?? 0;
    }

    getLastError(context: string): { error: Error; timestamp: number } | undefined {
      return this.lastErrors.get(context);
    }

    resetErrorTracking(context?: string): void {
      if (context) {
        this.errorCounts.delete(context);
        this.lastErrors.delete(context);
      } else {
        this.errorCounts.clear();
        this.lastErrors.clear();
      }
    }
  }

  return ErrorHandlingMixin;
}

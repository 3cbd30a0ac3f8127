/**
 * Error Logger
 * Keeps a bounded history of failures and writes them to errors.log when file logging is on.
 */

import * as fs from "fs";
import * as path from "path";
import { Logger } from "@nestjs/common";
import type { ErrorLogEntry, LogContext } from "../types/logging";
import { ErrorCode, ErrorSeverity } from "../types/error-handling";
import { ProxyError, errnoCode } from "../errors/proxy.errors";

function isErrorSeverity(value: unknown): value is ErrorSeverity {
  return Object.values(ErrorSeverity).some(severity => severity === value);
}

export interface ErrorStatistics {
  totalErrors: number;
  errorsBySeverity: Record<string, number>;
  errorsByCode: Record<string, number>;
  errorsByComponent: Record<string, number>;
  recentErrors: ErrorLogEntry[];
}

export class ErrorLogger {
  private readonly logger: Logger;
  private readonly errorHistory: ErrorLogEntry[] = [];
  private readonly errorLogFile: string;

  constructor(
    context: string,
    logDirectory: string,
    private readonly maxErrorHistory = 1000,
    private readonly enableFileLogging = false
  ) {
    this.logger = new Logger(`${context}:Error`);
    this.errorLogFile = path.join(logDirectory, "errors.log");
  }

  logError(error: Error, context: LogContext = {}): ErrorLogEntry {
    const entry: ErrorLogEntry = {
      error,
      context,
      stackTrace: error.stack ?? "No stack trace available",
      timestamp: Date.now(),
      severity: this.determineSeverity(error, context),
      recoverable: error instanceof ProxyError ? error.retryable : true,
      errorCode: this.determineCode(error),
      errorType: error.name,
    };

    this.errorHistory.push(entry);
    if (this.errorHistory.length > this.maxErrorHistory) {
      this.errorHistory.shift();
    }

    const message = this.formatErrorMessage(entry);
    if (entry.severity === ErrorSeverity.LOW || entry.severity === ErrorSeverity.MEDIUM) {
      this.logger.warn(message);
    } else {
      this.logger.error(message, entry.stackTrace);
    }

    if (this.enableFileLogging) {
      this.writeToFile(entry);
    }
    return entry;
  }

  /**
   * Counts over the whole history; `recentErrors` covers the last hour
   */
  getStatistics(): ErrorStatistics {
    const errorsBySeverity: Record<string, number> = {};
    const errorsByCode: Record<string, number> = {};
    const errorsByComponent: Record<string, number> = {};
    const oneHourAgo = Date.now() - 3_600_000;

    for (const entry of this.errorHistory) {
      errorsBySeverity[entry.severity] = (errorsBySeverity[entry.severity] ?? 0) + 1;
      errorsByCode[entry.errorCode] = (errorsByCode[entry.errorCode] ?? 0) + 1;
      const component = entry.context.component ?? "unknown";
      errorsByComponent[component] = (errorsByComponent[component] ?? 0) + 1;
    }

    return {
      totalErrors: this.errorHistory.length,
      errorsBySeverity,
      errorsByCode,
      errorsByComponent,
      recentErrors: this.errorHistory.filter(entry => entry.timestamp > oneHourAgo),
    };
  }

  clearHistory(): void {
    this.errorHistory.length = 0;
  }

  private determineSeverity(error: Error, context: LogContext): ErrorSeverity {
    if (error instanceof ProxyError) {
      return error.severity;
    }
    if (isErrorSeverity(context.severity)) {
      return context.severity;
    }
    // Unclassified failures are bugs until proven otherwise
    return ErrorSeverity.HIGH;
  }

  private determineCode(error: Error): string {
    if (error instanceof ProxyError) {
      return error.code;
    }
    return errnoCode(error) ?? ErrorCode.UNKNOWN_ERROR;
  }

  private formatErrorMessage(entry: ErrorLogEntry): string {
    const { error, context, severity, recoverable, errorCode, errorType } = entry;

    let message = `[${severity.toUpperCase()}] ${error.message} (Code: ${errorCode}) (Type: ${errorType})`;
    if (context.component) {
      message += ` [Component: ${context.component}]`;
    }
    if (context.operation) {
      message += ` [Operation: ${context.operation}]`;
    }
    message += ` [Recoverable: ${recoverable ? "Yes" : "No"}]`;
    return message;
  }

  private writeToFile(entry: ErrorLogEntry): void {
    try {
      const logLine =
        JSON.stringify({
          message: entry.error.message,
          errorCode: entry.errorCode,
          errorType: entry.errorType,
          severity: entry.severity,
          recoverable: entry.recoverable,
          context: entry.context,
          stackTrace: entry.stackTrace,
          timestamp: new Date(entry.timestamp).toISOString(),
        }) + "\n";

      fs.appendFileSync(this.errorLogFile, logLine);
    } catch (error) {
      console.error("Failed to write error to log file:", error);
    }
  }
}

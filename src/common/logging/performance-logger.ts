/**
 * Performance Logger
 * Times named operations (upstream fetches, cache sweeps) and reports durations.
 */

import * as fs from "fs";
import * as path from "path";
import { Logger } from "@nestjs/common";
import type { PerformanceLogEntry } from "../types/logging";

export interface PerformanceStatistics {
  activeOperations: number;
  completedOperations: number;
  failedOperations: number;
  averageOperationTime: number;
}

export class PerformanceLogger {
  private readonly logger: Logger;
  private readonly activeEntries = new Map<string, PerformanceLogEntry>();
  private readonly performanceLogFile: string;
  private completedOperations = 0;
  private failedOperations = 0;
  private totalDuration = 0;

  constructor(
    context: string,
    logDirectory: string,
    private readonly enablePerformanceLogging = true,
    private readonly enableFileLogging = false
  ) {
    this.logger = new Logger(`${context}:Performance`);
    this.performanceLogFile = path.join(logDirectory, "performance.log");
  }

  startTimer(operationId: string, operation: string, component: string, metadata?: Record<string, unknown>): void {
    if (!this.enablePerformanceLogging) {
      return;
    }

    const startTime = performance.now();
    this.activeEntries.set(operationId, {
      operation,
      component,
      startTime,
      endTime: 0,
      duration: 0,
      success: false,
      timestamp: Date.now(),
      metadata,
    });

    this.logger.debug(`Performance timer started: ${operation} (${operationId})`);
  }

  /**
   * Returns the finished entry, or undefined when no timer was running under that id
   */
  endTimer(
    operationId: string,
    success = true,
    additionalMetadata?: Record<string, unknown>
  ): PerformanceLogEntry | undefined {
    if (!this.enablePerformanceLogging) {
      return undefined;
    }

    const entry = this.activeEntries.get(operationId);
    if (!entry) {
      this.logger.warn(`Performance timer not found for operation: ${operationId}`);
      return undefined;
    }
    this.activeEntries.delete(operationId);

    entry.endTime = performance.now();
    entry.duration = entry.endTime - entry.startTime;
    entry.success = success;
    if (additionalMetadata) {
      entry.metadata = { ...entry.metadata, ...additionalMetadata };
    }

    this.completedOperations++;
    this.totalDuration += entry.duration;
    if (!success) {
      this.failedOperations++;
    }

    const message = `Performance: ${entry.operation} completed in ${entry.duration.toFixed(2)}ms`;
    if (success) {
      this.logger.log(message);
    } else {
      this.logger.warn(`${message} (FAILED)`);
    }

    if (this.enableFileLogging) {
      this.writeToFile(entry);
    }
    return entry;
  }

  getStatistics(): PerformanceStatistics {
    return {
      activeOperations: this.activeEntries.size,
      completedOperations: this.completedOperations,
      failedOperations: this.failedOperations,
      averageOperationTime: this.completedOperations === 0 ? 0 : this.totalDuration / this.completedOperations,
    };
  }

  private writeToFile(entry: PerformanceLogEntry): void {
    try {
      const logLine =
        JSON.stringify({
          ...entry,
          timestamp: new Date(entry.timestamp).toISOString(),
        }) + "\n";

      fs.appendFileSync(this.performanceLogFile, logLine);
    } catch (error) {
      console.error("Failed to write performance log:", error);
    }
  }
}

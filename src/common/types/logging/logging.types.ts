import type { LogLevel as NestLogLevel } from "@nestjs/common";
import type { ErrorSeverity } from "../error-handling/error.types";

export type LogLevel = NestLogLevel;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  log: 3,
  debug: 4,
  verbose: 5,
};

const ALL_LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "log", "debug", "verbose"];

export function isLogLevel(value: string): value is LogLevel {
  return ALL_LOG_LEVELS.some(level => level === value);
}

/**
 * True when `messageLevel` is at least as severe as `currentLevel`
 */
export function shouldLog(messageLevel: LogLevel, currentLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[messageLevel] <= LOG_LEVEL_PRIORITY[currentLevel];
}

/**
 * Every level at or above `level`, in the shape NestFactory expects for its `logger` option
 */
export function enabledLogLevels(level: LogLevel): LogLevel[] {
  return ALL_LOG_LEVELS.filter(candidate => shouldLog(candidate, level));
}

export type SeverityLevel = "low" | "medium" | "high" | "critical" | "fatal";

export interface IContext {
  component?: string;
  operation?: string;
}

export interface LogContext extends IContext {
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: LogContext;
  timestamp: number;
}

/**
 * One timed operation; times are `performance.now()` values, durations in ms
 */
export interface PerformanceLogEntry {
  operation: string;
  duration: number;
  startTime: number;
  endTime: number;
  component: string;
  success: boolean;
  timestamp: number;
  metadata?: Record<string, unknown>;
}

export type LogMessage = string | Error;

export interface EnhancedLogContext extends IContext {
  severity?: SeverityLevel;
  metadata?: Record<string, unknown>;
  additionalParams?: unknown[];
  [key: string]: unknown;
}

export type LogParameters = unknown[];

export interface StructuredLogEntry extends LogEntry {
  data?: Record<string, unknown>;
}

/**
 * A logged error together with what the proxy knows about it
 */
export interface ErrorLogEntry {
  error: Error;
  context: LogContext;
  stackTrace: string;
  timestamp: number;
  severity: ErrorSeverity;
  recoverable: boolean;
  errorCode: string;
  errorType: string;
}

export interface LoggerConfig {
  enableFileLogging: boolean;
  enablePerformanceLogging: boolean;
  enableDebugLogging: boolean;
  logDirectory: string;
  level: LogLevel;
}

/**
 * Jest Test Setup
 *
 * Silences console and Nest logger output unless a test enables it.
 */

import { isTestLoggingEnabled, disableLoggingForTest } from "./utils/test-logging.helpers";

process.env.NODE_ENV = "test";

const originalConsole = {
  error: console.error,
  warn: console.warn,
  log: console.log,
  debug: console.debug,
};

const createConsoleOverride =
  (originalMethod: typeof console.error) =>
  (...args: unknown[]): void => {
    if (isTestLoggingEnabled()) {
      originalMethod(...args);
    }
  };

console.error = createConsoleOverride(originalConsole.error);
console.warn = createConsoleOverride(originalConsole.warn);
console.log = createConsoleOverride(originalConsole.log);
console.debug = createConsoleOverride(originalConsole.debug);

// Nest's ConsoleLogger writes to the streams directly
const originalStdoutWrite = process.stdout.write.bind(process.stdout);
const originalStderrWrite = process.stderr.write.bind(process.stderr);

const createStreamOverride =
  (originalWrite: typeof process.stdout.write): typeof process.stdout.write =>
  (chunk: string | Uint8Array, encodingOrCallback?: unknown, callback?: unknown): boolean => {
    if (isTestLoggingEnabled()) {
      return originalWrite(chunk);
    }
    if (typeof encodingOrCallback === "function") encodingOrCallback();
    else if (typeof callback === "function") callback();
    return true;
  };

process.stdout.write = createStreamOverride(originalStdoutWrite);
process.stderr.write = createStreamOverride(originalStderrWrite);

afterEach(() => {
  disableLoggingForTest();
});

afterAll(() => {
  console.error = originalConsole.error;
  console.warn = originalConsole.warn;
  console.log = originalConsole.log;
  console.debug = originalConsole.debug;
  process.stdout.write = originalStdoutWrite;
  process.stderr.write = originalStderrWrite;
});

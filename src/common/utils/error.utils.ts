/**
 * Error Utilities
 */

/**
 * Narrows a caught value to an Error, wrapping anything else
 */
export function asError(e: unknown): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`Non-error value thrown: ${safeStringify(e)}`);
}

/** Returns error message including stack trace and the `cause` error, if defined. */
export function errorString(error: unknown): string {
  if (error instanceof Error) {
    const errorDetails = (e: Error) => (e.stack ? `\n${e.stack}` : e.message);
    const cause = error.cause instanceof Error ? `\n[Caused by]: ${errorDetails(error.cause)}` : "";
    return errorDetails(error) + cause;
  }
  return `Caught a non-error object: ${safeStringify(error)}`;
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

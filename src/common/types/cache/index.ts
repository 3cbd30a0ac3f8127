/**
 * Unified index for disk cache type definitions.
 */

export * from "./cache.types";

/**
 * Upstream fetch and coalescing type definitions.
 */

export * from "./fetch.types";

/**
 * Request routing type definitions.
 */

export * from "./routing.types";

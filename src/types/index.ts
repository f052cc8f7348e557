/**
 * Shared types for Strata
 */

export * from "./result.js";

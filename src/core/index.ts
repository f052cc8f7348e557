/**
 * Core module - everything the CLI and embedding query engines use
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./documents/index.js";
export * from "./definitions/index.js";
export * from "./records/index.js";
export * from "./schema/index.js";
export * from "./adapter/index.js";
export * from "./router/index.js";
export * from "./sources/index.js";
export * from "./interfaces/index.js";
export * from "./config.js";
export * from "./runtime.js";

// Re-export types
export * from "../types/index.js";

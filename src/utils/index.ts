/**
 * Shared utilities
 */

import * as path from "node:path";

// Re-export logger module
export * from "./logger.js";

// Re-export file system utilities
export * from "./fs.js";

// Re-export validation schemas
export * from "./validation.js";

// =============================================================================
// Configuration Paths
// =============================================================================

export const CONFIG_FILE = "strata.kdl";
export const DEFINITIONS_DIR = "definitions";

export function getDefinitionsDir(rootFolder: string, definitionsFolder: string = DEFINITIONS_DIR): string {
  return path.resolve(rootFolder, definitionsFolder);
}

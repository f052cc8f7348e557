/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration at runtime.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Configuration Schema
// =============================================================================

export const PaperlessConfigSchema = z
  .object({
    /** Base URL of the Paperless-ngx server */
    url: z.string().url(),
    /** API token; STRATA_PAPERLESS_TOKEN takes precedence */
    token: z.string().min(1).optional(),
  })
  .strict();

/**
 * Shape of `strata.kdl` after its nodes are read into an object
 */
export const StrataConfigSchema = z
  .object({
    /** Folder holding record documents */
    root_folder: z.string().min(1),
    /** Definitions folder, relative to root_folder */
    definitions_folder: z.string().min(1).default("definitions"),
    paperless: PaperlessConfigSchema.optional(),
  })
  .strict();

export type StrataConfigInput = z.infer<typeof StrataConfigSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

export type ValidationResult<T> = { success: true; data: T } | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

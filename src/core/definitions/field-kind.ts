/**
 * Field Kinds
 *
 * The constraint a definition puts on a field's value.
 *
 * @module
 */

import { err, ok, type Result } from "../../types/result.js";
import type { KdlPrimitive } from "../documents/index.js";

export type FieldKind =
  | { readonly type: "string" }
  | { readonly type: "path" }
  | { readonly type: "oneOf"; readonly options: readonly string[] };

/**
 * Kind names accepted by `is="…"`, matched case-insensitively
 */
export const NAMED_FIELD_KINDS = ["string", "path"] as const;

export type NamedFieldKind = (typeof NAMED_FIELD_KINDS)[number];

function isNamedFieldKind(value: string): value is NamedFieldKind {
  return NAMED_FIELD_KINDS.some((kind) => kind === value);
}

/**
 * Resolves the name given to `is`. Returns null for unknown names.
 */
export function fieldKindFromName(name: string): FieldKind | null {
  const normalized = name.toLowerCase();
  if (!isNamedFieldKind(normalized)) return null;
  return normalized === "path" ? { type: "path" } : { type: "string" };
}

/**
 * Checks a value against a field kind. The error is a hint for the user.
 */
export function validateFieldValue(kind: FieldKind, value: KdlPrimitive): Result<void, string> {
  switch (kind.type) {
    case "string":
    case "path":
      return typeof value === "string" ? ok(undefined) : err("Expected a string here");
    case "oneOf":
      return typeof value === "string" && kind.options.includes(value)
        ? ok(undefined)
        : err(`Expected one of: ${kind.options.join(", ")}`);
  }
}

/**
 * Whether a field of this kind is exposed as an edge rather than a property
 */
export function isEdgeKind(kind: FieldKind): boolean {
  return kind.type === "path";
}

export function describeFieldKind(kind: FieldKind): string {
  switch (kind.type) {
    case "string":
      return "string";
    case "path":
      return "path";
    case "oneOf":
      return `oneOf(${kind.options.map((option) => JSON.stringify(option)).join(", ")})`;
  }
}

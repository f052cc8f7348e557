/**
 * Scalar Values
 *
 * The value of a record field, tagged with the KDL type it was written as.
 *
 * @module
 */

import type { KdlPrimitive } from "../documents/index.js";

export type ScalarValue =
  | { readonly type: "boolean"; readonly value: boolean }
  | { readonly type: "integer"; readonly value: number }
  | { readonly type: "float"; readonly value: number }
  | { readonly type: "string"; readonly value: string }
  | { readonly type: "null" };

export function scalarFromPrimitive(value: KdlPrimitive): ScalarValue {
  if (value === null) return { type: "null" };
  if (typeof value === "boolean") return { type: "boolean", value };
  if (typeof value === "string") return { type: "string", value };
  return Number.isInteger(value) ? { type: "integer", value } : { type: "float", value };
}

export function scalarToPrimitive(scalar: ScalarValue): KdlPrimitive {
  return scalar.type === "null" ? null : scalar.value;
}

/**
 * Returns the text of a string scalar, or null for any other type
 */
export function scalarAsString(scalar: ScalarValue): string | null {
  return scalar.type === "string" ? scalar.value : null;
}

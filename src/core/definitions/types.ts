/**
 * Definition Types
 *
 * @module
 */

import type { SourceSpan } from "../errors.js";
import type { FieldKind } from "./field-kind.js";
import type { Timestamp } from "./timestamp.js";

/**
 * One version of a record kind's field shape, in effect from `since` on
 */
export interface Definition {
  readonly kind: string;
  readonly since: Timestamp;
  /** Declared fields, in declaration order */
  readonly fields: ReadonlyMap<string, FieldKind>;
  /** Span of the `define` node this version was read from */
  readonly span: SourceSpan | null;
}

/**
 * Field names that records use for their own metadata
 */
export const RESERVED_FIELD_NAMES: ReadonlySet<string> = new Set(["at", "kind", "_at", "_kind"]);

const SCHEMA_NAME_PATTERN = /^[_A-Za-z][_0-9A-Za-z]*$/;

/**
 * Kind and field names become schema type and field names, so they follow
 * the schema's identifier rules. Names starting with `__` are reserved there.
 */
export function isValidSchemaName(name: string): boolean {
  return SCHEMA_NAME_PATTERN.test(name) && !name.startsWith("__");
}

/**
 * Schema Synthesizer
 *
 * Builds the schema description from the loaded definitions. Each kind gets
 * one type, shaped by its first (oldest) version, so later versions change
 * what records may carry but never the exposed schema.
 *
 * @module
 */

import type { DefinitionStore, FieldKind } from "../definitions/index.js";
import {
  field,
  listOf,
  named,
  type FieldSpec,
  type SchemaDescription,
  type TypeRef,
  type TypeSpec,
} from "./schema-description.js";

// =============================================================================
// Names
// =============================================================================

export const KIND_TYPE_PREFIX = "rec_";

export const RECORD_INTERFACE = "Record";
export const PATH_INTERFACE = "Path";
export const FILE_TYPE = "File";
export const DIRECTORY_TYPE = "Directory";
export const DOCUMENT_TYPE = "PaperlessDocument";

export const RECORDS_ENTRY_POINT = "Records";
export const DOCUMENT_ENTRY_POINT = "Document";

/**
 * The type a kind is exposed as
 */
export function kindTypeName(kind: string): string {
  return `${KIND_TYPE_PREFIX}${kind}`;
}

/**
 * The kind behind a synthesized type name, or null for other types
 */
export function kindFromTypeName(typeName: string): string | null {
  return typeName.startsWith(KIND_TYPE_PREFIX) ? typeName.slice(KIND_TYPE_PREFIX.length) : null;
}

// =============================================================================
// Built-in Types
// =============================================================================

const RECORD_FIELDS: FieldSpec[] = [field("_at", named("String", true)), field("_kind", named("String", true))];

const PATH_FIELDS: FieldSpec[] = [
  field("path", named("String", true)),
  field("exists", named("Boolean", true)),
  field("basename", named("String")),
];

export const BUILTIN_TYPES: readonly TypeSpec[] = [
  { kind: "interface", name: RECORD_INTERFACE, implements: [], fields: RECORD_FIELDS },
  { kind: "interface", name: PATH_INTERFACE, implements: [], fields: PATH_FIELDS },
  {
    kind: "object",
    name: FILE_TYPE,
    implements: [PATH_INTERFACE],
    fields: [...PATH_FIELDS, field("extension", named("String"))],
  },
  {
    kind: "object",
    name: DIRECTORY_TYPE,
    implements: [PATH_INTERFACE],
    fields: [...PATH_FIELDS, field("Children", listOf(PATH_INTERFACE, true, false))],
  },
  {
    kind: "object",
    name: DOCUMENT_TYPE,
    implements: [],
    fields: [
      field("id", named("Int", true)),
      field("title", named("String", true)),
      field("content", named("String", true)),
      field("created", named("String", true)),
      field("added", named("String")),
      field("archive_serial_number", named("Int")),
    ],
  },
];

export const ROOT_FIELDS: readonly FieldSpec[] = [
  field(RECORDS_ENTRY_POINT, listOf(RECORD_INTERFACE, true, true)),
  field(DOCUMENT_ENTRY_POINT, named(DOCUMENT_TYPE), [{ name: "id", type: named("Int", true) }]),
];

// =============================================================================
// Synthesis
// =============================================================================

function fieldType(kind: FieldKind): TypeRef {
  switch (kind.type) {
    case "string":
    case "oneOf":
      // The allowed values are checked when records are parsed
      return named("String", true);
    case "path":
      return named(PATH_INTERFACE);
  }
}

function kindType(store: DefinitionStore, kind: string): TypeSpec {
  const first = store.first(kind);
  const declared = [...first.fields].map(([name, fieldKind]) => field(name, fieldType(fieldKind)));

  return {
    kind: "object",
    name: kindTypeName(kind),
    implements: [RECORD_INTERFACE],
    fields: [...RECORD_FIELDS, ...declared],
  };
}

/**
 * Describes the schema for a definition store. Pure: the same store always
 * gives an equal description.
 */
export function synthesizeSchema(store: DefinitionStore): SchemaDescription {
  return {
    roots: ROOT_FIELDS,
    types: [...BUILTIN_TYPES, ...store.kinds().map((kind) => kindType(store, kind))],
  };
}

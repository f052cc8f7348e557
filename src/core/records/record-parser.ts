/**
 * Record Parser
 *
 * Parses record documents, one record per node:
 *
 * ```kdl
 * task "2021-06-01" {
 *     title "Write report"
 *     status "open"
 * }
 * ```
 *
 * Each given value is checked against the definition version active at the
 * record's timestamp. Fields the version declares but the record omits are
 * not reported.
 *
 * @module
 */

import { DiagnosticError, ErrorCode } from "../errors.js";
import { parseKdlDocument, describePrimitive, type DocNode } from "../documents/index.js";
import {
  parseTimestamp,
  validateFieldValue,
  type DefinitionStore,
  type Definition,
  type Timestamp,
} from "../definitions/index.js";
import { scalarFromPrimitive, type ScalarValue } from "./scalar.js";
import type { KindRecord } from "./types.js";

function parseRecordTimestamp(node: DocNode): Timestamp {
  const entry = node.args[0];
  if (!entry) {
    throw new DiagnosticError(
      "A record needs its timestamp as the first argument.",
      ErrorCode.STRUCTURAL,
      { span: node.nameSpan, label: "this record", help: `Write it as: ${node.name} "2021-06-01" { … }` }
    );
  }

  if (typeof entry.value !== "string") {
    throw new DiagnosticError(
      `The timestamp needs to be a string, found ${describePrimitive(entry.value)}.`,
      ErrorCode.TYPE,
      { span: entry.span, label: "this timestamp" }
    );
  }

  const parsed = parseTimestamp(entry.value);
  if (!parsed.ok) {
    throw new DiagnosticError(
      "Could not parse the timestamp as an RFC3339 instant, a date and time, or a date.",
      ErrorCode.TEMPORAL,
      { span: entry.span, label: "this timestamp", help: parsed.error }
    );
  }

  return parsed.value;
}

function parseFields(node: DocNode, definition: Definition): Map<string, ScalarValue> {
  const fields = new Map<string, ScalarValue>();

  for (const child of node.children ?? []) {
    const kind = definition.fields.get(child.name);
    if (!kind) {
      throw new DiagnosticError("Unknown field", ErrorCode.REFERENCE, {
        span: child.nameSpan,
        label: "this field",
        help: `The \`${definition.kind}\` definition in effect declares: ${[...definition.fields.keys()].join(", ") || "no fields"}`,
      });
    }

    const entry = child.args[0];
    if (!entry) {
      throw new DiagnosticError(`Field \`${child.name}\` has no value.`, ErrorCode.STRUCTURAL, {
        span: child.nameSpan,
        label: "this field",
      });
    }

    const valid = validateFieldValue(kind, entry.value);
    if (!valid.ok) {
      throw new DiagnosticError(`Invalid value for field \`${child.name}\`.`, ErrorCode.VALIDATION, {
        span: entry.span,
        label: "this value",
        help: valid.error,
      });
    }

    if (fields.has(child.name)) {
      throw new DiagnosticError(`Field \`${child.name}\` is assigned twice.`, ErrorCode.VALIDATION, {
        span: child.nameSpan,
        label: "second assignment",
      });
    }

    fields.set(child.name, scalarFromPrimitive(entry.value));
  }

  return fields;
}

/**
 * Parses every record in a document, in document order.
 *
 * @param file - recorded on each record as its origin
 * @throws DiagnosticError pointing at the offending token
 */
export function parseRecordDocument(text: string, store: DefinitionStore, file = "<memory>"): KindRecord[] {
  const records: KindRecord[] = [];

  for (const node of parseKdlDocument(text)) {
    if (!store.has(node.name)) {
      throw new DiagnosticError("Unknown record kind", ErrorCode.REFERENCE, {
        span: node.nameSpan,
        label: "this kind",
        help: `Known kinds are: ${store.kinds().join(", ") || "none"}`,
      });
    }

    const at = parseRecordTimestamp(node);
    const definition = store.active(node.name, at);

    records.push({
      kind: node.name,
      at,
      fields: parseFields(node, definition),
      source: { file, span: node.span },
    });
  }

  return records;
}

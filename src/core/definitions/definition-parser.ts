/**
 * Definition Parser
 *
 * Reads the `define` blocks of one record kind's definition document.
 *
 * ```kdl
 * define since="2020-01-01" {
 *     fields {
 *         title is="string"
 *         status {
 *             oneOf "open" "done"
 *         }
 *     }
 * }
 * ```
 *
 * @module
 */

import { DiagnosticError, ErrorCode } from "../errors.js";
import { parseKdlDocument, findChild, describePrimitive, type DocNode } from "../documents/index.js";
import { fieldKindFromName, NAMED_FIELD_KINDS, type FieldKind } from "./field-kind.js";
import { parseTimestamp, type Timestamp } from "./timestamp.js";
import { RESERVED_FIELD_NAMES, isValidSchemaName, type Definition } from "./types.js";

function parseSince(node: DocNode): Timestamp {
  const since = node.props.get("since");
  if (!since) {
    throw new DiagnosticError(
      "Missing `since` property. Every `define` block requires one.",
      ErrorCode.STRUCTURAL,
      { span: node.nameSpan, label: "this define" }
    );
  }

  if (typeof since.value !== "string") {
    throw new DiagnosticError(
      `The \`since\` property needs to be a string in RFC3339 format, found ${describePrimitive(since.value)}.`,
      ErrorCode.TYPE,
      { span: since.span, label: "in this define" }
    );
  }

  const parsed = parseTimestamp(since.value);
  if (!parsed.ok) {
    throw new DiagnosticError(
      "Could not parse the `since` property as a valid RFC3339 time",
      ErrorCode.TEMPORAL,
      { span: since.span, label: "in this define", help: parsed.error }
    );
  }

  return parsed.value;
}

function parseOneOf(field: DocNode, oneOf: DocNode): FieldKind {
  const options: string[] = [];

  for (const option of oneOf.args) {
    if (typeof option.value !== "string") {
      throw new DiagnosticError(
        `Options of \`oneOf\` need to be strings, found ${describePrimitive(option.value)}.`,
        ErrorCode.TYPE,
        { span: option.span, label: "this option" }
      );
    }
    options.push(option.value);
  }

  if (options.length === 0) {
    throw new DiagnosticError(
      `Field \`${field.name}\` needs at least one \`oneOf\` option.`,
      ErrorCode.VALIDATION,
      { span: oneOf.nameSpan, label: "empty" }
    );
  }

  return { type: "oneOf", options };
}

function parseFieldKind(field: DocNode): FieldKind {
  const is = field.props.get("is");

  if (is) {
    if (typeof is.value !== "string") {
      throw new DiagnosticError("The `is` field needs to be a string.", ErrorCode.TYPE, {
        span: is.span,
        label: "in this define",
      });
    }

    const kind = fieldKindFromName(is.value);
    if (!kind) {
      throw new DiagnosticError(
        `Did not recognize valid field kind: "${is.value.toLowerCase()}"`,
        ErrorCode.VALIDATION,
        { span: is.span, label: "this kind", help: `Known kinds are: ${NAMED_FIELD_KINDS.join(", ")}` }
      );
    }
    return kind;
  }

  if (!field.children) {
    throw new DiagnosticError(
      "Either set a `is` property, or a child with the given definition",
      ErrorCode.STRUCTURAL,
      { span: field.span, label: "in this define" }
    );
  }

  const oneOf = findChild(field, "oneOf");
  if (!oneOf) {
    throw new DiagnosticError("Unrecognizable field definition", ErrorCode.STRUCTURAL, {
      span: field.span,
      label: "in this define",
      help: "Declare the allowed values with `oneOf \"a\" \"b\"`",
    });
  }

  return parseOneOf(field, oneOf);
}

function checkFieldName(field: DocNode): void {
  if (RESERVED_FIELD_NAMES.has(field.name)) {
    throw new DiagnosticError("Reserved field name.", ErrorCode.VALIDATION, {
      span: field.nameSpan,
      label: "this name",
      help: "Both `at` and `kind` are reserved field names, as are `_at` and `_kind`.",
    });
  }

  if (!isValidSchemaName(field.name)) {
    throw new DiagnosticError(`Field name "${field.name}" cannot be used in a query.`, ErrorCode.VALIDATION, {
      span: field.nameSpan,
      label: "this name",
      help: "Use letters, digits and underscores, starting with a letter or an underscore.",
    });
  }
}

function parseFields(define: DocNode): Map<string, FieldKind> {
  const fieldsNode = findChild(define, "fields");
  if (!fieldsNode) {
    throw new DiagnosticError(
      "Could not find `fields` child, which is a required child node.",
      ErrorCode.STRUCTURAL,
      { span: define.span, label: "in this define" }
    );
  }

  const fields = new Map<string, FieldKind>();
  for (const field of fieldsNode.children ?? []) {
    const kind = parseFieldKind(field);
    checkFieldName(field);

    if (fields.has(field.name)) {
      throw new DiagnosticError(`Field \`${field.name}\` is declared twice.`, ErrorCode.VALIDATION, {
        span: field.nameSpan,
        label: "second declaration",
      });
    }
    fields.set(field.name, kind);
  }

  return fields;
}

/**
 * Parses one kind's definition document into its versions, sorted ascending
 * by `since`. Versions with the same `since` keep their document order.
 *
 * @throws DiagnosticError pointing at the offending token
 */
export function parseDefinitionDocument(kind: string, text: string): Definition[] {
  const definitions: Definition[] = [];

  for (const node of parseKdlDocument(text)) {
    if (node.name !== "define") {
      throw new DiagnosticError(`Unknown node "${node.name}".`, ErrorCode.STRUCTURAL, {
        span: node.nameSpan,
        label: "here",
        help: 'Allowed nodes are: "define"',
      });
    }

    definitions.push({
      kind,
      since: parseSince(node),
      fields: parseFields(node),
      span: node.span,
    });
  }

  // Array.prototype.sort is stable
  return definitions.sort((a, b) => a.since - b.since);
}

/**
 * KDL Document Layer
 *
 * Wraps the KDL parser and converts its tree into a small read-only model
 * that keeps the source span of every node and entry, so definition, record
 * and configuration errors can point at the offending token.
 *
 * @module
 */

import { parse, getLocation, InvalidKdlError, type Node, type Entry } from "@bgotink/kdl";
import { DiagnosticError, ErrorCode, type SourceSpan } from "../errors.js";

// =============================================================================
// Types
// =============================================================================

/**
 * A KDL scalar as it appears in the document
 */
export type KdlPrimitive = string | number | boolean | null;

export interface DocEntry {
  /** Property name, or null for positional arguments */
  name: string | null;
  value: KdlPrimitive;
  span: SourceSpan | null;
}

export interface DocNode {
  name: string;
  /** Span covering only the node name */
  nameSpan: SourceSpan | null;
  /** Span covering the whole node, children included */
  span: SourceSpan | null;
  args: DocEntry[];
  props: Map<string, DocEntry>;
  /** Null when the node has no children block */
  children: DocNode[] | null;
}

// =============================================================================
// Conversion
// =============================================================================

function spanOf(element: Node | Entry): SourceSpan | null {
  const location = getLocation(element);
  if (!location) return null;
  return {
    offset: location.startOffset,
    length: Math.max(location.endOffset - location.startOffset, 1),
    line: location.startLine ?? 1,
    column: location.startColumn ?? 1,
  };
}

function convertEntry(entry: Entry): DocEntry {
  return {
    name: entry.getName(),
    value: entry.getValue(),
    span: spanOf(entry),
  };
}

function convertNode(node: Node): DocNode {
  const name = node.getName();
  const span = spanOf(node);
  const args: DocEntry[] = [];
  const props = new Map<string, DocEntry>();

  for (const entry of node.entries) {
    const converted = convertEntry(entry);
    if (converted.name === null) {
      args.push(converted);
    } else {
      // Later duplicates override earlier ones
      props.set(converted.name, converted);
    }
  }

  return {
    name,
    nameSpan: span ? { ...span, length: Math.max(name.length, 1) } : null,
    span,
    args,
    props,
    children: node.children ? node.children.nodes.map(convertNode) : null,
  };
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Parses KDL text into document nodes.
 *
 * The parser reports no location for syntax errors, so those diagnostics
 * carry no span.
 *
 * @throws DiagnosticError with code SYNTAX when the text is not valid KDL
 */
export function parseKdlDocument(text: string): DocNode[] {
  try {
    const document = parse(text, { storeLocations: true });
    return document.nodes.map(convertNode);
  } catch (error) {
    if (error instanceof InvalidKdlError) {
      throw new DiagnosticError(error.message, ErrorCode.SYNTAX, {
        span: null,
        label: "here",
      });
    }
    throw error;
  }
}

/**
 * Returns the first child node with the given name
 */
export function findChild(node: DocNode, name: string): DocNode | undefined {
  return node.children?.find((child) => child.name === name);
}

/**
 * Describes a primitive's type the way error messages talk about it
 */
export function describePrimitive(value: KdlPrimitive): string {
  if (value === null) return "null";
  if (typeof value === "number") return Number.isInteger(value) ? "an integer" : "a float";
  if (typeof value === "boolean") return "a boolean";
  return "a string";
}

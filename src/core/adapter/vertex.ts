/**
 * Vertex Model
 *
 * Every node a query can reach. Filesystem vertices hold a path that is not
 * yet known to exist; documents and records hold an immutable snapshot.
 *
 * @module
 */

import type { ExternalDocument } from "../interfaces/index.js";
import type { KindRecord } from "../records/index.js";
import {
  DIRECTORY_TYPE,
  DOCUMENT_TYPE,
  FILE_TYPE,
  PATH_INTERFACE,
  kindTypeName,
} from "../schema/index.js";

export type Vertex =
  | { readonly kind: "Path"; readonly path: string }
  | { readonly kind: "File"; readonly path: string }
  | { readonly kind: "Directory"; readonly path: string }
  | { readonly kind: "PaperlessDocument"; readonly document: ExternalDocument }
  | { readonly kind: "Record"; readonly record: KindRecord };

export type VertexKind = Vertex["kind"];

// =============================================================================
// Constructors
// =============================================================================

export const pathVertex = (path: string): Vertex => ({ kind: "Path", path });
export const fileVertex = (path: string): Vertex => ({ kind: "File", path });
export const directoryVertex = (path: string): Vertex => ({ kind: "Directory", path });
export const documentVertex = (document: ExternalDocument): Vertex => ({ kind: "PaperlessDocument", document });
export const recordVertex = (record: KindRecord): Vertex => ({ kind: "Record", record });

// =============================================================================
// Capabilities
// =============================================================================

/**
 * The schema type a vertex is an instance of. Records report their kind's
 * type, never the `Record` interface.
 */
export function vertexTypename(vertex: Vertex): string {
  switch (vertex.kind) {
    case "Path":
      return PATH_INTERFACE;
    case "File":
      return FILE_TYPE;
    case "Directory":
      return DIRECTORY_TYPE;
    case "PaperlessDocument":
      return DOCUMENT_TYPE;
    case "Record":
      return kindTypeName(vertex.record.kind);
  }
}

/**
 * The path of any filesystem vertex
 */
export function asFilesystemPath(vertex: Vertex): string | null {
  switch (vertex.kind) {
    case "Path":
    case "File":
    case "Directory":
      return vertex.path;
    case "PaperlessDocument":
    case "Record":
      return null;
  }
}

export function asFile(vertex: Vertex): string | null {
  return vertex.kind === "File" ? vertex.path : null;
}

export function asDirectory(vertex: Vertex): string | null {
  return vertex.kind === "Directory" ? vertex.path : null;
}

export function asDocument(vertex: Vertex): ExternalDocument | null {
  return vertex.kind === "PaperlessDocument" ? vertex.document : null;
}

export function asRecord(vertex: Vertex): KindRecord | null {
  return vertex.kind === "Record" ? vertex.record : null;
}

/**
 * Structural check used by the router before handing a value to this backend
 */
export function isVertex(value: unknown): value is Vertex {
  if (typeof value !== "object" || value === null || !("kind" in value)) return false;

  switch (value.kind) {
    case "Path":
    case "File":
    case "Directory":
      return "path" in value && typeof value.path === "string";
    case "PaperlessDocument":
      return "document" in value && typeof value.document === "object" && value.document !== null;
    case "Record":
      return "record" in value && typeof value.record === "object" && value.record !== null;
    default:
      return false;
  }
}

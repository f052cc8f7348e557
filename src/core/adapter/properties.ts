/**
 * Property Resolution
 *
 * One resolver family per vertex type. Values are computed on every call.
 *
 * @module
 */

import { ContractViolationError } from "../errors.js";
import { formatTimestamp, isEdgeKind, type DefinitionStore } from "../definitions/index.js";
import { scalarToPrimitive, type KindRecord } from "../records/index.js";
import type {
  ContextOutcome,
  DataContext,
  ExternalDocument,
  FieldValue,
  IFileSystem,
} from "../interfaces/index.js";
import { resolvePropertyWith } from "./resolvers.js";
import type { TypeTarget } from "./type-dispatch.js";
import {
  asDirectory,
  asDocument,
  asFile,
  asFilesystemPath,
  asRecord,
  vertexTypename,
  type Vertex,
} from "./vertex.js";

export interface PropertyDeps {
  store: DefinitionStore;
  fileSystem: IFileSystem;
}

type PropertyResolver = (vertex: Vertex) => FieldValue | Promise<FieldValue>;

function unexpectedProperty(typeName: string, propertyName: string): ContractViolationError {
  return new ContractViolationError(
    `Attempted to read unexpected property "${propertyName}" on type "${typeName}"`,
    { typeName, propertyName }
  );
}

function wrongVertex(typeName: string, vertex: Vertex): ContractViolationError {
  return new ContractViolationError(
    `Vertex of type "${vertexTypename(vertex)}" was resolved as "${typeName}"`,
    { typeName, actual: vertex.kind }
  );
}

// =============================================================================
// Filesystem
// =============================================================================

function filesystemProperty(
  variant: "Path" | "File" | "Directory",
  propertyName: string,
  fileSystem: IFileSystem
): PropertyResolver {
  const pathOf = (vertex: Vertex): string => {
    const path =
      variant === "File" ? asFile(vertex) : variant === "Directory" ? asDirectory(vertex) : asFilesystemPath(vertex);
    if (path === null) throw wrongVertex(variant, vertex);
    return path;
  };

  switch (propertyName) {
    case "path":
      return (vertex) => pathOf(vertex);
    case "exists":
      return (vertex) => fileSystem.exists(pathOf(vertex));
    case "basename":
      return (vertex) => fileSystem.basename(pathOf(vertex));
    case "extension":
      if (variant === "File") {
        return (vertex) => fileSystem.extension(pathOf(vertex));
      }
      break;
  }

  throw unexpectedProperty(variant, propertyName);
}

// =============================================================================
// Documents
// =============================================================================

const DOCUMENT_PROPERTIES = new Map<string, (document: ExternalDocument) => FieldValue>([
  ["id", (document) => document.id],
  ["title", (document) => document.title],
  ["content", (document) => document.content],
  ["created", (document) => document.created],
  ["added", (document) => document.added],
  ["archive_serial_number", (document) => document.archiveSerialNumber],
]);

function documentProperty(typeName: string, propertyName: string): PropertyResolver {
  const read = DOCUMENT_PROPERTIES.get(propertyName);
  if (!read) throw unexpectedProperty(typeName, propertyName);

  return (vertex) => {
    const document = asDocument(vertex);
    if (!document) throw wrongVertex(typeName, vertex);
    return read(document);
  };
}

// =============================================================================
// Records
// =============================================================================

function recordOf(typeName: string, vertex: Vertex): KindRecord {
  const record = asRecord(vertex);
  if (!record) throw wrongVertex(typeName, vertex);
  return record;
}

function recordProperty(
  typeName: string,
  kind: string | null,
  propertyName: string,
  store: DefinitionStore
): PropertyResolver {
  if (propertyName === "_at") {
    return (vertex) => formatTimestamp(recordOf(typeName, vertex).at);
  }
  if (propertyName === "_kind") {
    return (vertex) => recordOf(typeName, vertex).kind;
  }

  const fieldKind = kind === null ? undefined : store.fieldKind(kind, propertyName);
  if (!fieldKind || isEdgeKind(fieldKind)) {
    throw unexpectedProperty(typeName, propertyName);
  }

  return (vertex) => {
    const record = recordOf(typeName, vertex);
    const value = record.fields.get(propertyName);
    if (value === undefined) {
      throw new ContractViolationError(
        `Record of kind "${record.kind}" has no value for declared field "${propertyName}"`,
        { typeName, propertyName, at: formatTimestamp(record.at) }
      );
    }
    return scalarToPrimitive(value);
  };
}

// =============================================================================
// Dispatch
// =============================================================================

/**
 * Resolves a property for a batch of contexts.
 *
 * @throws ContractViolationError, before iteration, for a property the type does not declare
 */
export function resolveVertexProperty<C extends DataContext<Vertex>>(
  contexts: AsyncIterable<C>,
  target: TypeTarget,
  typeName: string,
  propertyName: string,
  deps: PropertyDeps
): AsyncIterable<ContextOutcome<C, FieldValue>> {
  if (propertyName === "__typename") {
    return resolvePropertyWith(contexts, vertexTypename);
  }

  return resolvePropertyWith(contexts, propertyResolver(target, typeName, propertyName, deps));
}

function propertyResolver(
  target: TypeTarget,
  typeName: string,
  propertyName: string,
  deps: PropertyDeps
): PropertyResolver {
  switch (target.family) {
    case "filesystem":
      return filesystemProperty(target.variant, propertyName, deps.fileSystem);
    case "document":
      return documentProperty(typeName, propertyName);
    case "record":
      return recordProperty(typeName, target.kind, propertyName, deps.store);
  }
}

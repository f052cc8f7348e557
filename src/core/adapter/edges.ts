/**
 * Edge Resolution
 *
 * `Directory.Children` lists the directory on every call; a listing that
 * fails yields no children. A kind's `path` field leads to one `Path` vertex.
 *
 * @module
 */

import { ContractViolationError } from "../errors.js";
import { isEdgeKind, type DefinitionStore } from "../definitions/index.js";
import { scalarAsString } from "../records/index.js";
import type { ContextOutcome, DataContext, IFileSystem } from "../interfaces/index.js";
import { createLogger } from "../../utils/index.js";
import { emptyVertices, resolveNeighborsWith } from "./resolvers.js";
import type { TypeTarget } from "./type-dispatch.js";
import { asDirectory, asRecord, pathVertex, vertexTypename, type Vertex } from "./vertex.js";

const logger = createLogger("adapter:edges");

export interface EdgeDeps {
  store: DefinitionStore;
  fileSystem: IFileSystem;
}

type EdgeResolver = (vertex: Vertex) => AsyncIterable<Vertex>;

function unexpectedEdge(typeName: string, edgeName: string): ContractViolationError {
  return new ContractViolationError(
    `Attempted to resolve unexpected edge "${edgeName}" on type "${typeName}"`,
    { typeName, edgeName }
  );
}

async function* directoryChildren(path: string, fileSystem: IFileSystem): AsyncGenerator<Vertex> {
  const children = await fileSystem.listChildren(path);
  if (!children.ok) {
    logger.debug({ path, err: children.error }, "Directory listing failed, yielding no children");
    return;
  }

  for (const child of children.value) {
    yield pathVertex(child);
  }
}

async function* singlePath(path: string): AsyncGenerator<Vertex> {
  yield pathVertex(path);
}

function recordPathEdge(typeName: string, edgeName: string): EdgeResolver {
  return (vertex) => {
    const record = asRecord(vertex);
    if (!record) {
      throw new ContractViolationError(`Vertex of type "${vertexTypename(vertex)}" was resolved as "${typeName}"`, {
        typeName,
        edgeName,
      });
    }

    const value = record.fields.get(edgeName);
    if (value === undefined) return emptyVertices<Vertex>();

    const path = scalarAsString(value);
    if (path === null) {
      throw new ContractViolationError(`Path field "${edgeName}" of a "${record.kind}" record does not hold a string`, {
        typeName,
        edgeName,
      });
    }
    return singlePath(path);
  };
}

function edgeResolver(target: TypeTarget, typeName: string, edgeName: string, deps: EdgeDeps): EdgeResolver {
  switch (target.family) {
    case "filesystem":
      if (target.variant === "Directory" && edgeName === "Children") {
        return (vertex) => {
          const path = asDirectory(vertex);
          if (path === null) throw unexpectedEdge(vertexTypename(vertex), edgeName);
          return directoryChildren(path, deps.fileSystem);
        };
      }
      throw unexpectedEdge(typeName, edgeName);

    case "record": {
      const fieldKind = target.kind === null ? undefined : deps.store.fieldKind(target.kind, edgeName);
      if (!fieldKind) throw unexpectedEdge(typeName, edgeName);
      if (!isEdgeKind(fieldKind)) {
        throw new ContractViolationError(`Only path fields can be used as edges, "${edgeName}" is not one`, {
          typeName,
          edgeName,
        });
      }
      return recordPathEdge(typeName, edgeName);
    }

    case "document":
      throw unexpectedEdge(typeName, edgeName);
  }
}

/**
 * Resolves an edge for a batch of contexts.
 *
 * @throws ContractViolationError, before iteration, for an edge the type does not declare
 */
export function resolveVertexNeighbors<C extends DataContext<Vertex>>(
  contexts: AsyncIterable<C>,
  target: TypeTarget,
  typeName: string,
  edgeName: string,
  deps: EdgeDeps
): AsyncIterable<ContextOutcome<C, AsyncIterable<Vertex>>> {
  return resolveNeighborsWith(contexts, edgeResolver(target, typeName, edgeName, deps));
}

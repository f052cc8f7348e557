/**
 * Record Adapter
 *
 * Serves records, filesystem paths and Paperless documents to the query
 * engine. Holds the loaded records for the life of the process; every
 * resolved value is computed fresh from its source.
 *
 * @module
 */

import { ContractViolationError } from "../errors.js";
import type { DefinitionStore } from "../definitions/index.js";
import type { KindRecord } from "../records/index.js";
import { DOCUMENT_ENTRY_POINT, RECORDS_ENTRY_POINT, type QuerySchema } from "../schema/index.js";
import type {
  ContextOutcome,
  DataContext,
  EdgeParameters,
  FieldValue,
  IAdapter,
  IDocumentService,
  IFileSystem,
} from "../interfaces/index.js";
import { createLogger } from "../../utils/index.js";
import { resolveVertexNeighbors } from "./edges.js";
import { allRecords, paperlessDocument } from "./entrypoints.js";
import { resolveVertexProperty } from "./properties.js";
import { resolveCoercionWith } from "./resolvers.js";
import { dispatchType } from "./type-dispatch.js";
import { vertexTypename, type Vertex } from "./vertex.js";

const logger = createLogger("adapter");

export interface RecordAdapterOptions {
  store: DefinitionStore;
  records: readonly KindRecord[];
  schema: QuerySchema;
  fileSystem: IFileSystem;
  /** Null when no Paperless server is configured */
  documents?: IDocumentService | null;
}

export class RecordAdapter implements IAdapter<Vertex> {
  private readonly store: DefinitionStore;
  private readonly records: readonly KindRecord[];
  private readonly schema: QuerySchema;
  private readonly fileSystem: IFileSystem;
  private readonly documents: IDocumentService | null;

  constructor(options: RecordAdapterOptions) {
    this.store = options.store;
    this.records = options.records;
    this.schema = options.schema;
    this.fileSystem = options.fileSystem;
    this.documents = options.documents ?? null;
  }

  resolveStartingVertices(entryPoint: string, parameters: EdgeParameters = {}): AsyncIterable<Vertex> {
    logger.trace({ entryPoint }, "Resolving starting vertices");

    switch (entryPoint) {
      case RECORDS_ENTRY_POINT:
        return allRecords(this.records);
      case DOCUMENT_ENTRY_POINT:
        return paperlessDocument(this.documents, parameters);
      default:
        throw new ContractViolationError(
          `Attempted to resolve starting vertices for unexpected entry point "${entryPoint}"`,
          { entryPoint }
        );
    }
  }

  resolveProperty<C extends DataContext<Vertex>>(
    contexts: AsyncIterable<C>,
    typeName: string,
    propertyName: string
  ): AsyncIterable<ContextOutcome<C, FieldValue>> {
    logger.trace({ typeName, propertyName }, "Resolving property");

    const target = dispatchType(typeName, this.store);
    return resolveVertexProperty(contexts, target, typeName, propertyName, {
      store: this.store,
      fileSystem: this.fileSystem,
    });
  }

  resolveNeighbors<C extends DataContext<Vertex>>(
    contexts: AsyncIterable<C>,
    typeName: string,
    edgeName: string,
    _parameters: EdgeParameters = {}
  ): AsyncIterable<ContextOutcome<C, AsyncIterable<Vertex>>> {
    logger.trace({ typeName, edgeName }, "Resolving neighbors");

    const target = dispatchType(typeName, this.store);
    return resolveVertexNeighbors(contexts, target, typeName, edgeName, {
      store: this.store,
      fileSystem: this.fileSystem,
    });
  }

  resolveCoercion<C extends DataContext<Vertex>>(
    contexts: AsyncIterable<C>,
    typeName: string,
    coerceToType: string
  ): AsyncIterable<ContextOutcome<C, boolean>> {
    logger.trace({ typeName, coerceToType }, "Resolving coercion");

    if (!this.schema.hasType(coerceToType)) {
      throw new ContractViolationError(`Type "${coerceToType}" is not part of this schema`, {
        typeName,
        coerceToType,
      });
    }

    const subtypes = this.schema.subtypes(coerceToType);
    return resolveCoercionWith(contexts, (vertex: Vertex) => subtypes.has(vertexTypename(vertex)));
  }
}

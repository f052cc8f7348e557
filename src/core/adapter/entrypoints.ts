/**
 * Entry Points
 *
 * @module
 */

import { ConfigurationError, ContractViolationError } from "../errors.js";
import type { EdgeParameters, IDocumentService } from "../interfaces/index.js";
import type { KindRecord } from "../records/index.js";
import { documentVertex, recordVertex, type Vertex } from "./vertex.js";

export async function* allRecords(records: readonly KindRecord[]): AsyncGenerator<Vertex> {
  for (const record of records) {
    yield recordVertex(record);
  }
}

function documentId(parameters: EdgeParameters): number {
  const id = parameters["id"];
  if (typeof id !== "number" || !Number.isInteger(id)) {
    throw new ContractViolationError("Entry point Document needs an integer `id` parameter", { id });
  }
  return id;
}

async function* fetchDocument(documents: IDocumentService, id: number): AsyncGenerator<Vertex> {
  yield documentVertex(await documents.fetch(id));
}

/**
 * One document, fetched when the sequence is first pulled
 *
 * @throws ConfigurationError when no document service is configured
 */
export function paperlessDocument(
  documents: IDocumentService | null,
  parameters: EdgeParameters
): AsyncIterable<Vertex> {
  const id = documentId(parameters);
  if (!documents) {
    throw new ConfigurationError("No Paperless server is configured; add a `paperless` block to the configuration");
  }
  return fetchDocument(documents, id);
}

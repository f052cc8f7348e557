/**
 * Runtime
 *
 * Startup: definitions, then records, then schema and adapters. Nothing is
 * served before loading finishes, and the first error aborts it.
 *
 * @module
 */

import { DefinitionStore } from "./definitions/index.js";
import { loadRecords, type KindRecord } from "./records/index.js";
import {
  renderSchema,
  schemaCell as processSchemaCell,
  synthesizeSchema,
  type QuerySchema,
  type SchemaCell,
  type SchemaDescription,
} from "./schema/index.js";
import { RecordAdapter, isVertex } from "./adapter/index.js";
import { MultiAdapterRouter, defineBackend } from "./router/index.js";
import { createNodeFileSystem, createPaperlessClient } from "./sources/index.js";
import type { IDocumentService, IFileSystem } from "./interfaces/index.js";
import type { StrataConfig } from "./config.js";
import { createLogger } from "../utils/index.js";

const logger = createLogger("runtime");

export const BACKEND_NAME = "Strata";

export interface StoreLocation {
  rootFolder: string;
  definitionsFolder: string;
}

export interface LoadedStore {
  readonly definitions: DefinitionStore;
  readonly records: readonly KindRecord[];
}

/**
 * Loads definitions, then records
 */
export async function loadStore(location: StoreLocation): Promise<LoadedStore> {
  const definitions = await DefinitionStore.load(location.definitionsFolder);
  const records = await loadRecords(location.rootFolder, definitions);
  return Object.freeze({ definitions, records: Object.freeze(records) });
}

export interface RuntimeOverrides {
  fileSystem?: IFileSystem;
  documents?: IDocumentService | null;
  /** Defaults to the process-wide cell */
  schemaCell?: SchemaCell;
}

export interface StrataRuntime {
  store: LoadedStore;
  description: SchemaDescription;
  schemaText: string;
  schema: QuerySchema;
  adapter: RecordAdapter;
  router: MultiAdapterRouter;
}

/**
 * Loads the store and builds everything a query engine needs
 */
export async function createRuntime(config: StrataConfig, overrides: RuntimeOverrides = {}): Promise<StrataRuntime> {
  const store = await loadStore(config);

  const description = synthesizeSchema(store.definitions);
  const schemaText = renderSchema(description);
  logger.trace({ schema: schemaText }, "Synthesized schema");

  const schema = (overrides.schemaCell ?? processSchemaCell).initialize(schemaText);

  const documents =
    overrides.documents !== undefined
      ? overrides.documents
      : config.paperless
        ? createPaperlessClient(config.paperless)
        : null;

  const adapter = new RecordAdapter({
    store: store.definitions,
    records: store.records,
    schema,
    fileSystem: overrides.fileSystem ?? createNodeFileSystem(),
    documents,
  });

  const router = new MultiAdapterRouter([
    defineBackend({ name: BACKEND_NAME, adapter, schema: description, isVertex }),
  ]);

  logger.info(
    { kinds: store.definitions.kinds().length, records: store.records.length, paperless: documents !== null },
    "Runtime ready"
  );

  return { store, description, schemaText, schema, adapter, router };
}

/**
 * Core Interfaces Module
 *
 * Contracts between the adapter, its data sources and the query engine.
 * Tests swap in in-memory implementations through these.
 *
 * @module
 */

export type {
  IAdapter,
  FieldValue,
  DataContext,
  EdgeParameters,
  ContextOutcome,
} from "./IAdapter.js";

export type { IFileSystem } from "./IFileSystem.js";

export type { IDocumentService, ExternalDocument } from "./IDocumentService.js";

/**
 * Definition Store
 *
 * Holds every loaded record kind and its versions. Built once at startup and
 * never mutated afterwards, so concurrent readers need no locking.
 *
 * @module
 */

import { ContractViolationError, DiagnosticError, ErrorCode } from "../errors.js";
import { createLogger, readDocuments } from "../../utils/index.js";
import type { FieldKind } from "./field-kind.js";
import { parseDefinitionDocument } from "./definition-parser.js";
import { isValidSchemaName, type Definition } from "./types.js";
import { activeVersion } from "./version-resolver.js";
import type { Timestamp } from "./timestamp.js";

const logger = createLogger("definitions");

export interface LoadDefinitionsOptions {
  /** Glob patterns, relative to the definitions folder */
  patterns?: string[];
}

export class DefinitionStore {
  private readonly byKind: ReadonlyMap<string, readonly Definition[]>;

  private constructor(byKind: Map<string, readonly Definition[]>) {
    this.byKind = byKind;
  }

  /**
   * Builds a store from already parsed versions. Versions are sorted by
   * `since` (stable); every kind needs at least one.
   */
  static fromDefinitions(entries: Iterable<readonly [string, readonly Definition[]]>): DefinitionStore {
    const byKind = new Map<string, readonly Definition[]>();

    for (const [kind, versions] of entries) {
      if (versions.length === 0) {
        throw new DiagnosticError(`Kind "${kind}" declares no versions.`, ErrorCode.STRUCTURAL, {
          help: "Add a `define since=\"…\"` block.",
        });
      }
      byKind.set(kind, [...versions].sort((a, b) => a.since - b.since));
    }

    return new DefinitionStore(byKind);
  }

  /**
   * Parses every definition document in a folder. The kind name is the file
   * stem. The first error aborts the load and carries the file's source.
   */
  static async load(folder: string, options: LoadDefinitionsOptions = {}): Promise<DefinitionStore> {
    const entries: Array<[string, Definition[]]> = [];

    for await (const document of readDocuments(folder, { patterns: options.patterns })) {
      const source = { name: document.path, text: document.text };

      try {
        if (!isValidSchemaName(document.stem)) {
          throw new DiagnosticError(
            `Kind name "${document.stem}" cannot be used in a query.`,
            ErrorCode.VALIDATION,
            { help: "Rename the file using letters, digits and underscores." }
          );
        }

        const versions = parseDefinitionDocument(document.stem, document.text);
        if (versions.length === 0) {
          throw new DiagnosticError(`Kind "${document.stem}" declares no versions.`, ErrorCode.STRUCTURAL, {
            help: "Add a `define since=\"…\"` block.",
          });
        }

        logger.debug({ kind: document.stem, versions: versions.length }, "Parsed definition");
        entries.push([document.stem, versions]);
      } catch (error) {
        if (error instanceof DiagnosticError) {
          throw error.withSource(source);
        }
        throw error;
      }
    }

    logger.info({ folder, kinds: entries.length }, "Loaded definitions");
    return DefinitionStore.fromDefinitions(entries);
  }

  /**
   * Kind names, sorted
   */
  kinds(): string[] {
    return [...this.byKind.keys()].sort();
  }

  has(kind: string): boolean {
    return this.byKind.has(kind);
  }

  /**
   * All versions of a kind, sorted ascending by `since`
   */
  versions(kind: string): readonly Definition[] {
    const versions = this.byKind.get(kind);
    if (!versions) {
      throw new ContractViolationError(`Kind "${kind}" is not defined`, { kind });
    }
    return versions;
  }

  /**
   * The oldest version, which decides the kind's exposed schema shape
   */
  first(kind: string): Definition {
    return activeVersion(this.versions(kind), Number.NEGATIVE_INFINITY);
  }

  /**
   * The version in effect at `at`; the earliest one when `at` predates them all
   */
  active(kind: string, at: Timestamp): Definition {
    return activeVersion(this.versions(kind), at);
  }

  /**
   * A field's kind as the schema exposes it
   */
  fieldKind(kind: string, field: string): FieldKind | undefined {
    return this.first(kind).fields.get(field);
  }
}

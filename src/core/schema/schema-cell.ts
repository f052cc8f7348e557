/**
 * Schema Cell
 *
 * The one process-wide piece of shared state: the query schema, set once
 * before the first query and read-only afterwards.
 *
 * @module
 */

import { ErrorCode, StrataError } from "../errors.js";
import { QuerySchema } from "./query-schema.js";

export class SchemaCell {
  private schema: QuerySchema | null = null;

  /**
   * Parses and stores the schema. Calling again with the same text returns
   * the stored schema; different text is an error.
   */
  initialize(text: string): QuerySchema {
    if (this.schema) {
      if (this.schema.text !== text) {
        throw new StrataError(
          "Schema is already initialized with different text",
          ErrorCode.SCHEMA_ALREADY_INITIALIZED
        );
      }
      return this.schema;
    }

    this.schema = QuerySchema.parse(text);
    return this.schema;
  }

  isInitialized(): boolean {
    return this.schema !== null;
  }

  get(): QuerySchema {
    if (!this.schema) {
      throw new StrataError("Schema is not initialized yet", ErrorCode.SCHEMA_NOT_INITIALIZED);
    }
    return this.schema;
  }
}

/**
 * The process-wide schema
 */
export const schemaCell = new SchemaCell();

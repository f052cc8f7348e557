/**
 * Schema Module
 *
 * Schema synthesis from definitions, rendering, and the parsed query schema.
 *
 * @module
 */

export * from "./schema-description.js";
export * from "./schema-synthesizer.js";
export { renderSchema, renderNamespacedSchema, ROOT_TYPE_NAME, type NamespacedDescription } from "./schema-renderer.js";
export { QUERY_DIRECTIVES } from "./directives.js";
export { QuerySchema, type VertexFields } from "./query-schema.js";
export { SchemaCell, schemaCell } from "./schema-cell.js";

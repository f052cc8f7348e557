/**
 * Definitions Module
 *
 * Versioned field-shape declarations per record kind.
 *
 * @module
 */

export { DefinitionStore, type LoadDefinitionsOptions } from "./definition-store.js";
export { parseDefinitionDocument } from "./definition-parser.js";
export { activeVersion } from "./version-resolver.js";
export { parseTimestamp, formatTimestamp, type Timestamp } from "./timestamp.js";
export {
  fieldKindFromName,
  validateFieldValue,
  isEdgeKind,
  describeFieldKind,
  NAMED_FIELD_KINDS,
  type FieldKind,
  type NamedFieldKind,
} from "./field-kind.js";
export { RESERVED_FIELD_NAMES, isValidSchemaName, type Definition } from "./types.js";

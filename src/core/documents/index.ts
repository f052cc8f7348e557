/**
 * Documents Module
 *
 * KDL parsing with source spans, shared by definitions, records and configuration.
 *
 * @module
 */

export {
  parseKdlDocument,
  findChild,
  describePrimitive,
  type DocNode,
  type DocEntry,
  type KdlPrimitive,
} from "./kdl-document.js";

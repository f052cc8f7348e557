/**
 * Records Module
 *
 * @module
 */

export { parseRecordDocument } from "./record-parser.js";
export { loadRecords } from "./record-loader.js";
export {
  scalarFromPrimitive,
  scalarToPrimitive,
  scalarAsString,
  type ScalarValue,
} from "./scalar.js";
export type { KindRecord, RecordSource } from "./types.js";

/**
 * Record Types
 *
 * @module
 */

import type { SourceSpan } from "../errors.js";
import type { Timestamp } from "../definitions/index.js";
import type { ScalarValue } from "./scalar.js";

/**
 * A timestamped, kind-tagged set of field values, valid under the definition
 * version active at `at`. Immutable once parsed.
 */
export interface KindRecord {
  readonly kind: string;
  readonly at: Timestamp;
  /** Assigned fields, in document order */
  readonly fields: ReadonlyMap<string, ScalarValue>;
  /** Where the record was read from, when it came from a file */
  readonly source: RecordSource | null;
}

export interface RecordSource {
  readonly file: string;
  readonly span: SourceSpan | null;
}

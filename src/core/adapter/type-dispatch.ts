/**
 * Type Dispatch
 *
 * Maps a schema type name to the resolver family that backs it.
 *
 * @module
 */

import { ContractViolationError } from "../errors.js";
import type { DefinitionStore } from "../definitions/index.js";
import {
  DIRECTORY_TYPE,
  DOCUMENT_TYPE,
  FILE_TYPE,
  PATH_INTERFACE,
  RECORD_INTERFACE,
  kindFromTypeName,
} from "../schema/index.js";

export type TypeTarget =
  | { readonly family: "filesystem"; readonly variant: "Path" | "File" | "Directory" }
  | { readonly family: "document" }
  /** `kind` is null for the `Record` interface itself */
  | { readonly family: "record"; readonly kind: string | null };

/**
 * @throws ContractViolationError for a type the schema does not declare
 */
export function dispatchType(typeName: string, store: DefinitionStore): TypeTarget {
  switch (typeName) {
    case PATH_INTERFACE:
      return { family: "filesystem", variant: "Path" };
    case FILE_TYPE:
      return { family: "filesystem", variant: "File" };
    case DIRECTORY_TYPE:
      return { family: "filesystem", variant: "Directory" };
    case DOCUMENT_TYPE:
      return { family: "document" };
    case RECORD_INTERFACE:
      return { family: "record", kind: null };
  }

  const kind = kindFromTypeName(typeName);
  if (kind !== null && store.has(kind)) {
    return { family: "record", kind };
  }

  throw new ContractViolationError(`Type "${typeName}" is not part of this schema`, { typeName });
}

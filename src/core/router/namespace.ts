/**
 * Namespaces
 *
 * Backend names prefix every schema-visible name they own:
 * `Strata__Records`, `Strata__rec_task`.
 *
 * @module
 */

import { ContractViolationError, ErrorCode, StrataError } from "../errors.js";
import { isValidSchemaName } from "../definitions/index.js";

export const NAMESPACE_SEPARATOR = "__";

export interface NamespacedName {
  backend: string;
  local: string;
}

export function namespaced(backend: string, local: string): string {
  return `${backend}${NAMESPACE_SEPARATOR}${local}`;
}

/**
 * @throws StrataError with code INVALID_ARGUMENT for names that cannot prefix schema names
 */
export function assertBackendName(name: string): void {
  if (
    !isValidSchemaName(name) ||
    name.includes(NAMESPACE_SEPARATOR) ||
    name.startsWith("_") ||
    name.endsWith("_")
  ) {
    throw new StrataError(
      `Backend name "${name}" must be an identifier without "${NAMESPACE_SEPARATOR}" that neither starts nor ends with "_"`,
      ErrorCode.INVALID_ARGUMENT,
      { name }
    );
  }
}

/**
 * Splits a merged schema name at the first separator. The prefix is not
 * checked against any registry here.
 *
 * @throws ContractViolationError when the name carries no namespace
 */
export function splitNamespaced(name: string): NamespacedName {
  const index = name.indexOf(NAMESPACE_SEPARATOR);
  if (index <= 0 || index + NAMESPACE_SEPARATOR.length >= name.length) {
    throw new ContractViolationError(`Name "${name}" does not carry a backend namespace`, { name });
  }
  return {
    backend: name.slice(0, index),
    local: name.slice(index + NAMESPACE_SEPARATOR.length),
  };
}

/**
 * Schema Description
 *
 * A structured form of the query schema, kept separate from its text so the
 * router can rename types and entry points before rendering.
 *
 * @module
 */

/**
 * Scalars of the query engine. Never renamed by the router.
 */
export const BUILTIN_SCALARS: ReadonlySet<string> = new Set(["String", "Int", "Float", "Boolean", "ID"]);

/**
 * A reference to a named type, optionally wrapped in a list.
 * `[Path!]` is `{ name: "Path", nonNull: true, list: { nonNull: false } }`.
 */
export interface TypeRef {
  readonly name: string;
  /** Whether the named type itself is non-null */
  readonly nonNull: boolean;
  readonly list?: { readonly nonNull: boolean };
}

export interface ArgumentSpec {
  readonly name: string;
  readonly type: TypeRef;
}

export interface FieldSpec {
  readonly name: string;
  readonly type: TypeRef;
  readonly args?: readonly ArgumentSpec[];
}

export interface TypeSpec {
  readonly kind: "interface" | "object";
  readonly name: string;
  readonly implements: readonly string[];
  readonly fields: readonly FieldSpec[];
}

export interface SchemaDescription {
  /** Entry points of the root query type */
  readonly roots: readonly FieldSpec[];
  readonly types: readonly TypeSpec[];
}

export function isScalarRef(type: TypeRef): boolean {
  return BUILTIN_SCALARS.has(type.name);
}

// =============================================================================
// Builders
// =============================================================================

export function named(name: string, nonNull = false): TypeRef {
  return { name, nonNull };
}

export function listOf(name: string, itemNonNull: boolean, listNonNull: boolean): TypeRef {
  return { name, nonNull: itemNonNull, list: { nonNull: listNonNull } };
}

export function field(name: string, type: TypeRef, args?: ArgumentSpec[]): FieldSpec {
  return args ? { name, type, args } : { name, type };
}

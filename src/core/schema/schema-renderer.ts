/**
 * Schema Renderer
 *
 * Turns schema descriptions into schema text. Types are sorted by name and
 * fields keep their order, so identical descriptions give identical text.
 *
 * @module
 */

import { QUERY_DIRECTIVES } from "./directives.js";
import {
  isScalarRef,
  type FieldSpec,
  type SchemaDescription,
  type TypeRef,
  type TypeSpec,
} from "./schema-description.js";

export const ROOT_TYPE_NAME = "RootSchemaQuery";

/**
 * A description rendered under a backend namespace
 */
export interface NamespacedDescription {
  /** Prepended to entry point and type names, e.g. `Strata__` */
  prefix: string;
  description: SchemaDescription;
}

function renderTypeRef(type: TypeRef, prefix: string): string {
  const name = isScalarRef(type) ? type.name : `${prefix}${type.name}`;
  const inner = type.nonNull ? `${name}!` : name;
  if (!type.list) return inner;
  return type.list.nonNull ? `[${inner}]!` : `[${inner}]`;
}

function renderField(spec: FieldSpec, prefix: string, fieldPrefix = ""): string {
  const args = spec.args?.length
    ? `(${spec.args.map((arg) => `${arg.name}: ${renderTypeRef(arg.type, prefix)}`).join(", ")})`
    : "";
  return `  ${fieldPrefix}${spec.name}${args}: ${renderTypeRef(spec.type, prefix)}`;
}

function renderType(spec: TypeSpec, prefix: string): string {
  const keyword = spec.kind === "interface" ? "interface" : "type";
  const implemented = spec.implements.length
    ? ` implements ${spec.implements.map((name) => `${prefix}${name}`).join(" & ")}`
    : "";
  const fields = spec.fields.map((field) => renderField(field, prefix)).join("\n");
  return `${keyword} ${prefix}${spec.name}${implemented} {\n${fields}\n}`;
}

/**
 * Renders one or more descriptions into a single schema with one root type.
 * An empty prefix renders a description under its own names.
 */
export function renderNamespacedSchema(parts: readonly NamespacedDescription[]): string {
  const roots: string[] = [];
  const types: Array<{ name: string; text: string }> = [];

  for (const { prefix, description } of parts) {
    for (const root of description.roots) {
      roots.push(renderField(root, prefix, prefix));
    }
    for (const type of description.types) {
      types.push({ name: `${prefix}${type.name}`, text: renderType(type, prefix) });
    }
  }

  types.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  return [
    QUERY_DIRECTIVES,
    `schema {\n  query: ${ROOT_TYPE_NAME}\n}`,
    `type ${ROOT_TYPE_NAME} {\n${roots.join("\n")}\n}`,
    ...types.map((type) => type.text),
  ].join("\n\n") + "\n";
}

export function renderSchema(description: SchemaDescription): string {
  return renderNamespacedSchema([{ prefix: "", description }]);
}

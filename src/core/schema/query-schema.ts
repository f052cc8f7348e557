/**
 * Query Schema
 *
 * The parsed, validated schema the adapter checks requests against. Parsing
 * goes through `graphql`, which rejects unknown types, bad interface
 * implementations and malformed directives.
 *
 * @module
 */

import {
  assertValidSchema,
  buildSchema,
  getNamedType,
  isInterfaceType,
  isObjectType,
  isLeafType,
  type GraphQLSchema,
} from "graphql";
import { ErrorCode, StrataError } from "../errors.js";

export interface VertexFields {
  properties: string[];
  edges: string[];
}

export class QuerySchema {
  readonly text: string;
  private readonly schema: GraphQLSchema;
  private readonly subtypeCache = new Map<string, ReadonlySet<string>>();

  private constructor(text: string, schema: GraphQLSchema) {
    this.text = text;
    this.schema = schema;
  }

  /**
   * @throws StrataError with code SCHEMA_INVALID
   */
  static parse(text: string): QuerySchema {
    try {
      const schema = buildSchema(text);
      assertValidSchema(schema);
      return new QuerySchema(text, schema);
    } catch (error) {
      throw new StrataError(
        `Schema text is not valid: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.SCHEMA_INVALID
      );
    }
  }

  hasType(name: string): boolean {
    const type = this.schema.getType(name);
    return isObjectType(type) || isInterfaceType(type);
  }

  /**
   * The type itself plus, for interfaces, every type implementing it
   */
  subtypes(name: string): ReadonlySet<string> {
    const cached = this.subtypeCache.get(name);
    if (cached) return cached;

    const result = new Set<string>();
    const type = this.schema.getType(name);
    if (isObjectType(type)) {
      result.add(type.name);
    } else if (isInterfaceType(type)) {
      result.add(type.name);
      const { objects, interfaces } = this.schema.getImplementations(type);
      for (const implementation of [...objects, ...interfaces]) {
        result.add(implementation.name);
      }
    }

    this.subtypeCache.set(name, result);
    return result;
  }

  /**
   * Whether `typeName` is `target` or one of its declared subtypes
   */
  isSubtype(typeName: string, target: string): boolean {
    return this.subtypes(target).has(typeName);
  }

  /**
   * Entry point names of the root query type
   */
  entryPoints(): string[] {
    const root = this.schema.getQueryType();
    return root ? Object.keys(root.getFields()) : [];
  }

  /**
   * Fields of a vertex type, split into scalar properties and vertex edges.
   * `__typename` is not listed; every type has it.
   */
  vertexFields(typeName: string): VertexFields {
    const type = this.schema.getType(typeName);
    const result: VertexFields = { properties: [], edges: [] };
    if (!isObjectType(type) && !isInterfaceType(type)) return result;

    for (const [name, definition] of Object.entries(type.getFields())) {
      if (isLeafType(getNamedType(definition.type))) {
        result.properties.push(name);
      } else {
        result.edges.push(name);
      }
    }
    return result;
  }

  /**
   * Object and interface types that are not the root and not introspection types
   */
  vertexTypes(): string[] {
    const root = this.schema.getQueryType()?.name;
    return Object.values(this.schema.getTypeMap())
      .filter((type) => (isObjectType(type) || isInterfaceType(type)) && type.name !== root)
      .map((type) => type.name)
      .filter((name) => !name.startsWith("__"))
      .sort();
  }
}

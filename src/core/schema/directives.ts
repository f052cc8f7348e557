/**
 * Directive vocabulary the query engine understands. Emitted at the top of
 * every schema so queries using them validate against it.
 */
export const QUERY_DIRECTIVES = `directive @filter(op: String!, value: [String!]) repeatable on FIELD | INLINE_FRAGMENT
directive @tag(name: String) on FIELD
directive @output(name: String) on FIELD
directive @optional on FIELD
directive @recurse(depth: Int!) on FIELD
directive @fold on FIELD
directive @transform(op: String!) on FIELD`;

/**
 * Resolver Helpers
 *
 * Map a per-vertex function over a context stream, keeping one outcome per
 * context in input order. A context without an active vertex resolves to
 * null, no neighbors or false without calling the function.
 *
 * @module
 */

import type { ContextOutcome, DataContext, FieldValue } from "../interfaces/index.js";

export async function* emptyVertices<V>(): AsyncGenerator<V> {}

export async function* resolvePropertyWith<V, C extends DataContext<V>>(
  contexts: AsyncIterable<C>,
  resolve: (vertex: V) => FieldValue | Promise<FieldValue>
): AsyncGenerator<ContextOutcome<C, FieldValue>> {
  for await (const context of contexts) {
    const vertex = context.activeVertex;
    yield [context, vertex === null ? null : await resolve(vertex)];
  }
}

export async function* resolveNeighborsWith<V, C extends DataContext<V>>(
  contexts: AsyncIterable<C>,
  resolve: (vertex: V) => AsyncIterable<V>
): AsyncGenerator<ContextOutcome<C, AsyncIterable<V>>> {
  for await (const context of contexts) {
    const vertex = context.activeVertex;
    yield [context, vertex === null ? emptyVertices<V>() : resolve(vertex)];
  }
}

export async function* resolveCoercionWith<V, C extends DataContext<V>>(
  contexts: AsyncIterable<C>,
  predicate: (vertex: V) => boolean
): AsyncGenerator<ContextOutcome<C, boolean>> {
  for await (const context of contexts) {
    const vertex = context.activeVertex;
    yield [context, vertex === null ? false : predicate(vertex)];
  }
}

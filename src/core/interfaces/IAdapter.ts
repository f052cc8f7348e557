/**
 * IAdapter - The resolution surface a graph query engine drives
 *
 * All four operations are pull-based. Batched operations receive a
 * single-pass stream of contexts and must yield exactly one outcome per
 * context, in input order. Asking for a type, property, edge or entry point
 * the schema does not declare throws a ContractViolationError before any
 * iteration starts.
 *
 * @module
 */

/**
 * A value produced by a property resolver
 */
export type FieldValue = null | boolean | number | string | readonly FieldValue[];

/**
 * Per-caller state the engine pairs with each vertex. Adapters only read
 * `activeVertex` and hand the context back unchanged.
 */
export interface DataContext<V> {
  readonly activeVertex: V | null;
}

/**
 * Arguments of an entry point or edge, e.g. `Document(id: 12)`
 */
export type EdgeParameters = Readonly<Record<string, FieldValue>>;

export type ContextOutcome<C, T> = readonly [C, T];

export interface IAdapter<V> {
  resolveStartingVertices(entryPoint: string, parameters?: EdgeParameters): AsyncIterable<V>;

  resolveProperty<C extends DataContext<V>>(
    contexts: AsyncIterable<C>,
    typeName: string,
    propertyName: string
  ): AsyncIterable<ContextOutcome<C, FieldValue>>;

  resolveNeighbors<C extends DataContext<V>>(
    contexts: AsyncIterable<C>,
    typeName: string,
    edgeName: string,
    parameters?: EdgeParameters
  ): AsyncIterable<ContextOutcome<C, AsyncIterable<V>>>;

  resolveCoercion<C extends DataContext<V>>(
    contexts: AsyncIterable<C>,
    typeName: string,
    coerceToType: string
  ): AsyncIterable<ContextOutcome<C, boolean>>;
}

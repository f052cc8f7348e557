/**
 * Multi-Adapter Router
 *
 * Presents several independently written backends to the query engine as one
 * adapter over one merged schema. Every vertex leaving the router is wrapped
 * with the name of the backend that produced it.
 *
 * @module
 */

import { ContractViolationError, ErrorCode, StrataError } from "../errors.js";
import { renderNamespacedSchema, type SchemaDescription } from "../schema/index.js";
import type {
  ContextOutcome,
  DataContext,
  EdgeParameters,
  FieldValue,
  IAdapter,
} from "../interfaces/index.js";
import { createLogger } from "../../utils/index.js";
import { assertBackendName, namespaced, splitNamespaced, NAMESPACE_SEPARATOR } from "./namespace.js";
import { PairedBatch, type InnerContext } from "./paired-batch.js";

const logger = createLogger("router");

// =============================================================================
// Types
// =============================================================================

export interface RoutedVertex {
  readonly backend: string;
  readonly vertex: unknown;
}

export interface BackendRegistration<V> {
  name: string;
  adapter: IAdapter<V>;
  schema: SchemaDescription;
  /** Checks that a vertex tagged with this backend really is one of its vertices */
  isVertex: (value: unknown) => value is V;
}

/**
 * A backend with its vertex type erased. Built by `defineBackend`.
 */
export interface BackendHandle {
  readonly name: string;
  readonly schema: SchemaDescription;

  startingVertices(entryPoint: string, parameters: EdgeParameters): AsyncIterable<RoutedVertex>;

  property<C extends DataContext<RoutedVertex>>(
    contexts: AsyncIterable<C>,
    typeName: string,
    propertyName: string
  ): AsyncIterable<ContextOutcome<C, FieldValue>>;

  neighbors<C extends DataContext<RoutedVertex>>(
    contexts: AsyncIterable<C>,
    typeName: string,
    edgeName: string,
    parameters: EdgeParameters
  ): AsyncIterable<ContextOutcome<C, AsyncIterable<RoutedVertex>>>;

  coercion<C extends DataContext<RoutedVertex>>(
    contexts: AsyncIterable<C>,
    typeName: string,
    coerceToType: string
  ): AsyncIterable<ContextOutcome<C, boolean>>;
}

// =============================================================================
// Backend Handles
// =============================================================================

async function* wrapVertices<V>(backend: string, vertices: AsyncIterable<V>): AsyncGenerator<RoutedVertex> {
  for await (const vertex of vertices) {
    yield { backend, vertex };
  }
}

async function* mapOutcomes<C, T, U>(
  outcomes: AsyncIterable<ContextOutcome<C, T>>,
  fn: (value: T) => U
): AsyncGenerator<ContextOutcome<C, U>> {
  for await (const [context, value] of outcomes) {
    yield [context, fn(value)];
  }
}

/**
 * Erases a backend's vertex type behind the routing contract.
 *
 * @throws StrataError with code INVALID_ARGUMENT for an unusable backend name
 */
export function defineBackend<V>(registration: BackendRegistration<V>): BackendHandle {
  const { name, adapter, isVertex } = registration;
  assertBackendName(name);

  // Vertices of other backends reach this backend as "no vertex"
  const unwrap = (context: DataContext<RoutedVertex>): V | null => {
    const routed = context.activeVertex;
    if (routed === null || routed.backend !== name) return null;
    if (!isVertex(routed.vertex)) {
      throw new ContractViolationError(`Vertex tagged for backend "${name}" is not one of its vertices`, {
        backend: name,
      });
    }
    return routed.vertex;
  };

  const batchOf = <C extends DataContext<RoutedVertex>>(contexts: AsyncIterable<C>): PairedBatch<C, V> =>
    new PairedBatch(contexts, unwrap);

  return {
    name,
    schema: registration.schema,

    startingVertices(entryPoint, parameters) {
      return wrapVertices(name, adapter.resolveStartingVertices(entryPoint, parameters));
    },

    property<C extends DataContext<RoutedVertex>>(contexts: AsyncIterable<C>, typeName: string, propertyName: string) {
      const batch = batchOf(contexts);
      const outcomes: AsyncIterable<ContextOutcome<InnerContext<V>, FieldValue>> = adapter.resolveProperty(
        batch.innerContexts(),
        typeName,
        propertyName
      );

      if (propertyName !== "__typename") return batch.rezip(outcomes);
      // Type names must name types of the merged schema
      return batch.rezip(
        mapOutcomes(outcomes, (value) => (typeof value === "string" ? namespaced(name, value) : value))
      );
    },

    neighbors<C extends DataContext<RoutedVertex>>(
      contexts: AsyncIterable<C>,
      typeName: string,
      edgeName: string,
      parameters: EdgeParameters
    ) {
      const batch = batchOf(contexts);
      const outcomes = adapter.resolveNeighbors(batch.innerContexts(), typeName, edgeName, parameters);
      return batch.rezip(mapOutcomes(outcomes, (neighbors) => wrapVertices(name, neighbors)));
    },

    coercion<C extends DataContext<RoutedVertex>>(contexts: AsyncIterable<C>, typeName: string, coerceToType: string) {
      const batch = batchOf(contexts);
      return batch.rezip(adapter.resolveCoercion(batch.innerContexts(), typeName, coerceToType));
    },
  };
}

// =============================================================================
// Router
// =============================================================================

export class MultiAdapterRouter implements IAdapter<RoutedVertex> {
  private readonly backends: ReadonlyMap<string, BackendHandle>;

  /**
   * @throws StrataError with code INVALID_ARGUMENT when two backends share a name
   */
  constructor(backends: readonly BackendHandle[]) {
    const table = new Map<string, BackendHandle>();
    for (const backend of backends) {
      if (table.has(backend.name)) {
        throw new StrataError(`Backend "${backend.name}" is registered twice`, ErrorCode.INVALID_ARGUMENT, {
          name: backend.name,
        });
      }
      table.set(backend.name, backend);
    }
    this.backends = table;
    logger.debug({ backends: [...table.keys()] }, "Routing table built");
  }

  backendNames(): string[] {
    return [...this.backends.keys()];
  }

  /**
   * The merged schema: every backend's entry points and types under its
   * namespace, behind one root type
   */
  schemaText(): string {
    return renderNamespacedSchema(
      [...this.backends.values()].map((backend) => ({
        prefix: `${backend.name}${NAMESPACE_SEPARATOR}`,
        description: backend.schema,
      }))
    );
  }

  private route(name: string): { backend: BackendHandle; local: string } {
    const split = splitNamespaced(name);
    const backend = this.backends.get(split.backend);
    if (!backend) {
      throw new ContractViolationError(`No backend is registered for "${split.backend}"`, { name });
    }
    return { backend, local: split.local };
  }

  resolveStartingVertices(entryPoint: string, parameters: EdgeParameters = {}): AsyncIterable<RoutedVertex> {
    const { backend, local } = this.route(entryPoint);
    logger.trace({ backend: backend.name, entryPoint: local }, "Routing starting vertices");
    return backend.startingVertices(local, parameters);
  }

  resolveProperty<C extends DataContext<RoutedVertex>>(
    contexts: AsyncIterable<C>,
    typeName: string,
    propertyName: string
  ): AsyncIterable<ContextOutcome<C, FieldValue>> {
    const { backend, local } = this.route(typeName);
    logger.trace({ backend: backend.name, typeName: local, propertyName }, "Routing property");
    return backend.property(contexts, local, propertyName);
  }

  resolveNeighbors<C extends DataContext<RoutedVertex>>(
    contexts: AsyncIterable<C>,
    typeName: string,
    edgeName: string,
    parameters: EdgeParameters = {}
  ): AsyncIterable<ContextOutcome<C, AsyncIterable<RoutedVertex>>> {
    const { backend, local } = this.route(typeName);
    logger.trace({ backend: backend.name, typeName: local, edgeName }, "Routing neighbors");
    return backend.neighbors(contexts, local, edgeName, parameters);
  }

  resolveCoercion<C extends DataContext<RoutedVertex>>(
    contexts: AsyncIterable<C>,
    typeName: string,
    coerceToType: string
  ): AsyncIterable<ContextOutcome<C, boolean>> {
    const from = this.route(typeName);
    const to = this.route(coerceToType);
    if (from.backend !== to.backend) {
      throw new ContractViolationError(`Cannot coerce "${typeName}" to "${coerceToType}" across backends`, {
        typeName,
        coerceToType,
      });
    }
    return to.backend.coercion(contexts, from.local, to.local);
  }
}

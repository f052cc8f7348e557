/**
 * Paired Batch
 *
 * Keeps the engine's contexts and the contexts handed to a backend side by
 * side, so backend outcomes can be matched back to the engine's contexts by
 * position rather than by iteration order happening to line up.
 *
 * @module
 */

import { ContractViolationError } from "../errors.js";
import type { ContextOutcome, DataContext } from "../interfaces/index.js";

export interface InnerContext<V> extends DataContext<V> {
  /** Index of the outer context this one stands in for */
  readonly position: number;
}

export class PairedBatch<C, V> {
  private readonly source: AsyncIterable<C>;
  private readonly unwrap: (context: C) => V | null;
  private readonly outer: C[] = [];
  private readonly inner: InnerContext<V>[] = [];
  private materialized: Promise<void> | null = null;

  /**
   * @param unwrap - the backend's view of a context's active vertex
   */
  constructor(source: AsyncIterable<C>, unwrap: (context: C) => V | null) {
    this.source = source;
    this.unwrap = unwrap;
  }

  /**
   * Drains the source once. Later calls wait for the same drain.
   */
  materialize(): Promise<void> {
    if (!this.materialized) {
      this.materialized = (async () => {
        for await (const context of this.source) {
          this.inner.push({ activeVertex: this.unwrap(context), position: this.outer.length });
          this.outer.push(context);
        }
      })();
    }
    return this.materialized;
  }

  get size(): number {
    return this.outer.length;
  }

  /**
   * The contexts to hand to the backend
   */
  async *innerContexts(): AsyncGenerator<InnerContext<V>> {
    await this.materialize();
    yield* this.inner;
  }

  /**
   * Pairs each backend outcome with the outer context at the same position.
   *
   * @throws ContractViolationError when an outcome is out of position, duplicated or missing
   */
  async *rezip<T>(outcomes: AsyncIterable<ContextOutcome<InnerContext<V>, T>>): AsyncGenerator<ContextOutcome<C, T>> {
    await this.materialize();

    let expected = 0;
    for await (const [context, value] of outcomes) {
      const outer = this.outer[expected];
      if (outer === undefined) {
        throw new ContractViolationError("Backend produced more outcomes than it was given contexts", {
          contexts: this.outer.length,
        });
      }
      if (this.inner[expected] !== context) {
        throw new ContractViolationError("Backend produced an outcome out of position", {
          expected,
          actual: context.position,
        });
      }

      yield [outer, value];
      expected++;
    }

    if (expected !== this.outer.length) {
      throw new ContractViolationError("Backend dropped contexts from its outcomes", {
        contexts: this.outer.length,
        outcomes: expected,
      });
    }
  }
}

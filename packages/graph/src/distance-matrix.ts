import { eqFor, hashFor, showValue, type Hashable } from "@fuzzgraph/std";
import { HashMap } from "@fuzzgraph/collections";
import { NotFoundError } from "@fuzzgraph/core";

/**
 * All-pairs distances, indexed by ordered (tail, head) vertex pairs.
 */
export class DistanceMatrix<V extends Hashable> {
  private readonly _vertices: readonly V[];
  private readonly _rows = new HashMap<V, HashMap<V, number>>(eqFor<V>(), hashFor<V>());

  constructor(vertices: Iterable<V>, initial: (tail: V, head: V) => number) {
    this._vertices = [...vertices];
    for (const tail of this._vertices) {
      const row = new HashMap<V, number>(eqFor<V>(), hashFor<V>());
      for (const head of this._vertices) row.set(head, initial(tail, head));
      this._rows.set(tail, row);
    }
  }

  get vertices(): readonly V[] {
    return this._vertices;
  }

  get(tail: V, head: V): number {
    const distance = this._rows.get(tail)?.get(head);
    if (distance === undefined) {
      throw new NotFoundError(
        `no distance from ${showValue(tail)} to ${showValue(head)}`,
        [tail, head]
      );
    }
    return distance;
  }

  set(tail: V, head: V, distance: number): void {
    const row = this._rows.get(tail);
    if (row === undefined || !row.has(head)) {
      throw new NotFoundError(
        `no distance from ${showValue(tail)} to ${showValue(head)}`,
        [tail, head]
      );
    }
    row.set(head, distance);
  }

  *entries(): IterableIterator<[V, V, number]> {
    for (const [tail, row] of this._rows) {
      for (const [head, distance] of row) yield [tail, head, distance];
    }
  }
}

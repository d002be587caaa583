import {
  eqValue,
  hashValue,
  isHashable,
  showValue,
  type Hashable,
  type ValueObject,
} from "@fuzzgraph/std";
import { GraphTypeError, InvalidEdgeError } from "@fuzzgraph/core";

/**
 * A directed edge from `tail` to `head`. Immutable; self-loops are rejected.
 *
 * Equality is ordered: `(a, b)` and `(b, a)` are different edges. The hash is
 * symmetric (`hash(tail) ^ hash(head)`), so an edge and its reverse always
 * share a bucket. That breaks no hash-table invariant (equal edges still hash
 * equally) and is kept for compatibility with the established behavior;
 * undirected graphs rely on `edges()` matching both orientations instead.
 */
export class GraphEdge<V extends Hashable = Hashable> implements ValueObject {
  readonly tail: V;
  readonly head: V;

  constructor(tail: V, head: V) {
    if (!isHashable(tail) || !isHashable(head)) {
      throw new GraphTypeError("edge endpoints must be hashable", [tail, head]);
    }
    if (eqValue.equals(tail, head)) {
      throw new InvalidEdgeError("tail and head must differ", tail);
    }
    this.tail = tail;
    this.head = head;
    Object.freeze(this);
  }

  /** Whether `vertex` is the tail or the head. */
  contains(vertex: Hashable): boolean {
    return eqValue.equals(this.tail, vertex) || eqValue.equals(this.head, vertex);
  }

  reverse(): GraphEdge<V> {
    return new GraphEdge(this.head, this.tail);
  }

  /**
   * Ordered comparison. Comparing against anything but an edge is a type
   * error rather than `false`.
   */
  equals(other: unknown): boolean {
    if (!(other instanceof GraphEdge)) {
      throw new GraphTypeError("comparison only permitted between graph edges", other);
    }
    return eqValue.equals(this.tail, other.tail) && eqValue.equals(this.head, other.head);
  }

  hashCode(): number {
    return (hashValue.hash(this.tail) ^ hashValue.hash(this.head)) >>> 0;
  }

  toString(): string {
    return `(${showValue(this.tail)}, ${showValue(this.head)})`;
  }
}

export function isGraphEdge(value: unknown): value is GraphEdge {
  return value instanceof GraphEdge;
}

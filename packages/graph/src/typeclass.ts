/**
 * GraphLike
 *
 * The structural view the algorithms run against. Crisp and fuzzy graphs both
 * provide it; vertex identity comes from eqValue/hashValue, not from the
 * graph.
 *
 * Hierarchy:
 *   GraphLike<V>
 *     └── WeightedGraphLike<V>
 */

import type { Hashable } from "@fuzzgraph/std";
import type { HashSet } from "@fuzzgraph/collections";
import type { GraphEdge } from "./edge.js";

export interface GraphLike<V extends Hashable> {
  readonly directed: boolean;

  /** A copy of the vertex set. */
  readonly vertices: HashSet<V>;

  hasVertex(vertex: V): boolean;

  /**
   * Edges filtered by tail and/or head. Undirected graphs also match the
   * reverse orientation.
   */
  edges(tail?: V, head?: V): HashSet<GraphEdge<V>>;

  /** Successors for digraphs, all adjacent vertices for undirected graphs. */
  neighbors(vertex: V): HashSet<V>;
}

export interface WeightedGraphLike<V extends Hashable> extends GraphLike<V> {
  /** 0 on the diagonal, Infinity where there is no edge. */
  weight(tail: V, head: V): number;
}

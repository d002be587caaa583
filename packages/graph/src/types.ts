import type { Hashable } from "@fuzzgraph/std";
import type { HashMap } from "@fuzzgraph/collections";
import type { GraphEdge } from "./edge.js";

/** Construction options for a crisp graph. */
export interface GraphOptions<V extends Hashable> {
  readonly vertices?: Iterable<V>;
  readonly edges?: Iterable<GraphEdge<V>>;
  /** Falls back to the `defaults.directed` config key. */
  readonly directed?: boolean;
}

/** Single-source distances plus the predecessor of every reached vertex. */
export interface DijkstraResult<V> {
  readonly distance: HashMap<V, number>;
  readonly previous: HashMap<V, V>;
}

/** A vertex sequence from start to end and its total weight. */
export interface ShortestPath<V> {
  readonly path: V[];
  readonly distance: number;
}

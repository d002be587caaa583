import { eqFor, hashFor, showValue, type Hashable } from "@fuzzgraph/std";
import { HashSet, isSubsetOf, isSupersetOf, setEquals } from "@fuzzgraph/collections";
import { GraphTypeError, NotFoundError, config } from "@fuzzgraph/core";
import {
  connected,
  dijkstra,
  edgesByWeight,
  floydWarshall,
  kruskal,
  shortestPath,
  shortestPathEdges,
} from "./algorithms.js";
import type { DistanceMatrix } from "./distance-matrix.js";
import type { GraphEdge } from "./edge.js";
import type { Graph } from "./graph.js";
import type { WeightedGraphLike } from "./typeclass.js";
import type { DijkstraResult, ShortestPath } from "./types.js";

/**
 * Shared behavior of crisp and fuzzy graphs.
 *
 * Subclasses own the storage and supply `vertices`, `edges`, `weight` and
 * the mutators; everything else (adjacency, traversal, shortest paths,
 * spanning trees, relational operators) is defined here in terms of those.
 *
 * Undirectedness is an overlay: edges are stored in the orientation they
 * were added, and `edges(tail, head)` also matches the reverse orientation
 * when the graph is undirected. Every other operation goes through
 * `edges()`, so the overlay applies everywhere.
 */
export abstract class AbstractGraph<V extends Hashable = Hashable> implements WeightedGraphLike<V> {
  private readonly _directed: boolean;

  protected constructor(directed?: boolean) {
    this._directed = directed ?? config.getBoolean("defaults.directed", true);
  }

  get directed(): boolean {
    return this._directed;
  }

  abstract get vertices(): HashSet<V>;
  abstract hasVertex(vertex: V): boolean;
  abstract edges(tail?: V, head?: V): HashSet<GraphEdge<V>>;
  abstract weight(tail: V, head: V): number;
  abstract removeVertex(vertex: V): void;
  abstract removeEdge(tail: V, head: V): void;

  /** Build a crisp graph of the same kind from a vertex and edge subset. */
  protected abstract derive(vertices: Iterable<V>, edges: Iterable<GraphEdge<V>>): Graph<V>;

  adjacent(tail: V, head: V): boolean {
    if (eqFor<V>().equals(tail, head)) return false;
    return this.edges(tail, head).size > 0;
  }

  neighbors(vertex: V): HashSet<V> {
    const eq = eqFor<V>();
    const result = new HashSet<V>(eq, hashFor<V>());
    for (const edge of this.edges(vertex)) {
      result.add(eq.equals(edge.tail, vertex) ? edge.head : edge.tail);
    }
    return result;
  }

  connected(tail: V, head: V): boolean {
    return connected(this, tail, head);
  }

  disconnect(tail: V, head: V): void {
    this.removeEdge(tail, head);
  }

  edgesByWeight(): GraphEdge<V>[] {
    return edgesByWeight(this);
  }

  dijkstra(start: V): DijkstraResult<V> {
    return dijkstra(this, start);
  }

  shortestPath(start: V, end: V): ShortestPath<V> | null {
    return shortestPath(this, start, end);
  }

  floydWarshall(): DistanceMatrix<V> {
    return floydWarshall(this);
  }

  minimumSpanningTree(): Graph<V> {
    return this.derive(this.vertices, kruskal(this));
  }

  shortestPathSubgraph(): Graph<V> {
    return this.derive(this.vertices, shortestPathEdges(this));
  }

  equals(other: AbstractGraph<V>): boolean {
    assertGraph(other);
    return setEquals(this.vertices, other.vertices) && setEquals(this.edges(), other.edges());
  }

  isSubgraph(other: AbstractGraph<V>): boolean {
    assertGraph(other);
    return isSubsetOf(this.vertices, other.vertices) && isSubsetOf(this.edges(), other.edges());
  }

  isSupergraph(other: AbstractGraph<V>): boolean {
    assertGraph(other);
    return isSupersetOf(this.vertices, other.vertices) && isSupersetOf(this.edges(), other.edges());
  }

  isStrictSubgraph(other: AbstractGraph<V>): boolean {
    return this.isSubgraph(other) && !this.equals(other);
  }

  isStrictSupergraph(other: AbstractGraph<V>): boolean {
    return this.isSupergraph(other) && !this.equals(other);
  }

  toString(): string {
    const vertices = [...this.vertices].map(showValue).join(", ");
    const edges = [...this.edges()].map(String).join(", ");
    return `V: {${vertices}}\nE: {${edges}}`;
  }

  protected requireVertex(vertex: V): void {
    if (!this.hasVertex(vertex)) {
      throw new NotFoundError(`vertex ${showValue(vertex)} is not in the graph`, vertex);
    }
  }

  /**
   * The members of `candidates` matching `tail` and `head` (either may be
   * omitted), reverse orientation included on undirected graphs.
   */
  protected matchEdges(
    candidates: Iterable<GraphEdge<V>>,
    tail?: V,
    head?: V
  ): HashSet<GraphEdge<V>> {
    if (tail !== undefined) this.requireVertex(tail);
    if (head !== undefined) this.requireVertex(head);
    const eq = eqFor<V>();
    const fits = (a: V, b: V): boolean =>
      (tail === undefined || eq.equals(a, tail)) && (head === undefined || eq.equals(b, head));

    const result = new HashSet<GraphEdge<V>>(eqFor<GraphEdge<V>>(), hashFor<GraphEdge<V>>());
    for (const edge of candidates) {
      if (fits(edge.tail, edge.head) || (!this.directed && fits(edge.head, edge.tail))) {
        result.add(edge);
      }
    }
    return result;
  }

  /** Every edge with `vertex` at either end, regardless of direction. */
  protected incidentEdges(vertex: V): GraphEdge<V>[] {
    return [...this.edges()].filter((edge) => edge.contains(vertex));
  }
}

function assertGraph(value: unknown): asserts value is AbstractGraph {
  if (!(value instanceof AbstractGraph)) {
    throw new GraphTypeError("graph comparison requires another graph", value);
  }
}

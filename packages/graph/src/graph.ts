import { eqFor, hashFor, isHashable, type Hashable } from "@fuzzgraph/std";
import { HashSet } from "@fuzzgraph/collections";
import { DuplicateError, GraphTypeError } from "@fuzzgraph/core";
import { AbstractGraph } from "./base-graph.js";
import { GraphEdge } from "./edge.js";
import type { GraphOptions } from "./types.js";

/**
 * A crisp graph: a vertex set and a set of `GraphEdge`s between them.
 *
 * @example
 * ```ts
 * const g = new Graph({ vertices: ["a", "b", "c"], directed: false });
 * g.connect("a", "b");
 * g.connect("b", "c");
 * g.shortestPath("a", "c"); // { path: ["a", "b", "c"], distance: 2 }
 * ```
 */
export class Graph<V extends Hashable = Hashable> extends AbstractGraph<V> {
  private readonly _vertices = new HashSet<V>(eqFor<V>(), hashFor<V>());
  private readonly _edges = new HashSet<GraphEdge<V>>(eqFor<GraphEdge<V>>(), hashFor<GraphEdge<V>>());

  constructor(options: GraphOptions<V> = {}) {
    super(options.directed);
    for (const v of options.vertices ?? []) this.addVertex(v);
    for (const e of options.edges ?? []) this.addEdge(e);
  }

  get vertices(): HashSet<V> {
    return this._vertices.clone();
  }

  hasVertex(vertex: V): boolean {
    return this._vertices.has(vertex);
  }

  /** Adding a vertex that is already present does nothing. */
  addVertex(vertex: V): void {
    if (!isHashable(vertex)) {
      throw new GraphTypeError("vertex must be hashable", vertex);
    }
    this._vertices.add(vertex);
  }

  /** Removes the vertex and every edge incident to it. */
  removeVertex(vertex: V): void {
    this.requireVertex(vertex);
    for (const edge of this.incidentEdges(vertex)) this.removeEdge(edge.tail, edge.head);
    this._vertices.delete(vertex);
  }

  addEdge(edge: GraphEdge<V>): void {
    if (!(edge instanceof GraphEdge)) {
      throw new GraphTypeError("edge must be a GraphEdge", edge);
    }
    this.requireVertex(edge.tail);
    this.requireVertex(edge.head);
    if (this.edges(edge.tail, edge.head).size > 0) {
      throw new DuplicateError(`edge ${String(edge)} already exists`, edge);
    }
    this._edges.add(edge);
  }

  removeEdge(tail: V, head: V): void {
    for (const edge of this.edges(tail, head)) this._edges.delete(edge);
  }

  connect(tail: V, head: V): void {
    this.addEdge(new GraphEdge(tail, head));
  }

  edges(tail?: V, head?: V): HashSet<GraphEdge<V>> {
    return this.matchEdges(this._edges, tail, head);
  }

  weight(tail: V, head: V): number {
    if (eqFor<V>().equals(tail, head)) return 0;
    if (!this.hasVertex(tail) || !this.hasVertex(head)) return Infinity;
    return this.edges(tail, head).size > 0 ? 1 : Infinity;
  }

  protected derive(vertices: Iterable<V>, edges: Iterable<GraphEdge<V>>): Graph<V> {
    return new Graph<V>({ vertices, edges, directed: this.directed });
  }
}

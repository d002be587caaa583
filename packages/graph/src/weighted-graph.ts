import { eqFor, hashFor, type Hashable } from "@fuzzgraph/std";
import { HashMap, first } from "@fuzzgraph/collections";
import { GraphTypeError, NotFoundError } from "@fuzzgraph/core";
import { GraphEdge } from "./edge.js";
import { Graph } from "./graph.js";
import type { GraphOptions } from "./types.js";

/** An edge with the default weight 1, or an `[edge, weight]` pair. */
export type WeightedEdgeInput<V extends Hashable> = GraphEdge<V> | readonly [GraphEdge<V>, number];

export interface WeightedGraphOptions<V extends Hashable> extends Omit<GraphOptions<V>, "edges"> {
  readonly edges?: Iterable<WeightedEdgeInput<V>>;
}

function checkWeight(weight: number): void {
  if (typeof weight !== "number" || Number.isNaN(weight) || weight < 0) {
    throw new GraphTypeError("edge weight must be a non-negative number", weight);
  }
}

/**
 * A crisp graph with a numeric weight per edge. Subgraphs derived from it
 * (spanning tree, shortest-path subgraph) keep the weights.
 */
export class WeightedGraph<V extends Hashable = Hashable> extends Graph<V> {
  private readonly _weights = new HashMap<GraphEdge<V>, number>(
    eqFor<GraphEdge<V>>(),
    hashFor<GraphEdge<V>>()
  );

  constructor(options: WeightedGraphOptions<V> = {}) {
    super({ vertices: options.vertices, directed: options.directed });
    for (const input of options.edges ?? []) {
      if (input instanceof GraphEdge) this.addEdge(input);
      else this.addEdge(input[0], input[1]);
    }
  }

  addEdge(edge: GraphEdge<V>, weight = 1): void {
    checkWeight(weight);
    super.addEdge(edge);
    this._weights.set(edge, weight);
  }

  connect(tail: V, head: V, weight = 1): void {
    this.addEdge(new GraphEdge(tail, head), weight);
  }

  setWeight(tail: V, head: V, weight: number): void {
    checkWeight(weight);
    const edge = first(this.edges(tail, head));
    if (edge === undefined) {
      throw new NotFoundError("no edge between these vertices", [tail, head]);
    }
    this._weights.set(edge, weight);
  }

  removeEdge(tail: V, head: V): void {
    for (const edge of this.edges(tail, head)) this._weights.delete(edge);
    super.removeEdge(tail, head);
  }

  weight(tail: V, head: V): number {
    if (eqFor<V>().equals(tail, head)) return 0;
    if (!this.hasVertex(tail) || !this.hasVertex(head)) return Infinity;
    const edge = first(this.edges(tail, head));
    return edge === undefined ? Infinity : this._weights.getOrElse(edge, 1);
  }

  protected derive(vertices: Iterable<V>, edges: Iterable<GraphEdge<V>>): Graph<V> {
    return new WeightedGraph<V>({
      vertices,
      edges: [...edges].map((edge) => [edge, this._weights.getOrElse(edge, 1)] as const),
      directed: this.directed,
    });
  }
}

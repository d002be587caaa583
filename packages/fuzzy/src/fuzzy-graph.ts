import { eqFor, type Hashable } from "@fuzzgraph/std";
import { first, type HashSet } from "@fuzzgraph/collections";
import { DuplicateError, GraphTypeError, createLogger } from "@fuzzgraph/core";
import { AbstractGraph, Graph, GraphEdge } from "@fuzzgraph/graph";
import { FuzzyElement, FuzzySet, isFuzzyElement } from "./fuzzy-set.js";

const log = createLogger("fuzzy");

export type FuzzyVertexInput<V extends Hashable> = V | FuzzyElement<V>;
export type FuzzyEdgeInput<V extends Hashable> = GraphEdge<V> | FuzzyElement<GraphEdge<V>>;

export interface FuzzyGraphOptions<V extends Hashable> {
  readonly vertices?: Iterable<FuzzyVertexInput<V>>;
  readonly edges?: Iterable<FuzzyEdgeInput<V>>;
  /** Falls back to the `defaults.directed` config key. */
  readonly directed?: boolean;
}

/**
 * A graph whose vertices and edges carry membership degrees.
 *
 * Values added without a FuzzyElement wrapper get membership 1. The weight of
 * an edge is the reciprocal of its membership, so strongly related vertices
 * are close and every crisp algorithm inherited from AbstractGraph runs on
 * that weight. `alpha` and `strongAlpha` cut the graph down to a crisp one.
 *
 * @example
 * ```ts
 * const g = new FuzzyGraph<string>({ vertices: ["x", "y"], directed: false });
 * g.connect("x", "y", 0.5);
 * g.weight("x", "y");          // 2
 * g.alpha(0.5).adjacent("x", "y"); // true
 * ```
 */
export class FuzzyGraph<V extends Hashable = Hashable> extends AbstractGraph<V> {
  private readonly _vertices = new FuzzySet<V>();
  private readonly _edges = new FuzzySet<GraphEdge<V>>();

  constructor(options: FuzzyGraphOptions<V> = {}) {
    super(options.directed);
    for (const v of options.vertices ?? []) this.addVertex(v);
    for (const e of options.edges ?? []) this.addEdge(e);
  }

  get vertices(): HashSet<V> {
    return this._vertices.objects;
  }

  hasVertex(vertex: V): boolean {
    return this._vertices.has(vertex);
  }

  /** Adding a vertex that is already present replaces its membership. */
  addVertex(vertex: FuzzyVertexInput<V>): void {
    this._vertices.add(isFuzzyElement(vertex) ? vertex : new FuzzyElement(vertex));
  }

  addFuzzyVertex(vertex: V, mu = 1): void {
    this.addVertex(new FuzzyElement(vertex, mu));
  }

  removeVertex(vertex: V): void {
    this.requireVertex(vertex);
    for (const edge of this.incidentEdges(vertex)) this.removeEdge(edge.tail, edge.head);
    this._vertices.remove(vertex);
  }

  addEdge(edge: FuzzyEdgeInput<V>): void {
    const element = isFuzzyElement(edge) ? edge : new FuzzyElement(edge);
    const wrapped = element.obj;
    if (!(wrapped instanceof GraphEdge)) {
      throw new GraphTypeError("fuzzy edge must wrap a GraphEdge", wrapped);
    }
    this.requireVertex(wrapped.tail);
    this.requireVertex(wrapped.head);
    if (this.edges(wrapped.tail, wrapped.head).size > 0) {
      throw new DuplicateError(`edge ${String(wrapped)} already exists`, wrapped);
    }
    this._edges.add(element);
  }

  addFuzzyEdge(edge: GraphEdge<V>, mu = 1): void {
    this.addEdge(new FuzzyElement(edge, mu));
  }

  connect(tail: V, head: V, mu = 1): void {
    this.addFuzzyEdge(new GraphEdge(tail, head), mu);
  }

  removeEdge(tail: V, head: V): void {
    for (const edge of this.edges(tail, head)) this._edges.remove(edge);
  }

  edges(tail?: V, head?: V): HashSet<GraphEdge<V>> {
    return this.matchEdges(this._edges.objects, tail, head);
  }

  /** The matching edges with their memberships. */
  fuzzyEdges(tail?: V, head?: V): FuzzySet<GraphEdge<V>> {
    const result = new FuzzySet<GraphEdge<V>>();
    for (const edge of this.edges(tail, head)) result.add(this._edges.get(edge));
    return result;
  }

  /** Membership of the edge from `tail` to `head`, or 0 when there is none. */
  membership(tail: V, head: V): number {
    if (!this.hasVertex(tail) || !this.hasVertex(head)) return 0;
    const edge = first(this.edges(tail, head));
    return edge === undefined ? 0 : this._edges.mu(edge);
  }

  vertexMembership(vertex: V): number {
    return this._vertices.mu(vertex);
  }

  weight(tail: V, head: V): number {
    if (eqFor<V>().equals(tail, head)) return 0;
    const mu = this.membership(tail, head);
    return mu === 0 ? Infinity : 1 / mu;
  }

  /** The crisp graph of vertices and edges with membership at least `threshold`. */
  alpha(threshold: number): Graph<V> {
    return this.cut(threshold, this._vertices.alpha(threshold), this._edges.alpha(threshold));
  }

  /** The crisp graph of vertices and edges with membership above `threshold`. */
  strongAlpha(threshold: number): Graph<V> {
    return this.cut(
      threshold,
      this._vertices.strongAlpha(threshold),
      this._edges.strongAlpha(threshold)
    );
  }

  /** Rescale vertex and edge memberships independently so each peaks at 1. */
  normalize(): void {
    const vertexHeight = this._vertices.height();
    const edgeHeight = this._edges.height();
    this._vertices.normalize();
    this._edges.normalize();
    log.debug(`normalize: vertex height ${vertexHeight}, edge height ${edgeHeight}`);
  }

  equals(other: AbstractGraph<V>): boolean {
    const fuzzy = requireFuzzy(other);
    return this._vertices.equals(fuzzy._vertices) && this._edges.equals(fuzzy._edges);
  }

  /**
   * Fuzzy subgraph order: every vertex and edge here is present in `other`
   * with at least the same membership.
   */
  isSubgraph(other: AbstractGraph<V>): boolean {
    const fuzzy = requireFuzzy(other);
    return this._vertices.isSubset(fuzzy._vertices) && this._edges.isSubset(fuzzy._edges);
  }

  isSupergraph(other: AbstractGraph<V>): boolean {
    return requireFuzzy(other).isSubgraph(this);
  }

  toString(): string {
    return `V: ${String(this._vertices)}\nE: ${String(this._edges)}`;
  }

  protected derive(vertices: Iterable<V>, edges: Iterable<GraphEdge<V>>): Graph<V> {
    return new Graph<V>({ vertices, edges, directed: this.directed });
  }

  private cut(threshold: number, vertices: HashSet<V>, candidates: HashSet<GraphEdge<V>>): Graph<V> {
    const edges = candidates
      .toArray()
      .filter((edge) => vertices.has(edge.tail) && vertices.has(edge.head));
    log.debug(
      `alpha-cut at ${threshold}: kept ${vertices.size} of ${this._vertices.size} vertices, ` +
        `${edges.length} of ${this._edges.size} edges`
    );
    return this.derive(vertices, edges);
  }
}

function requireFuzzy<V extends Hashable>(other: AbstractGraph<V>): FuzzyGraph<V> {
  if (!(other instanceof FuzzyGraph)) {
    throw new GraphTypeError("fuzzy graph comparison requires another fuzzy graph", other);
  }
  return other;
}

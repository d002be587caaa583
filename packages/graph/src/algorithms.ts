import { eqFor, hashFor, ordNumber, showValue, type Hashable } from "@fuzzgraph/std";
import { DisjointSet, HashMap, HashSet } from "@fuzzgraph/collections";
import { NotFoundError, UnsupportedError, createLogger } from "@fuzzgraph/core";
import { DistanceMatrix } from "./distance-matrix.js";
import type { GraphEdge } from "./edge.js";
import type { GraphLike, WeightedGraphLike } from "./typeclass.js";
import type { DijkstraResult, ShortestPath } from "./types.js";

const log = createLogger("graph");

function requireVertex<V extends Hashable>(graph: GraphLike<V>, vertex: V): void {
  if (!graph.hasVertex(vertex)) {
    throw new NotFoundError(`vertex ${showValue(vertex)} is not in the graph`, vertex);
  }
}

/**
 * Whether `head` is reachable from `tail` (BFS). A vertex is not connected to
 * itself, and nothing is connected to a vertex outside the graph.
 */
export function connected<V extends Hashable>(graph: GraphLike<V>, tail: V, head: V): boolean {
  requireVertex(graph, tail);
  const eq = eqFor<V>();
  if (eq.equals(tail, head) || !graph.hasVertex(head)) return false;

  const seen = new HashSet<V>(eq, hashFor<V>(), [tail]);
  const queue: V[] = [tail];
  for (let v = queue.shift(); v !== undefined; v = queue.shift()) {
    for (const next of graph.neighbors(v)) {
      if (eq.equals(next, head)) return true;
      if (!seen.has(next)) {
        seen.add(next);
        queue.push(next);
      }
    }
  }
  return false;
}

/** Edges in ascending weight order. Ties keep their `edges()` order. */
export function edgesByWeight<V extends Hashable>(graph: WeightedGraphLike<V>): GraphEdge<V>[] {
  const weighted = [...graph.edges()].map((edge) => ({
    edge,
    weight: graph.weight(edge.tail, edge.head),
  }));
  weighted.sort((a, b) => ordNumber.compare(a.weight, b.weight));
  return weighted.map(({ edge }) => edge);
}

/**
 * Dijkstra's single-source shortest paths with O(V²) minimum selection.
 * Unreachable vertices keep distance Infinity and have no predecessor.
 */
export function dijkstra<V extends Hashable>(
  graph: WeightedGraphLike<V>,
  start: V
): DijkstraResult<V> {
  requireVertex(graph, start);
  const eq = eqFor<V>();
  const hash = hashFor<V>();
  const unvisited = graph.vertices;
  const distance = new HashMap<V, number>(eq, hash);
  const previous = new HashMap<V, V>(eq, hash);
  for (const v of unvisited) distance.set(v, Infinity);
  distance.set(start, 0);

  let reached = 0;
  while (unvisited.size > 0) {
    let current: V | undefined;
    let best = Infinity;
    for (const v of unvisited) {
      const d = distance.getOrElse(v, Infinity);
      if (current === undefined || d < best) {
        current = v;
        best = d;
      }
    }
    if (current === undefined || best === Infinity) break;
    unvisited.delete(current);
    reached++;

    for (const next of graph.neighbors(current)) {
      if (!unvisited.has(next)) continue;
      const alt = best + graph.weight(current, next);
      if (alt < distance.getOrElse(next, Infinity)) {
        distance.set(next, alt);
        previous.set(next, current);
      }
    }
  }

  log.debug(`dijkstra from ${showValue(start)}: reached ${reached} of ${distance.size} vertices`);
  return { distance, previous };
}

/**
 * The shortest path from `start` to `end`, or null when `end` is
 * unreachable.
 */
export function shortestPath<V extends Hashable>(
  graph: WeightedGraphLike<V>,
  start: V,
  end: V
): ShortestPath<V> | null {
  requireVertex(graph, end);
  const { distance, previous } = dijkstra(graph, start);
  const total = distance.getOrElse(end, Infinity);
  if (total === Infinity) return null;

  const eq = eqFor<V>();
  const path: V[] = [end];
  let cur = end;
  while (!eq.equals(cur, start)) {
    const prev = previous.get(cur);
    if (prev === undefined) return null;
    path.push(prev);
    cur = prev;
  }
  path.reverse();
  return { path, distance: total };
}

/** Floyd–Warshall all-pairs distances. */
export function floydWarshall<V extends Hashable>(graph: WeightedGraphLike<V>): DistanceMatrix<V> {
  const vertices = [...graph.vertices];
  const dist = new DistanceMatrix(vertices, (tail, head) => graph.weight(tail, head));
  for (const k of vertices) {
    for (const i of vertices) {
      const ik = dist.get(i, k);
      if (ik === Infinity) continue;
      for (const j of vertices) {
        const through = ik + dist.get(k, j);
        if (through < dist.get(i, j)) dist.set(i, j, through);
      }
    }
  }
  log.debug(`floyd-warshall over ${vertices.length} vertices`);
  return dist;
}

/**
 * Kruskal's algorithm. Stops once |V|-1 edges are chosen or the candidates
 * run out, so a disconnected graph yields a spanning forest.
 */
export function kruskal<V extends Hashable>(graph: WeightedGraphLike<V>): GraphEdge<V>[] {
  if (graph.directed) {
    throw new UnsupportedError("minimum spanning tree requires an undirected graph", graph);
  }
  const vertices = graph.vertices;
  const components = new DisjointSet<V>(eqFor<V>(), hashFor<V>(), vertices);
  const target = Math.max(0, vertices.size - 1);
  const candidates = edgesByWeight(graph);
  const tree: GraphEdge<V>[] = [];
  for (const edge of candidates) {
    if (tree.length >= target) break;
    if (components.union(edge.tail, edge.head)) tree.push(edge);
  }
  log.debug(`kruskal: chose ${tree.length} of ${candidates.length} edges`);
  return tree;
}

/** Edges lying on some shortest path: weight equals the all-pairs distance. */
export function shortestPathEdges<V extends Hashable>(
  graph: WeightedGraphLike<V>
): GraphEdge<V>[] {
  const dist = floydWarshall(graph);
  return [...graph.edges()].filter(
    (edge) => graph.weight(edge.tail, edge.head) <= dist.get(edge.tail, edge.head)
  );
}

export type { GraphOptions, DijkstraResult, ShortestPath } from "./types.js";

export { GraphEdge, isGraphEdge } from "./edge.js";
export { AbstractGraph } from "./base-graph.js";
export { Graph } from "./graph.js";
export type { WeightedEdgeInput, WeightedGraphOptions } from "./weighted-graph.js";
export { WeightedGraph } from "./weighted-graph.js";
export { DistanceMatrix } from "./distance-matrix.js";

// Typeclass
export type { GraphLike, WeightedGraphLike } from "./typeclass.js";

// Algorithms
export {
  connected,
  edgesByWeight,
  dijkstra,
  shortestPath,
  floydWarshall,
  kruskal,
  shortestPathEdges,
} from "./algorithms.js";

import { afterEach, describe, it, expect } from "vitest";
import { Graph, GraphEdge, WeightedGraph, edgesByWeight, kruskal } from "../src/index.js";
import { NotFoundError, UnsupportedError, config, setLogWriter } from "@fuzzgraph/core";

function triangle(directed = false): WeightedGraph<string> {
  return new WeightedGraph<string>({
    vertices: ["A", "B", "C"],
    edges: [
      [new GraphEdge("A", "B"), 1],
      [new GraphEdge("B", "C"), 1],
      [new GraphEdge("A", "C"), 3],
    ],
    directed,
  });
}

function square(): WeightedGraph<number> {
  return new WeightedGraph<number>({
    vertices: [1, 2, 3, 4],
    edges: [
      [new GraphEdge(1, 2), 1],
      [new GraphEdge(2, 3), 1],
      [new GraphEdge(3, 4), 1],
      [new GraphEdge(1, 4), 5],
    ],
    directed: false,
  });
}

afterEach(() => {
  config.reset();
  setLogWriter();
});

// ---------------------------------------------------------------------------
// Shortest paths
// ---------------------------------------------------------------------------

describe("dijkstra", () => {
  it("relaxes through cheaper detours", () => {
    const { distance, previous } = triangle().dijkstra("A");
    expect(distance.get("A")).toBe(0);
    expect(distance.get("B")).toBe(1);
    expect(distance.get("C")).toBe(2);
    expect(previous.get("C")).toBe("B");
    expect(previous.has("A")).toBe(false);
  });

  it("leaves unreachable vertices at Infinity", () => {
    const g = triangle();
    g.addVertex("D");
    const { distance, previous } = g.dijkstra("A");
    expect(distance.get("D")).toBe(Infinity);
    expect(previous.has("D")).toBe(false);
  });

  it("fails for an unknown start", () => {
    expect(() => triangle().dijkstra("Z")).toThrow(NotFoundError);
  });
});

describe("shortestPath", () => {
  it("returns the path and its total weight", () => {
    expect(triangle().shortestPath("A", "C")).toEqual({ path: ["A", "B", "C"], distance: 2 });
  });

  it("uses the direct edge on an unweighted triangle", () => {
    const g = new Graph<string>({ vertices: ["A", "B", "C"], directed: false });
    g.connect("A", "B");
    g.connect("B", "C");
    g.connect("A", "C");
    expect(g.shortestPath("A", "C")).toEqual({ path: ["A", "C"], distance: 1 });
  });

  it("is trivial from a vertex to itself", () => {
    expect(triangle().shortestPath("B", "B")).toEqual({ path: ["B"], distance: 0 });
  });

  it("returns null when the target is unreachable", () => {
    const g = triangle(true);
    expect(g.shortestPath("C", "A")).toBeNull();
  });

  it("fails for an unknown target", () => {
    expect(() => triangle().shortestPath("A", "Z")).toThrow(NotFoundError);
  });
});

describe("floydWarshall", () => {
  it("has a zero diagonal", () => {
    const dist = triangle().floydWarshall();
    for (const v of ["A", "B", "C"]) expect(dist.get(v, v)).toBe(0);
  });

  it("computes all-pairs distances", () => {
    const dist = triangle().floydWarshall();
    expect(dist.get("A", "C")).toBe(2);
    expect(dist.get("C", "A")).toBe(2);
  });

  it("respects direction", () => {
    const dist = triangle(true).floydWarshall();
    expect(dist.get("A", "C")).toBe(2);
    expect(dist.get("C", "A")).toBe(Infinity);
  });

  it("fails for pairs outside the graph", () => {
    expect(() => triangle().floydWarshall().get("A", "Z")).toThrow(NotFoundError);
  });
});

describe("shortestPathSubgraph", () => {
  it("drops edges longer than the distance between their endpoints", () => {
    const sub = triangle().shortestPathSubgraph();
    expect(sub.vertices.size).toBe(3);
    expect(sub.edges().toArray().map(String).sort()).toEqual(['("A", "B")', '("B", "C")']);
  });
});

// ---------------------------------------------------------------------------
// Spanning trees
// ---------------------------------------------------------------------------

describe("edgesByWeight", () => {
  it("sorts ascending and keeps ties in order", () => {
    expect(edgesByWeight(square()).map(String)).toEqual([
      "(1, 2)",
      "(2, 3)",
      "(3, 4)",
      "(1, 4)",
    ]);
  });
});

describe("minimumSpanningTree", () => {
  it("skips the heavy edge of a square", () => {
    const mst = square().minimumSpanningTree();
    expect(mst.vertices.size).toBe(4);
    expect(mst.edges().toArray().map(String)).toEqual(["(1, 2)", "(2, 3)", "(3, 4)"]);
    expect(mst.weight(2, 1)).toBe(1);
    expect(mst.adjacent(1, 4)).toBe(false);
  });

  it("yields a spanning forest for a disconnected graph", () => {
    const g = new Graph<number>({
      vertices: [1, 2, 3, 4],
      edges: [new GraphEdge(1, 2), new GraphEdge(3, 4)],
      directed: false,
    });
    expect(kruskal(g)).toHaveLength(2);
    expect(g.minimumSpanningTree().edges().size).toBe(2);
  });

  it("is unsupported on directed graphs", () => {
    expect(() => triangle(true).minimumSpanningTree()).toThrow(UnsupportedError);
  });
});

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

describe("debug logging", () => {
  it("is silent unless enabled", () => {
    const lines: string[] = [];
    setLogWriter((line) => lines.push(line));
    triangle().dijkstra("A");
    expect(lines).toEqual([]);
  });

  it("reports each run when enabled", () => {
    const lines: string[] = [];
    setLogWriter((line) => lines.push(line));
    config.set({ debug: true });
    triangle().dijkstra("A");
    square().minimumSpanningTree();
    expect(lines).toEqual([
      '[fuzzgraph:graph] dijkstra from "A": reached 3 of 3 vertices',
      "[fuzzgraph:graph] kruskal: chose 3 of 4 edges",
    ]);
  });
});

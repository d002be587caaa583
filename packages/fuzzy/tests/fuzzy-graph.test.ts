import { afterEach, describe, it, expect } from "vitest";
import fc from "fast-check";
import { FuzzyElement, FuzzyGraph } from "../src/index.js";
import { Graph, GraphEdge } from "@fuzzgraph/graph";
import {
  DuplicateError,
  GraphTypeError,
  NotFoundError,
  UnsupportedError,
  config,
  setLogWriter,
} from "@fuzzgraph/core";

function pair(): FuzzyGraph<string> {
  const g = new FuzzyGraph<string>({ vertices: ["X", "Y"], directed: false });
  g.connect("X", "Y", 0.5);
  return g;
}

function trio(): FuzzyGraph<string> {
  const g = new FuzzyGraph<string>({ vertices: ["a", "b", "c"], directed: false });
  g.connect("a", "b", 1);
  g.connect("b", "c", 0.5);
  g.connect("a", "c", 0.25);
  return g;
}

afterEach(() => {
  config.reset();
  setLogWriter();
});

describe("construction", () => {
  it("wraps plain values with membership 1", () => {
    const g = new FuzzyGraph<string>({
      vertices: [new FuzzyElement("a", 0.3), "b"],
      edges: [new GraphEdge("a", "b")],
    });
    expect(g.vertexMembership("a")).toBe(0.3);
    expect(g.vertexMembership("b")).toBe(1);
    expect(g.membership("a", "b")).toBe(1);
    expect(g.directed).toBe(true);
  });

  it("accepts wrapped edges", () => {
    const g = new FuzzyGraph<string>({
      vertices: ["a", "b"],
      edges: [new FuzzyElement(new GraphEdge("a", "b"), 0.7)],
    });
    expect(g.membership("a", "b")).toBe(0.7);
  });

  it("renders memberships", () => {
    expect(pair().toString()).toBe('V: {"X": 1, "Y": 1}\nE: {("X", "Y"): 0.5}');
  });
});

describe("vertices and edges", () => {
  it("re-adding a vertex replaces its membership", () => {
    const g = pair();
    g.addFuzzyVertex("X", 0.2);
    expect(g.vertexMembership("X")).toBe(0.2);
    expect(g.vertices.size).toBe(2);
  });

  it("rejects non-edges, unknown endpoints and duplicates", () => {
    const g = pair();
    expect(() => g.addEdge(5 as unknown as GraphEdge<string>)).toThrow(GraphTypeError);
    expect(() => g.addEdge({} as unknown as GraphEdge<string>)).toThrow(GraphTypeError);
    expect(() => g.connect("X", "Z")).toThrow(NotFoundError);
    expect(() => g.connect("Y", "X")).toThrow(DuplicateError);
  });

  it("removing a vertex removes its edges", () => {
    const g = trio();
    g.removeVertex("b");
    expect(g.edges().toArray().map(String)).toEqual(['("a", "c")']);
    expect(() => g.removeVertex("b")).toThrow(NotFoundError);
  });

  it("filters edges with the undirected overlay", () => {
    const g = trio();
    expect(g.edges("c").size).toBe(2);
    expect(g.fuzzyEdges("c", "b").mu(new GraphEdge("b", "c"))).toBe(0.5);
  });

  it("disconnect removes the edge in either orientation", () => {
    const g = pair();
    g.disconnect("Y", "X");
    expect(g.membership("X", "Y")).toBe(0);
  });
});

describe("membership and weight", () => {
  it("weight is the reciprocal of membership", () => {
    const g = pair();
    expect(g.membership("Y", "X")).toBe(0.5);
    expect(g.weight("X", "Y")).toBe(2);
    expect(g.weight("X", "X")).toBe(0);
  });

  it("weight is Infinity without an edge or with membership 0", () => {
    const g = new FuzzyGraph<string>({ vertices: ["a", "b", "c"], directed: false });
    g.connect("a", "b", 0);
    expect(g.weight("a", "b")).toBe(Infinity);
    expect(g.weight("a", "c")).toBe(Infinity);
    expect(g.membership("a", "c")).toBe(0);
  });

  it("an endpoint outside the graph has membership 0 and weight Infinity", () => {
    expect(pair().membership("X", "zzz")).toBe(0);
    expect(pair().weight("X", "zzz")).toBe(Infinity);
    expect(pair().weight("zzz", "Y")).toBe(Infinity);
  });

  it("vertexMembership is 0 for absent vertices", () => {
    expect(pair().vertexMembership("zzz")).toBe(0);
  });
});

describe("alpha cuts", () => {
  it("keeps edges at the threshold, strong cut drops them", () => {
    const g = pair();
    const cut = g.alpha(0.5);
    expect(cut).toBeInstanceOf(Graph);
    expect(cut.adjacent("X", "Y")).toBe(true);
    const strong = g.strongAlpha(0.5);
    expect(strong.vertices.size).toBe(2);
    expect(strong.adjacent("X", "Y")).toBe(false);
  });

  it("drops edges whose endpoint was cut", () => {
    const g = new FuzzyGraph<string>({
      vertices: [new FuzzyElement("a", 0.3), "b", "c"],
      directed: false,
    });
    g.connect("a", "b", 1);
    g.connect("b", "c", 0.6);
    const cut = g.alpha(0.5);
    expect(cut.vertices.toArray().sort()).toEqual(["b", "c"]);
    expect(cut.edges().toArray().map(String)).toEqual(['("b", "c")']);
    expect(cut.directed).toBe(false);
  });

  it("logs each cut when debugging", () => {
    const lines: string[] = [];
    setLogWriter((line) => lines.push(line));
    config.set({ debug: true });
    pair().alpha(0.5);
    expect(lines).toEqual(["[fuzzgraph:fuzzy] alpha-cut at 0.5: kept 2 of 2 vertices, 1 of 1 edges"]);
  });
});

describe("normalize", () => {
  it("scales vertices and edges independently", () => {
    const g = new FuzzyGraph<string>({
      vertices: [new FuzzyElement("x", 0.5), new FuzzyElement("y", 0.25)],
      directed: false,
    });
    g.connect("x", "y", 0.4);
    g.normalize();
    expect(g.vertexMembership("x")).toBe(1);
    expect(g.vertexMembership("y")).toBe(0.5);
    expect(g.membership("x", "y")).toBe(1);
  });

  it("is idempotent", () => {
    fc.assert(
      fc.property(
        fc.array(fc.double({ min: 0, max: 1, noNaN: true }), { minLength: 1, maxLength: 8 }),
        (degrees) => {
          const g = new FuzzyGraph<number>({ directed: false });
          degrees.forEach((mu, i) => g.addFuzzyVertex(i, mu));
          for (let i = 1; i < degrees.length; i++) g.connect(i - 1, i, degrees[i]);

          const snapshot = () =>
            degrees.map((_, i) => [g.vertexMembership(i), i > 0 ? g.membership(i - 1, i) : 0]);
          g.normalize();
          const once = snapshot();
          g.normalize();
          expect(snapshot()).toEqual(once);
        }
      )
    );
  });
});

describe("crisp algorithms on fuzzy weights", () => {
  it("prefers strongly related paths", () => {
    expect(trio().shortestPath("a", "c")).toEqual({ path: ["a", "b", "c"], distance: 3 });
  });

  it("spanning tree keeps the strongest edges", () => {
    const mst = trio().minimumSpanningTree();
    expect(mst).toBeInstanceOf(Graph);
    expect(mst.edges().toArray().map(String).sort()).toEqual(['("a", "b")', '("b", "c")']);
  });

  it("spanning tree is unsupported when directed", () => {
    expect(() => new FuzzyGraph({ vertices: [1, 2], directed: true }).minimumSpanningTree()).toThrow(
      UnsupportedError
    );
  });

  it("strong cuts are subgraphs of plain cuts", () => {
    fc.assert(
      fc.property(fc.double({ min: 0, max: 1, noNaN: true }), (t) => {
        const g = trio();
        expect(g.strongAlpha(t).isSubgraph(g.alpha(t))).toBe(true);
      })
    );
  });
});

describe("fuzzy subgraph order", () => {
  function weak(): FuzzyGraph<string> {
    const g = new FuzzyGraph<string>({ vertices: [new FuzzyElement("a", 0.5), "b"] });
    g.connect("a", "b", 0.5);
    return g;
  }

  function strong(): FuzzyGraph<string> {
    const g = new FuzzyGraph<string>({ vertices: ["a", "b"] });
    g.connect("a", "b", 0.8);
    return g;
  }

  it("compares memberships", () => {
    expect(weak().isSubgraph(strong())).toBe(true);
    expect(weak().isStrictSubgraph(strong())).toBe(true);
    expect(strong().isSupergraph(weak())).toBe(true);
    expect(strong().isSubgraph(weak())).toBe(false);
  });

  it("a fuzzy graph equals itself and is not a strict subgraph of itself", () => {
    const g = weak();
    expect(g.equals(weak())).toBe(true);
    expect(g.isSubgraph(g)).toBe(true);
    expect(g.isStrictSubgraph(g)).toBe(false);
    expect(g.isStrictSupergraph(g)).toBe(false);
  });

  it("refuses crisp operands", () => {
    const crisp = new Graph<string>({ vertices: ["a", "b"] });
    expect(() => weak().isSubgraph(crisp)).toThrow(GraphTypeError);
  });
});

import { describe, it, expect } from "vitest";
import { GraphEdge, isGraphEdge } from "../src/index.js";
import { GraphTypeError, InvalidEdgeError } from "@fuzzgraph/core";

describe("GraphEdge", () => {
  it("keeps tail and head", () => {
    const e = new GraphEdge(1, 2);
    expect(e.tail).toBe(1);
    expect(e.head).toBe(2);
    expect(Object.isFrozen(e)).toBe(true);
  });

  it("rejects self-loops", () => {
    expect(() => new GraphEdge("a", "a")).toThrow(InvalidEdgeError);
    expect(() => new GraphEdge(NaN, NaN)).toThrow(InvalidEdgeError);
  });

  it("rejects unhashable endpoints", () => {
    expect(() => new GraphEdge([1] as unknown as number, 2)).toThrow(GraphTypeError);
    expect(() => new GraphEdge(1, null as unknown as number)).toThrow(GraphTypeError);
  });

  it("compares with orientation", () => {
    const e = new GraphEdge("a", "b");
    expect(e.equals(new GraphEdge("a", "b"))).toBe(true);
    expect(e.equals(new GraphEdge("b", "a"))).toBe(false);
  });

  it("hashes symmetrically", () => {
    expect(new GraphEdge("a", "b").hashCode()).toBe(new GraphEdge("b", "a").hashCode());
  });

  it("refuses to compare against non-edges", () => {
    expect(() => new GraphEdge(1, 2).equals(3)).toThrow(GraphTypeError);
  });

  it("contains and reverse", () => {
    const e = new GraphEdge(1, 2);
    expect(e.contains(1)).toBe(true);
    expect(e.contains(3)).toBe(false);
    expect(e.reverse().equals(new GraphEdge(2, 1))).toBe(true);
  });

  it("renders as a pair", () => {
    expect(String(new GraphEdge(1, 2))).toBe("(1, 2)");
    expect(String(new GraphEdge("x", "y"))).toBe('("x", "y")');
  });

  it("isGraphEdge", () => {
    expect(isGraphEdge(new GraphEdge(1, 2))).toBe(true);
    expect(isGraphEdge({ tail: 1, head: 2 })).toBe(false);
  });
});

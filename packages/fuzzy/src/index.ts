/**
 * @fuzzgraph/fuzzy: fuzzy sets and fuzzy graphs.
 */

export { FuzzyElement, FuzzySet, isFuzzyElement } from "./fuzzy-set.js";

export type { FuzzyVertexInput, FuzzyEdgeInput, FuzzyGraphOptions } from "./fuzzy-graph.js";
export { FuzzyGraph } from "./fuzzy-graph.js";

// Data structures
export { HashSet } from "./hash-set.js";
export { HashMap } from "./hash-map.js";
export { DisjointSet } from "./disjoint-set.js";
export { IndexedMember, IndexedSet } from "./indexed-set.js";

// Derived operations
export {
  union,
  intersection,
  difference,
  filter,
  isSubsetOf,
  isSupersetOf,
  setEquals,
  first,
} from "./derived.js";

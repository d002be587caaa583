/**
 * Derived operations: free functions over HashSet.
 *
 * Results take their Eq/Hash instances from the first operand.
 */

import { HashSet } from "./hash-set.js";

export function union<K>(a: HashSet<K>, b: Iterable<K>): HashSet<K> {
  const result = a.clone();
  for (const k of b) result.add(k);
  return result;
}

export function intersection<K>(a: HashSet<K>, b: HashSet<K>): HashSet<K> {
  const result = new HashSet<K>(a.eq, a.hasher);
  for (const k of a) {
    if (b.has(k)) result.add(k);
  }
  return result;
}

export function difference<K>(a: HashSet<K>, b: HashSet<K>): HashSet<K> {
  const result = new HashSet<K>(a.eq, a.hasher);
  for (const k of a) {
    if (!b.has(k)) result.add(k);
  }
  return result;
}

export function filter<K>(a: HashSet<K>, p: (k: K) => boolean): HashSet<K> {
  const result = new HashSet<K>(a.eq, a.hasher);
  for (const k of a) {
    if (p(k)) result.add(k);
  }
  return result;
}

export function isSubsetOf<K>(a: HashSet<K>, b: HashSet<K>): boolean {
  if (a.size > b.size) return false;
  for (const k of a) {
    if (!b.has(k)) return false;
  }
  return true;
}

export function isSupersetOf<K>(a: HashSet<K>, b: HashSet<K>): boolean {
  return isSubsetOf(b, a);
}

export function setEquals<K>(a: HashSet<K>, b: HashSet<K>): boolean {
  return a.size === b.size && isSubsetOf(a, b);
}

/** First member in iteration order, or undefined when empty. */
export function first<K>(a: Iterable<K>): K | undefined {
  for (const k of a) return k;
  return undefined;
}

/**
 * DisjointSet<K>: union-find over arbitrary keys, using Eq<K> + Hash<K>.
 *
 * Union by rank with path compression.
 */

import type { Eq, Hash } from "@fuzzgraph/std";
import { NotFoundError } from "@fuzzgraph/core";
import { HashMap } from "./hash-map.js";

export class DisjointSet<K> {
  private readonly _eq: Eq<K>;
  private readonly _parent: HashMap<K, K>;
  private readonly _rank: HashMap<K, number>;
  private _dimension = 0;

  constructor(eq: Eq<K>, hash: Hash<K>, items?: Iterable<K>) {
    this._eq = eq;
    this._parent = new HashMap(eq, hash);
    this._rank = new HashMap(eq, hash);
    if (items) {
      for (const k of items) this.add(k);
    }
  }

  /** Number of disjoint sets. */
  get dimension(): number {
    return this._dimension;
  }

  get size(): number {
    return this._parent.size;
  }

  has(k: K): boolean {
    return this._parent.has(k);
  }

  /** Add `k` in its own singleton set. No-op if already present. */
  add(k: K): this {
    if (this._parent.has(k)) return this;
    this._parent.set(k, k);
    this._rank.set(k, 0);
    this._dimension++;
    return this;
  }

  /** The representative of the set containing `k`. */
  find(k: K): K {
    let root = this._parent.get(k);
    if (root === undefined) {
      throw new NotFoundError("element is not in the disjoint set", k);
    }
    for (let next = this._parent.get(root); next !== undefined && !this._eq.equals(next, root); ) {
      root = next;
      next = this._parent.get(root);
    }
    let cur = k;
    while (!this._eq.equals(cur, root)) {
      const next = this._parent.get(cur);
      if (next === undefined) break;
      this._parent.set(cur, root);
      cur = next;
    }
    return root;
  }

  /** Merge the sets containing `a` and `b`. Returns false if already joined. */
  union(a: K, b: K): boolean {
    const ra = this.find(a);
    const rb = this.find(b);
    if (this._eq.equals(ra, rb)) return false;
    const rankA = this._rank.getOrElse(ra, 0);
    const rankB = this._rank.getOrElse(rb, 0);
    if (rankA < rankB) {
      this._parent.set(ra, rb);
    } else if (rankA > rankB) {
      this._parent.set(rb, ra);
    } else {
      this._parent.set(rb, ra);
      this._rank.set(ra, rankA + 1);
    }
    this._dimension--;
    return true;
  }

  connected(a: K, b: K): boolean {
    return this._eq.equals(this.find(a), this.find(b));
  }
}

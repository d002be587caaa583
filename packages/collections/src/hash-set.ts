/**
 * HashSet<K>: a vertex or edge set under value identity.
 *
 * Membership is decided by the Eq/Hash pair the set was built with, so
 * `new GraphEdge("a", "b")` finds an equal edge stored earlier. The first
 * stored member wins; `find` hands it back.
 */

import type { Eq, Hash } from "@fuzzgraph/std";
import { HashMap } from "./hash-map.js";

export class HashSet<K> implements Iterable<K> {
  readonly eq: Eq<K>;
  readonly hasher: Hash<K>;
  private readonly _members: HashMap<K, K>;

  constructor(eq: Eq<K>, hash: Hash<K>, items?: Iterable<K>) {
    this.eq = eq;
    this.hasher = hash;
    this._members = new HashMap<K, K>(eq, hash);
    for (const item of items ?? []) this.add(item);
  }

  get size(): number {
    return this._members.size;
  }

  has(item: K): boolean {
    return this._members.has(item);
  }

  /** The stored member equal to `item`, if any. */
  find(item: K): K | undefined {
    return this._members.get(item);
  }

  add(item: K): this {
    if (!this._members.has(item)) this._members.set(item, item);
    return this;
  }

  delete(item: K): boolean {
    return this._members.delete(item);
  }

  /** Same members, same identity. Later changes to either set stay local. */
  clone(): HashSet<K> {
    return new HashSet(this.eq, this.hasher, this);
  }

  [Symbol.iterator](): IterableIterator<K> {
    return this._members.keys();
  }

  toArray(): K[] {
    return [...this];
  }
}

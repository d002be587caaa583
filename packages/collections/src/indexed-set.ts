/**
 * IndexedSet: a set of mutable records keyed by one immutable field.
 *
 * Members are IndexedMembers: their `index` decides identity, everything else
 * may change in place. The set can be read like a map (`get(index)`) while
 * storing the records themselves, so a stored record's payload can be updated
 * without removing and re-adding it.
 *
 * `add` stores a copy; later changes to the caller's object do not reach the
 * set. Records returned by `get` are the stored ones and are live.
 */

import { eqFor, hashFor, isHashable, showValue, type Hashable } from "@fuzzgraph/std";
import { GraphTypeError, NotFoundError } from "@fuzzgraph/core";
import { HashMap } from "./hash-map.js";
import { HashSet } from "./hash-set.js";

/**
 * A record with an immutable, hashable `index` and arbitrary mutable fields.
 */
export class IndexedMember<I extends Hashable = Hashable> {
  declare readonly index: I;

  constructor(index: I) {
    if (!isHashable(index)) {
      throw new GraphTypeError("index object must be immutable (hashable)", index);
    }
    lockIndex(this, index);
  }

  /**
   * A shallow copy of this member with the same prototype. Subclasses with
   * nested mutable state override this.
   */
  copy(): this {
    const clone: this = Object.create(Object.getPrototypeOf(this));
    for (const key of Object.keys(this)) {
      if (key !== "index") Reflect.set(clone, key, Reflect.get(this, key));
    }
    lockIndex(clone, this.index);
    return clone;
  }

  toString(): string {
    return `IndexedMember(${showValue(this.index)})`;
  }
}

function lockIndex(target: object, index: unknown): void {
  Object.defineProperty(target, "index", {
    value: index,
    enumerable: true,
    writable: false,
    configurable: false,
  });
}

/**
 * Index-keyed set of IndexedMembers.
 */
export class IndexedSet<I extends Hashable, M extends IndexedMember<I>> implements Iterable<M> {
  protected readonly _members = new HashMap<I, M>(eqFor<I>(), hashFor<I>());

  constructor(items?: Iterable<M>) {
    if (items) this.update(items);
  }

  get size(): number {
    return this._members.size;
  }

  /**
   * Store a copy of `item`. An existing member with the same index is
   * replaced.
   */
  add(item: M): this {
    if (!(item instanceof IndexedMember)) {
      throw new GraphTypeError("item to add must be an IndexedMember", item);
    }
    this._members.set(item.index, item.copy());
    return this;
  }

  update(items: Iterable<M>): this {
    for (const item of items) this.add(item);
    return this;
  }

  /**
   * Assign a member by key. `key` must equal `item.index`.
   */
  set(key: I, item: M): this {
    if (!(item instanceof IndexedMember) || !eqFor<I>().equals(key, item.index)) {
      throw new GraphTypeError("key does not match item index", key);
    }
    return this.add(item);
  }

  /** The stored member for an index or for an equal-indexed member. */
  get(key: I | M): M {
    const member = this._members.get(this.keyOf(key));
    if (member === undefined) {
      throw new NotFoundError("no member with this index", key);
    }
    return member;
  }

  has(key: I | M): boolean {
    return this._members.has(this.keyOf(key));
  }

  remove(key: I | M): void {
    if (!this._members.delete(this.keyOf(key))) {
      throw new NotFoundError("no member with this index", key);
    }
  }

  /** A new set holding copies of every member. */
  clone(): IndexedSet<I, M> {
    return new IndexedSet<I, M>(this._members.values());
  }

  keys(): HashSet<I> {
    return new HashSet(eqFor<I>(), hashFor<I>(), this._members.keys());
  }

  values(): IterableIterator<M> {
    return this._members.values();
  }

  [Symbol.iterator](): IterableIterator<M> {
    return this._members.values();
  }

  protected keyOf(key: I | M): I {
    return isMember<I, M>(key) ? key.index : key;
  }
}

function isMember<I extends Hashable, M extends IndexedMember<I>>(key: I | M): key is M {
  return key instanceof IndexedMember;
}

/**
 * HashMap<K, V>: vertex- and edge-keyed storage.
 *
 * Keys are matched with the supplied Eq/Hash pair, so two equal value
 * objects address the same slot. Re-setting a key replaces the value and
 * keeps the key object that was stored first.
 */

import type { Eq, Hash } from "@fuzzgraph/std";

interface Slot<K, V> {
  readonly key: K;
  value: V;
}

export class HashMap<K, V> implements Iterable<[K, V]> {
  private readonly _eq: Eq<K>;
  private readonly _hash: Hash<K>;
  private readonly _table = new Map<number, Slot<K, V>[]>();
  private _count = 0;

  constructor(eq: Eq<K>, hash: Hash<K>, entries?: Iterable<readonly [K, V]>) {
    this._eq = eq;
    this._hash = hash;
    for (const [key, value] of entries ?? []) this.set(key, value);
  }

  get size(): number {
    return this._count;
  }

  get(key: K): V | undefined {
    return this.slot(key)?.value;
  }

  /** The stored value, or `fallback` when `key` is absent. */
  getOrElse(key: K, fallback: V): V {
    const found = this.slot(key);
    return found === undefined ? fallback : found.value;
  }

  has(key: K): boolean {
    return this.slot(key) !== undefined;
  }

  set(key: K, value: V): this {
    const found = this.slot(key);
    if (found !== undefined) {
      found.value = value;
      return this;
    }
    const code = this._hash.hash(key);
    const chain = this._table.get(code);
    if (chain === undefined) this._table.set(code, [{ key, value }]);
    else chain.push({ key, value });
    this._count++;
    return this;
  }

  delete(key: K): boolean {
    const code = this._hash.hash(key);
    const chain = this._table.get(code);
    const at = chain?.findIndex((s) => this._eq.equals(key, s.key)) ?? -1;
    if (chain === undefined || at < 0) return false;
    if (chain.length === 1) this._table.delete(code);
    else chain.splice(at, 1);
    this._count--;
    return true;
  }

  *entries(): IterableIterator<[K, V]> {
    for (const chain of this._table.values()) {
      for (const s of chain) yield [s.key, s.value];
    }
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.entries()) yield key;
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entries()) yield value;
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  private slot(key: K): Slot<K, V> | undefined {
    return this._table.get(this._hash.hash(key))?.find((s) => this._eq.equals(key, s.key));
  }
}
